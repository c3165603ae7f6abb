// cli/src/commands/relnotes.ts
import { writeFileSync } from "fs";
import path from "path";
import { validateEnv, releaseNotesEnvSchema } from "../lib/validation.js";
import { azTry } from "../lib/az.js";
import { digestForTag, latestDigest } from "../lib/acr.js";
import { getCommitFromImage, type ImageLocation } from "../lib/registry.js";
import { compareCommits, resolveFullSha, setMultilineOutput, tokenFor, type Comparison } from "../lib/github.js";
import { ImageReferenceError, parseImageRef, type ImageRef } from "../lib/image.js";
import { repositoryName } from "../lib/naming.js";

export const NOTES_FILE = "release-notes.md";
export const HTML_FILE = "release-notes.html";

export type CommitLog =
  | { kind: "listed"; comparison: Comparison }
  | { kind: "failed" }
  | { kind: "no-token" };

export interface ReleaseInfo {
  service: string;
  targetEnv: string;
  /** GitHub owner/repo the images are built from */
  sourceRepo: string;
  newImage: string;
  newDigest: string;
  previousDigest?: string;
  newSha?: string;
  previousSha?: string;
  buildUrl?: string;
  commitLimit: number;
  commitLog?: CommitLog;
}

export interface ReleaseNotes {
  markdown: string;
  html: string;
}

const short = (sha: string) => sha.substring(0, 7);

export function escapeHtml(value: string): string {
  return value.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;").replace(/"/g, "&quot;");
}

function compareUrl(info: ReleaseInfo, previous: string, next: string): string {
  return `https://github.com/${info.sourceRepo}/compare/${previous}...${next}`;
}

export function renderMarkdown(info: ReleaseInfo): string {
  const lines = [
    `## Release notes: Promote ${info.service} to ${info.targetEnv}`,
    "",
    `- Target environment: ${info.targetEnv}`,
    `- New image: ${info.newImage}`,
    `- Previously deployed digest: ${info.previousDigest ?? "(none - first promotion)"}`,
    "",
  ];

  const { newSha, previousSha } = info;
  if (newSha && previousSha) {
    if (newSha === previousSha) {
      lines.push("### Changes", "", `No code changes detected (same commit: ${short(newSha)}).`);
    } else {
      lines.push(
        `### Changes (${short(previousSha)} → ${short(newSha)})`,
        "",
        `Compare: ${compareUrl(info, previousSha, newSha)}`
      );
    }
  } else {
    lines.push("Commit SHAs not available from image labels. Showing image digests only.");
  }
  return `${lines.join("\n")}\n`;
}

function commitRows(comparison: Comparison, limit: number): string[] {
  return comparison.commits.slice(0, limit).map(commit => {
    const sha = commit.url ? `<a href="${escapeHtml(commit.url)}">${short(commit.sha)}</a>` : `<code>${short(commit.sha)}</code>`;
    return (
      `<tr><td>${sha}</td><td>${escapeHtml(commit.message)}</td>` +
      `<td>${escapeHtml(commit.author)}</td><td><code>${escapeHtml(commit.date)}</code></td></tr>`
    );
  });
}

function commitLogHtml(log: CommitLog, limit: number): string[] {
  if (log.kind === "no-token") {
    return [];
  }
  const lines = ["<details><summary>Commit log</summary>"];
  if (log.kind === "failed") {
    lines.push("<p>(Commit details unavailable; see the compare link above.)</p>");
  } else {
    lines.push(
      '<table border="1" cellpadding="6" cellspacing="0"><thead><tr>' +
        '<th align="left">SHA</th><th align="left">Message</th><th align="left">Author</th><th align="left">Date</th>' +
        "</tr></thead><tbody>",
      ...commitRows(log.comparison, limit),
      "</tbody></table>"
    );
    if (log.comparison.total > limit) {
      lines.push(`<p>Showing first ${limit} of ${log.comparison.total} commits. See the compare link above for the full list.</p>`);
    }
  }
  lines.push("</details>");
  return lines;
}

export function renderHtml(info: ReleaseInfo): string {
  const lines = [
    `<h2>Release notes: Promote ${escapeHtml(info.service)} to ${escapeHtml(info.targetEnv)}</h2>`,
    `<p><strong>Target environment:</strong> ${escapeHtml(info.targetEnv)}</p>`,
    `<p><strong>New image:</strong> ${escapeHtml(info.newImage)}</p>`,
    `<p><strong>Previously deployed digest:</strong> ${info.previousDigest ?? "(none - first promotion)"}</p>`,
  ];
  if (info.buildUrl) {
    lines.push(`<p><a href="${escapeHtml(info.buildUrl)}">Build details</a></p>`);
  }

  if (info.previousDigest) {
    lines.push("<h3>Changes</h3>", `<p>Digest change: <code>${info.previousDigest}</code> → <code>${info.newDigest}</code></p>`);
    const { newSha, previousSha } = info;
    if (!newSha || !previousSha) {
      lines.push("<p>Commit SHAs not available from image labels.</p>");
    } else if (newSha === previousSha) {
      lines.push(`<p>No code changes detected (same commit: <code>${short(newSha)}</code>).</p>`);
    } else {
      lines.push(
        `<p>Compare commits: <a href="${compareUrl(info, previousSha, newSha)}">${short(previousSha)} → ${short(newSha)}</a></p>`
      );
      if (info.commitLog) {
        lines.push(...commitLogHtml(info.commitLog, info.commitLimit));
      }
    }
  }
  return `${lines.join("\n")}\n`;
}

function tryParse(image: string | undefined): ImageRef | undefined {
  if (!image) {
    return undefined;
  }
  try {
    return parseImageRef(image);
  } catch {
    console.warn(`[relnotes] Ignoring unparseable previous image: ${image}`);
    return undefined;
  }
}

/**
 * First location whose labels yield a commit.
 */
async function firstCommit(locations: ImageLocation[]): Promise<string | undefined> {
  for (const location of locations) {
    const sha = await getCommitFromImage(location);
    if (sha) {
      return sha;
    }
  }
  return undefined;
}

async function expandSha(repo: string, sha: string | undefined, token: string | undefined): Promise<string | undefined> {
  if (!sha || sha.length >= 40) {
    return sha;
  }
  return resolveFullSha(repo, sha, token);
}

export interface ReleaseNotesOptions {
  /** Directory the notes are written to; defaults to the working directory */
  outDir?: string;
}

/**
 * Describe a promotion: which digest and commit replace which, with the
 * commit log between them when the source repository is readable.
 */
export async function releaseNotes(options: ReleaseNotesOptions = {}): Promise<ReleaseNotes> {
  const env = validateEnv(releaseNotesEnvSchema, process.env, "release-notes");
  const outDir = options.outDir ?? process.cwd();

  if (env.SUB) {
    await azTry(["account", "set", "--subscription", env.SUB]);
  }

  const source = parseImageRef(env.SRC_IMAGE);
  if (!source.digest) {
    throw new ImageReferenceError(env.SRC_IMAGE, "must be in digest format (image@sha256:...)");
  }
  const sourceRegistry = source.registryName ?? source.domain;
  const targetRepo = repositoryName(env.SERVICE_KEY, env.TARGET_ENV, env.ACR_NAMESPACE);
  const previous = tryParse(env.PREV_IMAGE);

  let previousDigest = env.PREV_DIGEST ?? previous?.digest;
  if (!previousDigest && previous?.tag && env.TGT_ACR && previous.registryName === env.TGT_ACR) {
    previousDigest = await digestForTag(env.TGT_ACR, previous.repository, previous.tag);
  }
  if (!previousDigest && env.TGT_ACR) {
    previousDigest = await latestDigest(env.TGT_ACR, targetRepo);
  }
  console.log(`[relnotes] New digest:      ${source.digest}`);
  console.log(`[relnotes] Previous digest: ${previousDigest ?? "(none)"}`);

  let newSha = await getCommitFromImage({ registry: sourceRegistry, repository: source.repository, digest: source.digest });
  let previousSha: string | undefined;
  if (previousDigest) {
    const candidates: ImageLocation[] = [];
    if (previous?.registryName) {
      candidates.push({ registry: previous.registryName, repository: previous.repository, digest: previousDigest });
    }
    if (env.TGT_ACR) {
      candidates.push({ registry: env.TGT_ACR, repository: targetRepo, digest: previousDigest });
    }
    candidates.push({ registry: sourceRegistry, repository: source.repository, digest: previousDigest });
    previousSha = await firstCommit(candidates);
  }

  const token = tokenFor(env.SRC_REPO, env);
  newSha = await expandSha(env.SRC_REPO, newSha, token);
  previousSha = await expandSha(env.SRC_REPO, previousSha, token);
  console.log(`[relnotes] Commits: ${previousSha ?? "?"} -> ${newSha ?? "?"}`);

  let commitLog: CommitLog | undefined;
  if (previousDigest && newSha && previousSha && newSha !== previousSha) {
    if (!token) {
      console.warn(`[relnotes] No token available to read ${env.SRC_REPO}. Skipping commit table.`);
      commitLog = { kind: "no-token" };
    } else {
      try {
        commitLog = { kind: "listed", comparison: await compareCommits(env.SRC_REPO, previousSha, newSha, token) };
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.warn(`[relnotes] ${message}`);
        commitLog = { kind: "failed" };
      }
    }
  }

  const info: ReleaseInfo = {
    service: env.SERVICE_KEY,
    targetEnv: env.TARGET_ENV,
    sourceRepo: env.SRC_REPO,
    newImage: env.SRC_IMAGE,
    newDigest: source.digest,
    previousDigest,
    newSha,
    previousSha,
    buildUrl: env.BUILD_URL,
    commitLimit: env.COMMITS_TABLE_LIMIT,
    commitLog,
  };
  const notes: ReleaseNotes = { markdown: renderMarkdown(info), html: renderHtml(info) };

  writeFileSync(path.join(outDir, NOTES_FILE), notes.markdown);
  writeFileSync(path.join(outDir, HTML_FILE), notes.html);
  setMultilineOutput("body", notes.markdown);
  setMultilineOutput("html", notes.html);
  return notes;
}
