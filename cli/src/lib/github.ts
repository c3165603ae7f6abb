// cli/src/lib/github.ts
import { appendFileSync } from "fs";
import { z } from "zod";

const API_URL = "https://api.github.com";

export class GitHubApiError extends Error {
  constructor(public url: string, public statusCode: number, public details: string) {
    super(`GitHub API request failed (${statusCode}): ${url}`);
    this.name = "GitHubApiError";
  }
}

/**
 * Write a step output. Outside Actions the line goes to stdout.
 */
export function setOutput(name: string, value: string): void {
  const file = process.env.GITHUB_OUTPUT;
  const line = `${name}=${value}\n`;
  if (file) {
    appendFileSync(file, line);
  } else {
    process.stdout.write(line);
  }
}

export function setMultilineOutput(name: string, value: string): void {
  const block = `${name}<<EOF\n${value}${value.endsWith("\n") ? "" : "\n"}EOF\n`;
  const file = process.env.GITHUB_OUTPUT;
  if (file) {
    appendFileSync(file, block);
  } else {
    process.stdout.write(block);
  }
}

export function appendSummary(markdown: string): void {
  const file = process.env.GITHUB_STEP_SUMMARY;
  if (file) {
    appendFileSync(file, markdown.endsWith("\n") ? markdown : `${markdown}\n`);
  }
}

/**
 * Token that can read `repo`: the workflow token for the repository the
 * workflow runs in, otherwise a dedicated read token.
 */
export function tokenFor(
  repo: string,
  env: { GITHUB_REPOSITORY?: string; GITHUB_TOKEN?: string; FRONTEND_REPO_READ_TOKEN?: string }
): string | undefined {
  return env.GITHUB_REPOSITORY === repo ? env.GITHUB_TOKEN : env.FRONTEND_REPO_READ_TOKEN;
}

async function getJson(url: string, token: string): Promise<unknown> {
  const response = await fetch(url, {
    headers: {
      Authorization: `Bearer ${token}`,
      Accept: "application/vnd.github+json",
    },
  });
  if (!response.ok) {
    throw new GitHubApiError(url, response.status, await response.text());
  }
  return response.json();
}

const commitSchema = z.object({ sha: z.string() });

/**
 * Expand an abbreviated SHA. Any failure returns `ref` unchanged.
 */
export async function resolveFullSha(repo: string, ref: string, token: string | undefined): Promise<string> {
  if (!ref || !token) {
    return ref;
  }
  try {
    const data = commitSchema.parse(await getJson(`${API_URL}/repos/${repo}/commits/${ref}`, token));
    return data.sha || ref;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.warn(`Could not resolve ${ref} in ${repo}: ${message}`);
    return ref;
  }
}

const compareSchema = z.object({
  total_commits: z.number().optional(),
  commits: z
    .array(
      z.object({
        sha: z.string(),
        html_url: z.string().nullish(),
        commit: z.object({
          message: z.string(),
          author: z.object({ name: z.string().nullish(), date: z.string().nullish() }).nullish(),
          committer: z.object({ date: z.string().nullish() }).nullish(),
        }),
        author: z.object({ login: z.string().nullish() }).nullish(),
      })
    )
    .default([]),
});

export interface CommitSummary {
  sha: string;
  url?: string;
  /** First line of the commit message */
  message: string;
  author: string;
  date: string;
}

export interface Comparison {
  total: number;
  commits: CommitSummary[];
}

export async function compareCommits(repo: string, base: string, head: string, token: string): Promise<Comparison> {
  const data = compareSchema.parse(await getJson(`${API_URL}/repos/${repo}/compare/${base}...${head}`, token));
  const commits = data.commits.map(c => ({
    sha: c.sha,
    url: c.html_url || undefined,
    message: c.commit.message.split("\n")[0] ?? "",
    author: c.commit.author?.name ?? c.author?.login ?? "n/a",
    date: c.commit.author?.date ?? c.commit.committer?.date ?? "n/a",
  }));
  return { total: data.total_commits ?? commits.length, commits };
}
