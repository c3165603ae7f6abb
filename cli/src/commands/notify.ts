// cli/src/commands/notify.ts
import { existsSync, readFileSync } from "fs";
import { validateEnv, mailEnvSchema, type MailEnv } from "../lib/validation.js";
import { appendSummary, setOutput } from "../lib/github.js";
import { sendReleaseMail } from "../lib/mail.js";

export const MAIL_PREREQUISITES = ["MAIL_SERVER", "MAIL_USERNAME", "MAIL_PASSWORD", "MAIL_TO"] as const;

export function composeSubject(env: Pick<MailEnv, "SUBJECT_PREFIX" | "APP_PREFIX" | "SERVICE_KEY" | "TARGET_ENV">): string {
  const prefix = env.SUBJECT_PREFIX ? `${env.SUBJECT_PREFIX} ` : "";
  return `${prefix}${env.APP_PREFIX.toUpperCase()}: Promote ${env.SERVICE_KEY} to ${env.TARGET_ENV}`;
}

function emailSummary(env: MailEnv, text: string | undefined): string {
  const lines = [
    "### Email summary",
    `- Target environment: ${env.TARGET_ENV}`,
    `- Mail server: ${env.MAIL_SERVER}`,
    `- Recipients: ${env.MAIL_TO}`,
  ];
  if (text !== undefined) {
    lines.push("", "<details><summary>Release notes (text)</summary>", "", text, "", "</details>");
  }
  return lines.join("\n");
}

/**
 * Mail the release notes written by `release-notes`. False when the SMTP
 * settings are incomplete.
 */
export async function notify(): Promise<boolean> {
  const missing = MAIL_PREREQUISITES.filter(name => !process.env[name]);
  if (missing.length > 0) {
    console.error(`[email] Missing prerequisites: ${missing.join(" ")}`);
    setOutput("prereqs_ok", "false");
    return false;
  }
  setOutput("prereqs_ok", "true");

  const env = validateEnv(mailEnvSchema, process.env, "notify");
  const subject = composeSubject(env);
  setOutput("subject", subject);

  if (!existsSync(env.RELEASE_HTML)) {
    throw new Error(`[email] Missing HTML body: ${env.RELEASE_HTML}`);
  }
  const html = readFileSync(env.RELEASE_HTML, "utf8");
  const text = existsSync(env.RELEASE_BODY) ? readFileSync(env.RELEASE_BODY, "utf8") : undefined;

  appendSummary(emailSummary(env, text));

  await sendReleaseMail({
    server: env.MAIL_SERVER,
    username: env.MAIL_USERNAME,
    password: env.MAIL_PASSWORD,
    to: env.MAIL_TO,
    subject,
    html,
    text,
  });
  console.log("[email] Email sent");
  return true;
}
