// cli/src/lib/mail.ts
import nodemailer from "nodemailer";

export class MailError extends Error {
  constructor(public server: string, public details: string) {
    super(`Email send failed via ${server}: ${details}`);
    this.name = "MailError";
  }
}

/**
 * Bare host names get the plain SMTP port.
 */
export function smtpUrl(server: string): string {
  return /^smtps?:\/\//.test(server) ? server : `smtp://${server}:25`;
}

export interface SmtpEndpoint {
  host: string;
  port: number;
  secure: boolean;
}

export function smtpEndpoint(server: string): SmtpEndpoint {
  const url = new URL(smtpUrl(server));
  const secure = url.protocol === "smtps:";
  const port = url.port ? Number(url.port) : secure ? 465 : 25;
  return { host: url.hostname, port, secure };
}

export interface ReleaseMail {
  server: string;
  username: string;
  password: string;
  to: string;
  subject: string;
  html: string;
  /** Plain-text alternative; a pointer to the HTML part when absent */
  text?: string;
}

/**
 * Send a multipart/alternative message. STARTTLS is required on plain SMTP.
 */
export async function sendReleaseMail(mail: ReleaseMail): Promise<void> {
  const endpoint = smtpEndpoint(mail.server);
  const transport = nodemailer.createTransport({
    host: endpoint.host,
    port: endpoint.port,
    secure: endpoint.secure,
    requireTLS: true,
    auth: { user: mail.username, pass: mail.password },
  });

  try {
    await transport.sendMail({
      from: mail.username,
      to: mail.to,
      subject: mail.subject,
      text: mail.text ?? "See HTML part.",
      html: mail.html,
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new MailError(`${endpoint.host}:${endpoint.port}`, message);
  } finally {
    transport.close();
  }
}
