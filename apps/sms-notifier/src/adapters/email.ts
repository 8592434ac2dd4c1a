import nodemailer, { type SendMailOptions } from "nodemailer";
import type { EmailSettings } from "@sms-notifier/shared";

export type EmailMessage = {
  to: string;
  subject: string;
  text: string;
  html?: string;
};

/** The slice of a nodemailer transporter we rely on; tests swap in a fake. */
export interface MailTransport {
  sendMail(options: SendMailOptions): Promise<{ messageId?: string }>;
}

export function createMailTransport(settings: EmailSettings): MailTransport {
  return nodemailer.createTransport({
    host: settings.smtpHost,
    port: settings.smtpPort,
    secure: settings.smtpPort === 465, // 587 upgrades with STARTTLS
    requireTLS: settings.smtpPort !== 465,
    auth: { user: settings.from, pass: settings.password },
  });
}

export async function sendEmail(
  transport: MailTransport,
  from: string,
  msg: EmailMessage,
): Promise<string> {
  const info = await transport.sendMail({
    from,
    to: msg.to,
    subject: msg.subject,
    text: msg.text,
    html: msg.html,
  });
  return info.messageId || "smtp-no-id";
}
