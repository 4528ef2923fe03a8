import nodemailer from "nodemailer";
import type { Config } from "./config";

export interface OutgoingEmail {
  to: string;
  from: string;
  subject: string;
  text: string;
}

export type SendEmail = (message: OutgoingEmail) => Promise<void>;

function createSmtpTransport(smtp: Config["smtp"]) {
  const { host, port, user, pass } = smtp;

  if (!host) throw new Error("Missing SMTP_HOST env var");
  if (!user) throw new Error("Missing SMTP_USER env var");
  if (!pass) throw new Error("Missing SMTP_PASS env var");

  return nodemailer.createTransport({
    host,
    port,
    secure: port === 465,
    auth: { user, pass },
  });
}

export function createSmtpSender(smtp: Config["smtp"]): SendEmail {
  return async (message) => {
    const transporter = createSmtpTransport(smtp);
    await transporter.sendMail({ from: message.from, to: message.to, subject: message.subject, text: message.text });
  };
}
