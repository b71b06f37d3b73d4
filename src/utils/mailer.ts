import nodemailer from "nodemailer";
import type { Transporter } from "nodemailer";
import { authLogger } from "./logger";

export interface ResetLinkMessage {
  username: string;
  to: string;
  token: string;
}

/**
 * Delivers password reset links. Implementations reject when the message
 * could not be handed to the transport.
 */
export interface ResetMailer {
  sendResetLink(message: ResetLinkMessage): Promise<void>;
}

export interface SmtpSettings {
  host: string;
  port: number;
  user: string;
  pass: string;
  from: string;
}

export function buildResetLink(resetUrlBase: string, token: string): string {
  const separator = resetUrlBase.includes("?") ? "&" : "?";
  return `${resetUrlBase}${separator}token=${encodeURIComponent(token)}`;
}

export function composeResetEmail(
  message: ResetLinkMessage,
  resetUrlBase: string
): { subject: string; text: string } {
  const link = buildResetLink(resetUrlBase, message.token);
  return {
    subject: "Password reset",
    text:
      `Hello ${message.username},\n\n` +
      `Click the link to reset your password:\n${link}\n\n` +
      `If you did not request this, ignore this email.`,
  };
}

export class SmtpResetMailer implements ResetMailer {
  private readonly transporter: Transporter;

  constructor(
    private readonly smtp: SmtpSettings,
    private readonly resetUrlBase: string,
    transporter?: Transporter
  ) {
    this.transporter =
      transporter ??
      nodemailer.createTransport({
        host: smtp.host,
        port: smtp.port,
        secure: smtp.port === 465,
        ...(smtp.user ? { auth: { user: smtp.user, pass: smtp.pass } } : {}),
      });
  }

  async sendResetLink(message: ResetLinkMessage): Promise<void> {
    const { subject, text } = composeResetEmail(message, this.resetUrlBase);

    await this.transporter.sendMail({
      from: this.smtp.from,
      to: message.to,
      subject,
      text,
    });
    authLogger.info(`Reset link sent to ${message.username}`, {
      username: message.username,
    });
  }
}
