import nodemailer from "nodemailer";
import { inject, injectable } from "tsyringe";
import { IMailClient, SendMailParams } from "./MailClient";
import { Config } from "../config/config";
import { DeliveryError } from "../business/errors/DeliveryError";

@injectable()
export class SmtpMailClient implements IMailClient {
  constructor(@inject("Config") private readonly config: Config) {}

  async send(params: SendMailParams): Promise<{ id?: string }> {
    const { smtpHost, smtpPort, smtpSecure, smtpUser, smtpPass, fromEmail } = this.config;
    const from = params.from || fromEmail;
    if (!smtpHost || !from) {
      throw new DeliveryError("SMTP not configured. Set SMTP_HOST, SMTP_USER, SMTP_PASS and FROM_EMAIL.");
    }

    // Port 465 style relays speak TLS from the first byte; everything else must upgrade via STARTTLS.
    const transporter = nodemailer.createTransport({
      host: smtpHost,
      port: smtpPort,
      secure: smtpSecure,
      requireTLS: !smtpSecure,
      auth: smtpUser && smtpPass ? { user: smtpUser, pass: smtpPass } : undefined,
    });

    const info = await transporter.sendMail({
      from,
      to: params.to,
      subject: params.subject,
      html: params.htmlBody,
      text: params.textBody,
    });

    return { id: info.messageId };
  }
}
