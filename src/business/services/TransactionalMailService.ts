import { inject, injectable } from "tsyringe";
import { IMailClient } from "../../clients/MailClient";
import { promises as fs } from "fs";
import path from "path";
import { Config } from "../../config/config";
import { DeliveryError } from "../errors/DeliveryError";
import { escapeHtml } from "../../utils/html";

type TemplateKey = "password-reset";

interface TemplateVars {
  [key: string]: string | number | null | undefined;
}

interface RenderedTemplate {
  subject: string;
  html: string;
  text: string;
}

@injectable()
export class TransactionalMailService {
  private readonly templateDir: string;
  private readonly cache = new Map<TemplateKey, { subject: string; body: string }>();

  constructor(
    @inject("IMailClient") private readonly mailClient: IMailClient,
    @inject("Config") private readonly config: Config
  ) {
    this.templateDir = path.resolve(process.cwd(), config.mailTemplateDir);
  }

  public buildResetUrl(token: string): string {
    const base = this.config.frontendBase.replace(/\/+$/, "");
    return `${base}${this.config.resetPath}?token=${encodeURIComponent(token)}`;
  }

  public async sendPasswordReset(params: { to: string; token: string }): Promise<void> {
    const rendered = await this.renderTemplate(
      "password-reset",
      {
        resetUrl: this.buildResetUrl(params.token),
        expiryMinutes: this.config.resetExpiryMinutes,
      },
      this.defaultPasswordTemplate()
    );

    await this.dispatchMail({
      template: "password-reset",
      to: params.to,
      subject: rendered.subject,
      htmlBody: rendered.html,
      textBody: rendered.text,
    });
  }

  private async dispatchMail(input: {
    to: string;
    subject: string;
    htmlBody: string;
    textBody: string;
    template: TemplateKey;
  }): Promise<void> {
    try {
      const response = await this.mailClient.send({
        to: input.to,
        subject: input.subject,
        htmlBody: input.htmlBody,
        textBody: input.textBody,
        from: this.config.fromEmail,
      });
      console.log(`[TransactionalMailService] ${input.template} sent to ${input.to}`, { id: response.id ?? null });
    } catch (error) {
      console.error(`[TransactionalMailService] ${input.template} to ${input.to} failed`, error);
      if (error instanceof DeliveryError) {
        throw error;
      }
      throw new DeliveryError(
        error instanceof Error ? `Mail relay rejected the message: ${error.message}` : "Unknown mail error",
        error
      );
    }
  }

  private async renderTemplate(
    key: TemplateKey,
    vars: TemplateVars,
    fallback: { subject: string; body: string }
  ): Promise<RenderedTemplate> {
    const template = await this.loadTemplate(key, fallback);
    return {
      subject: this.interpolate(template.subject, vars, String),
      html: this.interpolate(template.body, vars, escapeHtml),
      text: this.stripHtml(this.interpolate(template.body, vars, String)),
    };
  }

  private async loadTemplate(
    key: TemplateKey,
    fallback: { subject: string; body: string }
  ): Promise<{ subject: string; body: string }> {
    const cached = this.cache.get(key);
    if (cached) {
      return cached;
    }

    const subjectFile = path.join(this.templateDir, `${key}.subject.txt`);
    const bodyFile = path.join(this.templateDir, `${key}.html`);

    try {
      const [subject, body] = await Promise.all([
        fs.readFile(subjectFile, "utf8"),
        fs.readFile(bodyFile, "utf8"),
      ]);
      const compiled = { subject: subject.trim(), body };
      this.cache.set(key, compiled);
      return compiled;
    } catch {
      // No override on disk: the built-in template applies.
      this.cache.set(key, fallback);
      return fallback;
    }
  }

  private interpolate(template: string, vars: TemplateVars, encode: (value: string) => string): string {
    return (template || "").replace(/\{\{\s*(\w+)\s*\}\}/g, (_match, key: string) => {
      const value = vars[key];
      return typeof value === "undefined" || value === null ? "" : encode(String(value));
    });
  }

  private stripHtml(html: string): string {
    return html
      .replace(/<style[\s\S]*?<\/style>/gi, "")
      .replace(/<[^>]+>/g, " ")
      .replace(/\s+/g, " ")
      .trim();
  }

  private defaultPasswordTemplate() {
    return {
      subject: "Password reset request",
      body: `
        <html>
          <body style="font-family:Arial,Helvetica,sans-serif;color:#0f172a;line-height:1.5">
            <h2>Password reset</h2>
            <p>Hello,</p>
            <p>A password reset was requested for this account. If you requested it, open the link below to reset your password:</p>
            <p><a href="{{resetUrl}}">{{resetUrl}}</a></p>
            <p>If you didn't request this, ignore this email.</p>
            <p>This link expires in {{expiryMinutes}} minutes.</p>
          </body>
        </html>
      `,
    };
  }
}
