// src/config/config.ts

import dotenv from "dotenv";
dotenv.config();

export interface Config {
    port: number;
    nodeEnv: string;

    // Telegram
    botToken?: string;
    telegramApiBaseUrl: string;
    telegramWebhookSecret?: string;
    telegramPollTimeoutSeconds: number;

    // Reset links
    frontendBase: string;
    resetPath: string;
    resetExpiryMinutes: number;

    // Mail
    smtpHost?: string;
    smtpPort: number;
    smtpSecure: boolean;
    smtpUser?: string;
    smtpPass?: string;
    fromEmail?: string;
    mailTemplateDir: string;

    // Database
    databaseUrl?: string;
    sqlitePath: string;

    // Account store hand-off
    passwordUpdateUrl?: string;
    passwordUpdateToken?: string;
}

type Env = Record<string, string | undefined>;

function optional(value: string | undefined): string | undefined {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
}

function positiveNumber(env: Env, key: string, fallback: number): number {
    const raw = optional(env[key]);
    if (raw === undefined) return fallback;
    const parsed = Number(raw);
    if (!Number.isFinite(parsed) || parsed <= 0) {
        throw new Error(`❌ ${key} must be a positive number (got "${raw}")`);
    }
    return parsed;
}

function normalizePath(raw: string | undefined): string {
    const value = optional(raw) ?? "/reset";
    return value.startsWith("/") ? value : `/${value}`;
}

function mysqlUrl(raw: string | undefined): string | undefined {
    const value = optional(raw);
    if (value !== undefined && !/^mysql:\/\//i.test(value)) {
        throw new Error(`❌ DATABASE_URL must be a mysql:// URL (got "${value.split(":")[0]}:")`);
    }
    return value;
}

export function loadConfig(env: Env): Config {
    const smtpUser = optional(env.SMTP_USER);

    return {
        port: positiveNumber(env, "PORT", 8000),
        nodeEnv: optional(env.NODE_ENV) ?? "development",

        botToken: optional(env.BOT_TOKEN),
        telegramApiBaseUrl: optional(env.TELEGRAM_API_BASE_URL) ?? "https://api.telegram.org",
        telegramWebhookSecret: optional(env.TELEGRAM_WEBHOOK_SECRET),
        telegramPollTimeoutSeconds: positiveNumber(env, "TELEGRAM_POLL_TIMEOUT_SECONDS", 30),

        frontendBase: optional(env.FRONTEND_BASE) ?? "http://localhost:8000",
        resetPath: normalizePath(env.RESET_PATH),
        resetExpiryMinutes: positiveNumber(env, "RESET_EXPIRY_MINUTES", 60),

        smtpHost: optional(env.SMTP_HOST),
        smtpPort: positiveNumber(env, "SMTP_PORT", 587),
        smtpSecure: optional(env.SMTP_SECURE)?.toLowerCase() === "true",
        smtpUser,
        smtpPass: optional(env.SMTP_PASS),
        fromEmail: optional(env.FROM_EMAIL) ?? smtpUser,
        mailTemplateDir: optional(env.MAIL_TEMPLATE_DIR) ?? "public/mail-templates",

        databaseUrl: mysqlUrl(env.DATABASE_URL),
        sqlitePath: optional(env.SQLITE_PATH) ?? "reset_tokens.db",

        passwordUpdateUrl: optional(env.PASSWORD_UPDATE_URL),
        passwordUpdateToken: optional(env.PASSWORD_UPDATE_TOKEN),
    };
}

const config: Config = loadConfig(process.env);

export default config;
