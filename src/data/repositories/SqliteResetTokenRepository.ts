import Database from "better-sqlite3";
import { z } from "zod";
import { IResetTokenRepository } from "../interfaces/IResetTokenRepository";
import { ResetTokenModel } from "../../business/models/ResetTokenModel";
import { StoreError } from "../../business/errors/StoreError";

const rowSchema = z.object({
    id: z.number(),
    email: z.string(),
    token: z.string(),
    created_at: z.string(),
    expires_at: z.string(),
    used: z.number(),
});

/**
 * Embedded store used when no DATABASE_URL is configured. Timestamps are kept as
 * ISO-8601 UTC strings so that text comparison orders them chronologically.
 */
export class SqliteResetTokenRepository implements IResetTokenRepository {
    private readonly db: Database.Database;

    constructor(filename: string) {
        this.db = new Database(filename);
        this.db.pragma("journal_mode = WAL");
        this.db.exec(`
            CREATE TABLE IF NOT EXISTS reset_tokens (
                id INTEGER PRIMARY KEY AUTOINCREMENT,
                email TEXT NOT NULL,
                token TEXT NOT NULL,
                created_at TEXT NOT NULL,
                expires_at TEXT NOT NULL,
                used INTEGER NOT NULL DEFAULT 0
            );
            CREATE UNIQUE INDEX IF NOT EXISTS uniq_reset_tokens_token ON reset_tokens (token);
            CREATE INDEX IF NOT EXISTS idx_reset_tokens_email ON reset_tokens (email);
        `);
    }

    public async insert(email: string, token: string, createdAt: Date, expiresAt: Date): Promise<ResetTokenModel> {
        const result = this.run(() =>
            this.db
                .prepare(
                    `INSERT INTO reset_tokens (email, token, created_at, expires_at, used)
                     VALUES (?, ?, ?, ?, 0)`
                )
                .run(email, token, createdAt.toISOString(), expiresAt.toISOString())
        );
        return new ResetTokenModel(Number(result.lastInsertRowid), email, token, createdAt, expiresAt, false);
    }

    public async findByToken(token: string): Promise<ResetTokenModel | null> {
        const raw = this.run(() =>
            this.db
                .prepare(
                    `SELECT id, email, token, created_at, expires_at, used
                     FROM reset_tokens
                     WHERE token = ?
                     LIMIT 1`
                )
                .get(token)
        );
        if (raw === undefined) {
            return null;
        }

        const parsed = rowSchema.safeParse(raw);
        if (!parsed.success) {
            throw new StoreError("STORE_FAILURE", `Malformed reset_tokens row: ${parsed.error.message}`);
        }

        const row = parsed.data;
        return new ResetTokenModel(
            row.id,
            row.email,
            row.token,
            new Date(row.created_at),
            new Date(row.expires_at),
            row.used === 1
        );
    }

    public async markUsed(token: string, now: Date): Promise<boolean> {
        const result = this.run(() =>
            this.db
                .prepare(
                    `UPDATE reset_tokens
                     SET used = 1
                     WHERE token = ?
                       AND used = 0
                       AND expires_at > ?`
                )
                .run(token, now.toISOString())
        );
        return result.changes === 1;
    }

    public async close(): Promise<void> {
        this.db.close();
    }

    private run<T>(operation: () => T): T {
        try {
            return operation();
        } catch (error) {
            if (isUniqueViolation(error)) {
                throw new StoreError("DUPLICATE_TOKEN", "Token already exists.", error);
            }
            const message = error instanceof Error ? error.message : "Unknown database error";
            throw new StoreError("STORE_FAILURE", message, error);
        }
    }
}

function isUniqueViolation(error: unknown): boolean {
    return (
        typeof error === "object" &&
        error !== null &&
        "code" in error &&
        error.code === "SQLITE_CONSTRAINT_UNIQUE"
    );
}
