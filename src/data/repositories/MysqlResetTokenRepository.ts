import { inject, injectable } from "tsyringe";
import { ResultSetHeader, RowDataPacket } from "mysql2";
import { Pool } from "mysql2/promise";
import { BaseRepository } from "./BaseRepository";
import { IResetTokenRepository } from "../interfaces/IResetTokenRepository";
import { ResetTokenModel } from "../../business/models/ResetTokenModel";

@injectable()
export class MysqlResetTokenRepository extends BaseRepository implements IResetTokenRepository {
    private initialized = false;

    constructor(@inject("MysqlPool") pool: Pool) {
        super(pool);
    }

    private async ensureInitialized(): Promise<void> {
        if (this.initialized) {
            return;
        }

        const createSql = `
            CREATE TABLE IF NOT EXISTS reset_tokens (
                id BIGINT UNSIGNED NOT NULL AUTO_INCREMENT PRIMARY KEY,
                email VARCHAR(320) NOT NULL,
                token VARCHAR(128) NOT NULL,
                created_at DATETIME(3) NOT NULL,
                expires_at DATETIME(3) NOT NULL,
                used TINYINT(1) NOT NULL DEFAULT 0,
                UNIQUE KEY uniq_token (token),
                INDEX idx_email (email)
            ) ENGINE=InnoDB DEFAULT CHARSET=utf8mb4 COLLATE=utf8mb4_unicode_ci;
        `;

        await this.execute<ResultSetHeader>(createSql);
        this.initialized = true;
    }

    public async insert(email: string, token: string, createdAt: Date, expiresAt: Date): Promise<ResetTokenModel> {
        await this.ensureInitialized();

        const sql = `
            INSERT INTO reset_tokens (email, token, created_at, expires_at, used)
            VALUES (?, ?, ?, ?, 0)
        `;
        const result = await this.execute<ResultSetHeader>(sql, [email, token, createdAt, expiresAt]);
        return new ResetTokenModel(Number(result.insertId), email, token, createdAt, expiresAt, false);
    }

    public async findByToken(token: string): Promise<ResetTokenModel | null> {
        await this.ensureInitialized();

        const sql = `
            SELECT id, email, token, created_at AS createdAt, expires_at AS expiresAt, used
            FROM reset_tokens
            WHERE token = ?
            LIMIT 1
        `;
        const rows = await this.execute<RowDataPacket[]>(sql, [token]);
        if (!rows.length) {
            return null;
        }

        const row = rows[0];
        return new ResetTokenModel(
            Number(row.id),
            String(row.email),
            String(row.token),
            new Date(row.createdAt),
            new Date(row.expiresAt),
            Boolean(Number(row.used))
        );
    }

    public async markUsed(token: string, now: Date): Promise<boolean> {
        await this.ensureInitialized();

        const sql = `
            UPDATE reset_tokens
            SET used = 1
            WHERE token = ?
              AND used = 0
              AND expires_at > ?
        `;
        const result = await this.execute<ResultSetHeader>(sql, [token, now]);
        return result.affectedRows === 1;
    }

    public async close(): Promise<void> {
        await this.pool.end();
    }
}
