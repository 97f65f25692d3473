import { ResultSetHeader, RowDataPacket } from "mysql2";
import { Pool } from "mysql2/promise";
import { StoreError } from "../../business/errors/StoreError";

export abstract class BaseRepository {
    protected constructor(protected readonly pool: Pool) {}

    // Each call checks a connection out of the pool and hands it back once the query settles.
    protected async execute<T extends RowDataPacket[] | ResultSetHeader>(
        sql: string,
        params: unknown[] = []
    ): Promise<T> {
        try {
            const [result] = await this.pool.query<T>(sql, params);
            return result;
        } catch (error) {
            throw this.toStoreError(error);
        }
    }

    protected toStoreError(error: unknown): StoreError {
        if (error instanceof StoreError) {
            return error;
        }
        if (isDuplicateEntry(error)) {
            return new StoreError("DUPLICATE_TOKEN", "Token already exists.", error);
        }
        const message = error instanceof Error ? error.message : "Unknown database error";
        return new StoreError("STORE_FAILURE", message, error);
    }
}

function isDuplicateEntry(error: unknown): boolean {
    return typeof error === "object" && error !== null && "code" in error && error.code === "ER_DUP_ENTRY";
}
