export type StoreErrorCode = "DUPLICATE_TOKEN" | "STORE_FAILURE";

export class StoreError extends Error {
    public readonly code: StoreErrorCode;
    public readonly retryable: boolean;

    constructor(code: StoreErrorCode, message: string, cause?: unknown) {
        super(message, { cause });
        this.name = "StoreError";
        this.code = code;
        this.retryable = code === "DUPLICATE_TOKEN";
    }
}

export default StoreError;
