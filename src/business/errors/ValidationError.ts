export class ValidationError extends Error {
    constructor(
        public readonly field: string,
        message: string
    ) {
        super(message);
        this.name = "ValidationError";
    }
}

export default ValidationError;
