export class DeliveryError extends Error {
    constructor(message = "Reset email could not be delivered.", cause?: unknown) {
        super(message, { cause });
        this.name = "DeliveryError";
    }
}

export default DeliveryError;
