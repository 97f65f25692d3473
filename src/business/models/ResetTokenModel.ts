export class ResetTokenModel {
    constructor(
        public readonly id: number,
        public readonly email: string,
        public readonly token: string,
        public readonly createdAt: Date,
        public readonly expiresAt: Date,
        public readonly used: boolean = false,
    ) {}

    public isExpiredAt(now: Date): boolean {
        return now.getTime() >= this.expiresAt.getTime();
    }
}
