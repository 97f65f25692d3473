const EMAIL_PATTERN = /^[^@\s]+@[^@\s]+\.[^@\s]+$/;

export function isValidEmail(value: string): boolean {
    return EMAIL_PATTERN.test(value.trim());
}

export function normalizeEmail(value: string): string {
    return value.trim().toLowerCase();
}
