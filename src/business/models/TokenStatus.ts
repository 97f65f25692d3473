// Classification of a presented reset token. Checked in this order:
// missing, used, expired, valid.
export type TokenStatus =
    | { kind: "missing" }
    | { kind: "used" }
    | { kind: "expired" }
    | { kind: "valid"; email: string };

export type TokenRejection = Exclude<TokenStatus, { kind: "valid" }>;
