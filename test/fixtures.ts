import { Config, loadConfig } from "../src/config/config";
import { Clock } from "../src/utils/clock";
import { TokenGenerator } from "../src/utils/crypto";

export function testConfig(overrides: Partial<Config> = {}): Config {
    return {
        ...loadConfig({}),
        frontendBase: "https://reset.example.test",
        fromEmail: "no-reply@example.test",
        mailTemplateDir: "test/no-templates-here",
        ...overrides,
    };
}

export class FakeClock implements Clock {
    private current: Date;

    constructor(start: string) {
        this.current = new Date(start);
    }

    now(): Date {
        return new Date(this.current.getTime());
    }

    advanceMinutes(minutes: number): void {
        this.current = new Date(this.current.getTime() + minutes * 60_000);
    }
}

// Hands out the given tokens in order, then falls back to numbered ones.
export function sequenceTokens(...tokens: string[]): TokenGenerator {
    let counter = 0;
    return () => tokens.shift() ?? `generated-${++counter}`;
}
