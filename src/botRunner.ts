import { IResetTokenRepository } from "./data/interfaces/IResetTokenRepository";

export interface PollingWorker {
    start(): Promise<void>;
    stop(): void;
}

export type SignalSubscriber = (onSignal: () => void) => void;

/**
 * Runs the poller until a shutdown signal stops it, then releases the token store
 * so its pool or file handle no longer holds the event loop open.
 */
export async function runBot(
    poller: PollingWorker,
    store: Pick<IResetTokenRepository, "close">,
    subscribe: SignalSubscriber
): Promise<void> {
    subscribe(() => poller.stop());
    try {
        await poller.start();
    } finally {
        await store.close();
    }
}
