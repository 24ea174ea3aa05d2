import { InvalidArgumentError, QueueTimeoutError } from "../errors";

export interface PendingHandle<P, V> {
    readonly payload: P;
    readonly registeredAt: number;
    resolve(value: V): void;
    reject(error: Error): void;
}

interface Entry<P, V> extends PendingHandle<P, V> {
    timer?: NodeJS.Timeout;
}

export interface RegisterOptions {
    timeoutMs?: number;
    /** Runs after the handle has been removed and before the promise rejects. */
    onTimeout?: (timeoutMs: number) => void;
    /** Prefix of the timeout error message, e.g. "add". */
    operation?: string;
}

// Largest delay setTimeout honours; anything above it fires after 1ms.
export const MAX_TIMEOUT_MS = 2_147_483_647;

/** `Infinity` is accepted and means "wait without a deadline". */
export function assertValidTimeout(timeoutMs: number | undefined): void {
    if (timeoutMs === undefined || timeoutMs === Infinity) return;
    if (Number.isNaN(timeoutMs) || timeoutMs < 0 || timeoutMs > MAX_TIMEOUT_MS) {
        throw new InvalidArgumentError(
            `Timeout must be between 0 and ${MAX_TIMEOUT_MS} milliseconds or Infinity, got ${timeoutMs}`
        );
    }
}

/**
 * FIFO of suspended callers. A handle leaves the registry exactly once:
 * through `shift`, `rejectAll` or its own timeout, whichever comes first.
 */
export class PendingRegistry<P, V> {
    private entries: Array<Entry<P, V>> = [];

    register(payload: P, options: RegisterOptions = {}): Promise<V> {
        const { timeoutMs, onTimeout, operation } = options;
        assertValidTimeout(timeoutMs);

        return new Promise<V>((resolve, reject) => {
            const entry: Entry<P, V> = {
                payload,
                registeredAt: Date.now(),
                resolve: (value: V) => {
                    if (entry.timer) clearTimeout(entry.timer);
                    resolve(value);
                },
                reject: (error: Error) => {
                    if (entry.timer) clearTimeout(entry.timer);
                    reject(error);
                },
            };

            if (timeoutMs !== undefined && timeoutMs !== Infinity) {
                entry.timer = setTimeout(() => {
                    // Already fulfilled or swept: that outcome stands.
                    if (!this.remove(entry)) return;
                    onTimeout?.(timeoutMs);
                    reject(new QueueTimeoutError(timeoutMs, operation));
                }, timeoutMs);
            }

            this.entries.push(entry);
        });
    }

    shift(): PendingHandle<P, V> | undefined {
        return this.entries.shift();
    }

    rejectAll(error: Error): number {
        const swept = this.entries;
        this.entries = [];
        for (const entry of swept) {
            entry.reject(error);
        }
        return swept.length;
    }

    get size(): number {
        return this.entries.length;
    }

    get isEmpty(): boolean {
        return this.entries.length === 0;
    }

    private remove(entry: Entry<P, V>): boolean {
        const idx = this.entries.indexOf(entry);
        if (idx < 0) return false;
        this.entries.splice(idx, 1);
        return true;
    }
}
