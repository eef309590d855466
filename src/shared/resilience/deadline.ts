/**
 * @fileoverview Call deadlines
 *
 * Every store call goes through {@link withDeadline} so that a stalled driver
 * surfaces as an error instead of a hang.
 */

export interface CallOptions {
    /** Upper bound for the call, in milliseconds. */
    deadlineMs: number;
}

const lateSettlements = new WeakMap<Error, Promise<void>>();

/**
 * Settles with `operation`, or rejects with `onTimeout()` once `deadlineMs`
 * elapses first. The underlying operation is not cancelled: a write may still
 * land after the deadline. {@link settlementOf} gives the caller a handle on
 * that late outcome so it can compensate once it is known.
 */
export async function withDeadline<T>(
    operation: Promise<T>,
    deadlineMs: number,
    onTimeout: () => Error,
): Promise<T> {
    let timer: NodeJS.Timeout | undefined;

    const expiry = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
            const error = onTimeout();
            lateSettlements.set(
                error,
                operation.then(
                    () => undefined,
                    () => undefined,
                ),
            );
            reject(error);
        }, deadlineMs);
    });

    try {
        return await Promise.race([operation, expiry]);
    } finally {
        clearTimeout(timer);
    }
}

/**
 * For an error raised by an expired {@link withDeadline}, resolves once the
 * abandoned operation has finished, whether it succeeded or not. `undefined`
 * for any other error.
 */
export function settlementOf(error: unknown): Promise<void> | undefined {
    return error instanceof Error ? lateSettlements.get(error) : undefined;
}
