export const sleep = (ms: number) => new Promise(resolve => setTimeout(resolve, ms));

/** One turn of the event loop: deferred event delivery and launches have run. */
export const nextTurn = () => new Promise<void>(resolve => setImmediate(resolve));

export async function waitUntil(
    predicate: () => Promise<boolean> | boolean,
    timeoutMs = 2000,
    intervalMs = 10
): Promise<void> {
    const start = Date.now();
    while (Date.now() - start < timeoutMs) {
        if (await predicate()) return;
        await sleep(intervalMs);
    }
    throw new Error(`waitUntil timed out after ${timeoutMs}ms`);
}
