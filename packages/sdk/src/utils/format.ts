const pad = (n: number): string => String(n).padStart(2, '0');

/**
 * Formats a duration as `MM:SS`, or `HH:MM:SS` once it reaches one hour.
 * Sub-second remainders are truncated; hours are not wrapped at 24.
 */
export function formatDuration(ms: number): string {
    const totalSeconds = Math.floor(Math.max(0, ms) / 1000);
    const hours = Math.floor(totalSeconds / 3600);
    const minutes = Math.floor((totalSeconds % 3600) / 60);
    const seconds = totalSeconds % 60;

    if (hours >= 1) {
        return `${pad(hours)}:${pad(minutes)}:${pad(seconds)}`;
    }
    return `${pad(minutes)}:${pad(seconds)}`;
}

export function formatEta(ms: number | undefined): string {
    return ms === undefined ? '--:--' : formatDuration(ms);
}

export function formatCount(n: number): string {
    return n.toLocaleString('en-US', { maximumFractionDigits: 0 });
}

export function formatProgress(processed: number, total: number): string {
    return `${formatCount(processed)} / ${formatCount(total)}`;
}
