export function nowMs(): number {
    return Date.now();
}

export function msToSeconds(ms: number): number {
    return Math.floor(ms / 1000);
}
