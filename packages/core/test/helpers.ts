import { isSignedCookieError } from "../src";

export const SECRET = "secret".repeat(3);

/**
 * Runs `fn` and returns the code of the SignedCookieError it throws, or null.
 */
export function errorCodeOf(fn: () => unknown): string | null {
    try {
        fn();
        return null;
    } catch (e) {
        return isSignedCookieError(e) ? e.code : "NOT_A_SIGNED_COOKIE_ERROR";
    }
}

/**
 * A settable clock in epoch milliseconds.
 */
export function createClock(startMs: number): { now: () => number; advanceSeconds: (s: number) => void } {
    let current = startMs;
    return {
        now: () => current,
        advanceSeconds(s: number): void {
            current += s * 1000;
        },
    };
}
