import type { CookieData } from "./CookieData";

/**
 * Request-scoped map from state attribute name to {@link CookieData}.
 */
export class RequestState {
    private readonly entries = new Map<string, CookieData<unknown>>();
    private failedFlag = false;

    /**
     * True once the request has been marked as failed. Signed cookie
     * middlewares write nothing back for a failed request.
     */
    get failed(): boolean {
        return this.failedFlag;
    }

    markFailed(): void {
        this.failedFlag = true;
    }

    set<T>(name: string, data: CookieData<T>): void {
        this.entries.set(name, data);
    }

    get<T>(name: string): CookieData<T> | null {
        // Each name is written by exactly one middleware with a fixed value type.
        return (this.entries.get(name) as CookieData<T> | undefined) ?? null;
    }

    has(name: string): boolean {
        return this.entries.has(name);
    }
}
