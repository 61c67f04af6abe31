import type { CookieOptions } from "../cookie/CookieCodec";
import type { RequestState } from "../state/RequestState";

/**
 * Framework-neutral HTTP context required by cookiestate.
 */
export interface HttpContext {
    // Cookie I/O
    getCookie(name: string): string | null;
    setCookie(name: string, value: string, options: CookieOptions & { maxAgeSeconds?: number }): void;

    // Request-scoped cookie state, keyed by state attribute name
    readonly state: RequestState;
}

/**
 * Middleware function signature used by cookiestate core.
 */
export type HttpMiddleware = (ctx: HttpContext, next: () => Promise<void>) => Promise<void>;
