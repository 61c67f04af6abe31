import type {
    JsonValue,
    SerializedSignedCookieOptions,
    SignedCookieOptions,
    SimpleSignedCookieOptions,
} from "./types";
import type { HttpContext, HttpMiddleware } from "./http/HttpContext";
import {
    isValidCookieName,
    SerializedCookieCodec,
    SimpleCookieCodec,
    type CookieCodec,
} from "./cookie/CookieCodec";
import { CookieData } from "./state/CookieData";
import { TimestampSigner } from "./signer/TimestampSigner";
import { JsonSerializer } from "./serializer/JsonSerializer";
import { SignedCookieError } from "./errors";

export type CookieVariant = "simple" | "serialized";

function alwaysWrite(): boolean {
    return true;
}

function validateOptions(
    opts: Pick<SignedCookieOptions<unknown>, "stateAttributeName" | "cookieName" | "cookieTtlSeconds">
): void {
    if (!opts.stateAttributeName) {
        throw new SignedCookieError("INVALID_CONFIG", "State attribute name must not be empty.");
    }
    if (!isValidCookieName(opts.cookieName)) {
        throw new SignedCookieError("INVALID_CONFIG", `Invalid cookie name: ${opts.cookieName}`);
    }
    const ttl = opts.cookieTtlSeconds;
    if (ttl !== null && (!Number.isInteger(ttl) || ttl <= 0)) {
        throw new SignedCookieError("INVALID_CONFIG", "Cookie TTL must be a positive integer of seconds or null.", undefined, {
            cookieTtlSeconds: ttl,
        });
    }
}

/**
 * Builds the signer for one middleware instance. The key is personalised by
 * variant and cookie name so tokens never verify across cookies.
 */
export function createSigner(
    variant: CookieVariant,
    opts: Pick<SignedCookieOptions<unknown>, "secret" | "cookieName" | "signer">
): TimestampSigner {
    const personalisation = `${variant}:${opts.cookieName}${opts.signer?.personalisation ?? ""}`;
    return new TimestampSigner(opts.secret, { ...opts.signer, personalisation });
}

/**
 * Reads a signed cookie into request state before downstream handlers run and
 * writes the handlers' value back afterwards.
 */
export class SignedCookieMiddleware<TValue> {
    private readonly shouldWrite: (previous: TValue | null, next: TValue) => boolean;

    constructor(
        private readonly opts: SignedCookieOptions<TValue>,
        private readonly codec: CookieCodec<TValue>
    ) {
        validateOptions(opts);
        this.shouldWrite = opts.shouldWrite ?? alwaysWrite;
    }

    middleware(): HttpMiddleware {
        return async (ctx, next) => {
            this.onRequest(ctx);
            await next();
            this.onResponse(ctx);
        };
    }

    onRequest(ctx: HttpContext): void {
        const data = this.codec.decode(this.opts.cookieName, ctx.getCookie(this.opts.cookieName));
        if (data.error) {
            this.opts.logger?.debug("Signed cookie rejected.", {
                cookieName: this.opts.cookieName,
                code: data.error.code,
            });
        }
        ctx.state.set(this.opts.stateAttributeName, data);
    }

    onResponse(ctx: HttpContext): void {
        if (ctx.state.failed) return;

        const data = ctx.state.get<TValue>(this.opts.stateAttributeName);
        if (!data || data.value === null) return;
        if (!this.shouldWrite(data.previous, data.value)) return;

        const cookie = this.codec.encode(this.opts.cookieName, data.value);
        if (cookie) {
            ctx.setCookie(cookie.name, cookie.value, cookie.options);
        }
    }

    /**
     * Returns this middleware's state for the request, or an empty holder when
     * the middleware has not run for it.
     */
    getCookieData(ctx: HttpContext): CookieData<TValue> {
        const found = ctx.state.get<TValue>(this.opts.stateAttributeName);
        if (found) return found;

        const empty = CookieData.empty<TValue>();
        ctx.state.set(this.opts.stateAttributeName, empty);
        return empty;
    }

    /**
     * Rejects requests whose cookie was present but failed verification.
     * Adapters turn the thrown error into a JSON error response.
     */
    requireValidCookie(): HttpMiddleware {
        return async (ctx, next) => {
            const error = this.getCookieData(ctx).error;
            if (error) {
                throw new SignedCookieError(error.code, error.message, error);
            }
            await next();
        };
    }
}

/**
 * Middleware signing a plain string into the cookie.
 */
export function createSimpleSignedCookie(opts: SimpleSignedCookieOptions): SignedCookieMiddleware<string> {
    const codec = new SimpleCookieCodec(createSigner("simple", opts), {
        ttlSeconds: opts.cookieTtlSeconds,
        cookie: opts.cookie,
    });
    return new SignedCookieMiddleware(opts, codec);
}

/**
 * Middleware serializing a JSON tree into the cookie.
 */
export function createSerializedSignedCookie(opts: SerializedSignedCookieOptions): SignedCookieMiddleware<JsonValue> {
    const codec = new SerializedCookieCodec(createSigner("serialized", opts), {
        ttlSeconds: opts.cookieTtlSeconds,
        cookie: opts.cookie,
        serializer: new JsonSerializer(opts.serializer),
        payloadTransformer: opts.payloadTransformer,
    });
    return new SignedCookieMiddleware(opts, codec);
}
