import type { SerializeOptions } from "cookie";
import { isDecodeError, SignedCookieError } from "../errors";
import { JsonSerializer } from "../serializer/JsonSerializer";
import type { TimestampSigner } from "../signer/TimestampSigner";
import { CookieData } from "../state/CookieData";
import type { JsonValue } from "../types";

/**
 * Cookie transport attributes, passed through to the Set-Cookie header.
 */
export type CookieOptions = {
    path?: string; // default "/"
    domain?: string;
    httpOnly?: boolean; // default true
    secure?: boolean; // default false
    sameSite?: "lax" | "strict" | "none"; // default "lax"
};

/**
 * A cookie ready to be written by an adapter.
 */
export type SetCookie = {
    name: string;
    value: string;
    options: CookieOptions & { maxAgeSeconds?: number };
};

/**
 * Shared contract of the simple and serialized cookie variants.
 */
export interface CookieCodec<T> {
    encode(name: string, value: T | null): SetCookie | null;
    decode(name: string, raw: string | null | undefined): CookieData<T>;
}

export type SignedCookieCodecOptions = {
    ttlSeconds: number | null;
    cookie?: CookieOptions;
};

function isTokenChar(ch: string): boolean {
    return /^[A-Za-z0-9!#$%&'*+\-.^_`|~]$/.test(ch);
}

/**
 * Checks a cookie name against the RFC 6265 token grammar.
 */
export function isValidCookieName(name: string): boolean {
    if (!name) return false;
    for (const ch of name) {
        if (!isTokenChar(ch)) return false;
    }
    return true;
}

/**
 * Maps {@link CookieOptions} onto the `cookie` package's serialize options,
 * applying the defaults.
 */
export function toSerializeOptions(options: CookieOptions & { maxAgeSeconds?: number }): SerializeOptions {
    const out: SerializeOptions = {
        path: options.path ?? "/",
        httpOnly: options.httpOnly ?? true,
        secure: options.secure ?? false,
        sameSite: options.sameSite ?? "lax",
    };
    if (options.domain !== undefined) out.domain = options.domain;
    if (options.maxAgeSeconds !== undefined) out.maxAge = Math.max(0, Math.floor(options.maxAgeSeconds));
    return out;
}

/**
 * Signs and verifies cookie values; subclasses supply the payload transform.
 *
 * A missing or empty cookie decodes to an empty {@link CookieData} without
 * touching the signer. Verification and payload failures are captured on
 * {@link CookieData.error}; anything else propagates.
 */
export abstract class SignedCookieCodec<T> implements CookieCodec<T> {
    constructor(
        protected readonly signer: TimestampSigner,
        private readonly options: SignedCookieCodecOptions
    ) {}

    protected abstract toPayload(value: T): Uint8Array;

    protected abstract fromPayload(payload: Buffer): T;

    encode(name: string, value: T | null): SetCookie | null {
        if (value === null) return null;

        const token = this.signer.sign(this.toPayload(value));
        const ttl = this.options.ttlSeconds;
        return {
            name,
            value: token,
            options: ttl === null ? { ...this.options.cookie } : { ...this.options.cookie, maxAgeSeconds: ttl },
        };
    }

    decode(_name: string, raw: string | null | undefined): CookieData<T> {
        if (!raw) return CookieData.empty();

        try {
            const payload = this.signer.unsign(raw, this.options.ttlSeconds);
            return CookieData.of(this.fromPayload(payload));
        } catch (e) {
            if (isDecodeError(e)) return CookieData.failed(e);
            throw e;
        }
    }
}

const utf8 = new TextDecoder("utf-8", { fatal: true });

/**
 * Signs a plain string. No structural serialization.
 */
export class SimpleCookieCodec extends SignedCookieCodec<string> {
    protected toPayload(value: string): Uint8Array {
        if (typeof value !== "string") {
            throw new SignedCookieError("INVALID_VALUE", `Simple cookies hold strings, got ${typeof value}.`);
        }
        return Buffer.from(value, "utf8");
    }

    protected fromPayload(payload: Buffer): string {
        try {
            return utf8.decode(payload);
        } catch (e) {
            throw new SignedCookieError("DESERIALIZATION_ERROR", "Payload is not valid UTF-8.", e);
        }
    }
}

export type SerializedCookieCodecOptions = SignedCookieCodecOptions & {
    serializer?: JsonSerializer;
    payloadTransformer?: (raw: JsonValue) => JsonValue;
};

/**
 * Signs a JSON tree, serialized canonically (and compressed when it helps).
 */
export class SerializedCookieCodec extends SignedCookieCodec<JsonValue> {
    private readonly serializer: JsonSerializer;
    private readonly payloadTransformer: ((raw: JsonValue) => JsonValue) | undefined;

    constructor(signer: TimestampSigner, options: SerializedCookieCodecOptions) {
        super(signer, options);
        this.serializer = options.serializer ?? new JsonSerializer();
        this.payloadTransformer = options.payloadTransformer;
    }

    protected toPayload(value: JsonValue): Uint8Array {
        return this.serializer.dumps(value);
    }

    protected fromPayload(payload: Buffer): JsonValue {
        const raw = this.serializer.loads(payload);
        if (!this.payloadTransformer) return raw;

        try {
            return this.payloadTransformer(raw);
        } catch (e) {
            throw new SignedCookieError("DESERIALIZATION_ERROR", "Payload was rejected by the transformer.", e);
        }
    }
}
