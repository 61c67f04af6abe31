import type { CookieOptions } from "./cookie/CookieCodec";
import type { SignerOptions } from "./signer/TimestampSigner";
import type { JsonSerializerOptions } from "./serializer/JsonSerializer";
import type { Logger } from "./errors";

/**
 * Values the serialized variant can carry.
 */
export type JsonValue =
    | string
    | number
    | boolean
    | null
    | JsonValue[]
    | { [key: string]: JsonValue };

/**
 * Root configuration for a {@link SignedCookieMiddleware}.
 */
export type SignedCookieOptions<TValue> = {
    secret: string | Uint8Array;

    stateAttributeName: string;

    cookieName: string;

    cookieTtlSeconds: number | null; // null -> no expiry, browser-session cookie

    cookie?: CookieOptions;

    signer?: SignerOptions;

    shouldWrite?: (previous: TValue | null, next: TValue) => boolean;

    logger?: Logger;
};

export type SimpleSignedCookieOptions = SignedCookieOptions<string>;

export type SerializedSignedCookieOptions = SignedCookieOptions<JsonValue> & {
    serializer?: JsonSerializerOptions;

    // Migrates or validates a decoded payload; throwing rejects the cookie.
    payloadTransformer?: (raw: JsonValue) => JsonValue;
};
