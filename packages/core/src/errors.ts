/**
 * Error codes produced while reading a signed cookie. These never escape the
 * middleware; they are surfaced on {@link CookieData.error}.
 */
export type DecodeErrorCode =
    | "INVALID_TOKEN"
    | "INVALID_SIGNATURE"
    | "EXPIRED_SIGNATURE"
    | "DESERIALIZATION_ERROR";

/**
 * Stable error codes surfaced by cookiestate core and adapters.
 */
export type ErrorCode =
    | DecodeErrorCode
    | "INVALID_CONFIG"
    | "INVALID_VALUE"
    | "INTERNAL_ERROR";

const DECODE_ERROR_CODES: ReadonlySet<ErrorCode> = new Set<ErrorCode>([
    "INVALID_TOKEN",
    "INVALID_SIGNATURE",
    "EXPIRED_SIGNATURE",
    "DESERIALIZATION_ERROR",
]);

/**
 * Canonical error type used across cookiestate packages.
 */
export class SignedCookieError extends Error {
    readonly details: Record<string, unknown> | undefined;

    constructor(
        public readonly code: ErrorCode,
        message: string,
        public override readonly cause?: unknown,
        details?: Record<string, unknown>
    ) {
        super(message);
        this.name = "SignedCookieError";
        this.details = details;
    }
}

/**
 * A {@link SignedCookieError} raised while verifying or decoding a cookie.
 */
export type DecodeError = SignedCookieError & { readonly code: DecodeErrorCode };

/**
 * JSON-safe error response shape used by adapters.
 */
export type ErrorBody = {
    error: {
        code: ErrorCode;
        message: string;
    };
};

/**
 * Logger contract used by cookiestate core for optional diagnostics.
 */
export type Logger = {
    debug(msg: string, meta?: unknown): void;
    info(msg: string, meta?: unknown): void;
    warn(msg: string, meta?: unknown): void;
    error(msg: string, meta?: unknown): void;
};

/**
 * Creates a normalized error response body.
 */
export function defaultErrorBody(code: ErrorCode, message: string): ErrorBody {
    return { error: { code, message } };
}

/**
 * Type guard for {@link SignedCookieError}.
 */
export function isSignedCookieError(error: unknown): error is SignedCookieError {
    return error instanceof SignedCookieError;
}

/**
 * Type guard for the recoverable errors of a cookie read.
 */
export function isDecodeError(error: unknown): error is DecodeError {
    return isSignedCookieError(error) && DECODE_ERROR_CODES.has(error.code);
}

export type ErrorStatus = 400 | 500;

/**
 * Maps {@link ErrorCode} to an HTTP status code.
 */
export function statusFromErrorCode(code: ErrorCode): ErrorStatus {
    switch (code) {
        case "INVALID_TOKEN":
        case "INVALID_SIGNATURE":
        case "EXPIRED_SIGNATURE":
        case "DESERIALIZATION_ERROR":
            return 400;
        case "INVALID_CONFIG":
        case "INVALID_VALUE":
        case "INTERNAL_ERROR":
        default:
            return 500;
    }
}
