const BASE64URL_RE = /^[A-Za-z0-9_-]*$/;

/**
 * Encodes bytes as base64url (RFC 4648, no padding).
 */
export function toBase64Url(bytes: Uint8Array): string {
    return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString("base64url");
}

/**
 * Decodes a base64url string, or returns null when it is not one.
 *
 * Node's decoder silently skips foreign characters, so the alphabet and the
 * length are checked up front.
 */
export function fromBase64Url(encoded: string): Buffer | null {
    if (!BASE64URL_RE.test(encoded) || encoded.length % 4 === 1) {
        return null;
    }
    return Buffer.from(encoded, "base64url");
}
