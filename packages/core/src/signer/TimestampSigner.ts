import { createHmac, hkdfSync, timingSafeEqual } from "node:crypto";
import { SignedCookieError } from "../errors";
import { fromBase64Url, toBase64Url } from "../utils/base64url";
import { msToSeconds, nowMs } from "../utils/time";

export type SignerDigest = "sha256" | "sha384" | "sha512";

/**
 * Extra options for {@link TimestampSigner}.
 */
export type SignerOptions = {
    digest?: SignerDigest; // default "sha256"
    digestSize?: number; // bytes, default 16
    personalisation?: string; // key derivation salt
    clock?: () => number; // epoch milliseconds
};

export const MIN_SECRET_SIZE = 16;
export const MIN_DIGEST_SIZE = 16;

export const TOKEN_SEPARATOR = ".";

// Largest creation time a 4-byte timestamp can carry.
const MAX_TIMESTAMP_SECONDS = 0xffffffff;

const SIGNER_DIGESTS: readonly SignerDigest[] = ["sha256", "sha384", "sha512"];

const DIGEST_LENGTHS: Record<SignerDigest, number> = {
    sha256: 32,
    sha384: 48,
    sha512: 64,
};

const TIMESTAMP_SIZE = 4;
const KEY_INFO = "cookiestate-signer";

type TokenParts = {
    payload: string;
    timestamp: string;
    signature: string;
};

/**
 * HMAC signer producing `<payload>.<timestamp>.<signature>` tokens.
 *
 * Every segment is base64url. The signature covers the encoded payload and
 * timestamp text, so changing any character of the token invalidates it.
 * The signing key is derived once per instance with HKDF, salted with the
 * personalisation string.
 */
export class TimestampSigner {
    private readonly key: Buffer;
    private readonly digest: SignerDigest;
    private readonly digestSize: number;
    private readonly clock: () => number;

    constructor(secret: string | Uint8Array, options: SignerOptions = {}) {
        const secretBytes = typeof secret === "string" ? Buffer.from(secret, "utf8") : Buffer.from(secret);
        if (secretBytes.length < MIN_SECRET_SIZE) {
            throw new SignedCookieError(
                "INVALID_CONFIG",
                `Secret must be at least ${MIN_SECRET_SIZE} bytes long.`
            );
        }

        const digest = options.digest ?? "sha256";
        if (!SIGNER_DIGESTS.includes(digest)) {
            throw new SignedCookieError("INVALID_CONFIG", `Unsupported digest: ${String(digest)}`);
        }

        const fullSize = DIGEST_LENGTHS[digest];
        const digestSize = options.digestSize ?? MIN_DIGEST_SIZE;
        if (!Number.isInteger(digestSize) || digestSize < MIN_DIGEST_SIZE || digestSize > fullSize) {
            throw new SignedCookieError(
                "INVALID_CONFIG",
                `Digest size must be an integer between ${MIN_DIGEST_SIZE} and ${fullSize}.`,
                undefined,
                { digest, digestSize }
            );
        }

        this.digest = digest;
        this.digestSize = digestSize;
        this.clock = options.clock ?? nowMs;
        this.key = Buffer.from(hkdfSync(digest, secretBytes, options.personalisation ?? "", KEY_INFO, fullSize));
    }

    sign(payload: Uint8Array): string {
        const head = toBase64Url(payload) + TOKEN_SEPARATOR + encodeTimestamp(msToSeconds(this.clock()));
        return head + TOKEN_SEPARATOR + this.signature(head);
    }

    /**
     * Verifies a token and returns its payload.
     *
     * @param maxAgeSeconds - maximum token age; `null` skips the expiry check
     * @throws {SignedCookieError} `INVALID_TOKEN`, `INVALID_SIGNATURE` or `EXPIRED_SIGNATURE`
     */
    unsign(token: string, maxAgeSeconds: number | null): Buffer {
        const parts = splitToken(token);
        if (!parts) {
            throw new SignedCookieError("INVALID_TOKEN", "Token must have three segments.");
        }

        const payload = fromBase64Url(parts.payload);
        const timestamp = fromBase64Url(parts.timestamp);
        const signature = fromBase64Url(parts.signature);
        if (!payload || !timestamp || timestamp.length !== TIMESTAMP_SIZE) {
            throw new SignedCookieError("INVALID_TOKEN", "Token payload or timestamp is malformed.");
        }
        if (!signature || signature.length !== this.digestSize) {
            throw new SignedCookieError("INVALID_TOKEN", "Token signature is malformed.");
        }

        const expected = Buffer.from(this.signature(parts.payload + TOKEN_SEPARATOR + parts.timestamp), "ascii");
        const given = Buffer.from(parts.signature, "ascii");
        if (expected.length !== given.length || !timingSafeEqual(expected, given)) {
            throw new SignedCookieError("INVALID_SIGNATURE", "Signature does not match.");
        }

        if (maxAgeSeconds !== null) {
            const age = msToSeconds(this.clock()) - timestamp.readUInt32BE(0);
            if (age > maxAgeSeconds) {
                throw new SignedCookieError("EXPIRED_SIGNATURE", "Signature has expired.", undefined, {
                    age,
                    maxAgeSeconds,
                });
            }
        }

        return payload;
    }

    private signature(head: string): string {
        const mac = createHmac(this.digest, this.key).update(head, "ascii").digest();
        return toBase64Url(mac.subarray(0, this.digestSize));
    }
}

function encodeTimestamp(seconds: number): string {
    if (!Number.isInteger(seconds) || seconds < 0 || seconds > MAX_TIMESTAMP_SECONDS) {
        throw new SignedCookieError("INTERNAL_ERROR", "Clock is outside the 32-bit timestamp range.", undefined, {
            seconds,
        });
    }
    const buf = Buffer.alloc(TIMESTAMP_SIZE);
    buf.writeUInt32BE(seconds, 0);
    return toBase64Url(buf);
}

function splitToken(token: string): TokenParts | null {
    const [payload, timestamp, signature, ...rest] = token.split(TOKEN_SEPARATOR);
    if (payload === undefined || !timestamp || !signature || rest.length > 0) {
        return null;
    }
    return { payload, timestamp, signature };
}
