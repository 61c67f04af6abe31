import { deflateRawSync, inflateRawSync } from "node:zlib";
import { SignedCookieError } from "../errors";
import type { JsonValue } from "../types";

export type JsonSerializerOptions = {
    compress?: boolean; // default true
};

// JSON text never starts with a NUL byte.
const COMPRESSED_MARKER = 0x00;
const MAX_INFLATED_BYTES = 64 * 1024;

const utf8 = new TextDecoder("utf-8", { fatal: true });

/**
 * Canonical JSON encoding for signed payloads.
 *
 * Object keys are written in sorted order and no whitespace is emitted, so
 * equal values always produce identical bytes. Negative zero is written as
 * `0`, as JSON has no way to carry it.
 */
export class JsonSerializer {
    private readonly compress: boolean;

    constructor(options: JsonSerializerOptions = {}) {
        this.compress = options.compress ?? true;
    }

    dumps(value: JsonValue): Buffer {
        const raw = Buffer.from(writeJson(value, new Set(), "$"), "utf8");
        if (!this.compress) {
            return raw;
        }

        const deflated = deflateRawSync(raw);
        if (deflated.length + 1 >= raw.length) {
            return raw;
        }
        return Buffer.concat([Buffer.of(COMPRESSED_MARKER), deflated]);
    }

    loads(bytes: Uint8Array): JsonValue {
        let raw = Buffer.from(bytes);
        if (raw[0] === COMPRESSED_MARKER) {
            try {
                raw = inflateRawSync(raw.subarray(1), { maxOutputLength: MAX_INFLATED_BYTES });
            } catch (e) {
                throw new SignedCookieError("DESERIALIZATION_ERROR", "Payload could not be decompressed.", e);
            }
        }

        try {
            const parsed: JsonValue = JSON.parse(utf8.decode(raw));
            return parsed;
        } catch (e) {
            throw new SignedCookieError("DESERIALIZATION_ERROR", "Payload is not valid JSON.", e);
        }
    }
}

function writeJson(value: unknown, seen: Set<object>, path: string): string {
    if (value === null) return "null";
    if (typeof value === "string" || typeof value === "boolean") {
        return JSON.stringify(value);
    }
    if (typeof value === "number") {
        if (!Number.isFinite(value)) {
            throw unsupported(path, "non-finite number");
        }
        return JSON.stringify(value);
    }
    if (typeof value !== "object") {
        throw unsupported(path, typeof value);
    }

    if (seen.has(value)) {
        throw unsupported(path, "circular reference");
    }
    seen.add(value);

    let out: string;
    if (Array.isArray(value)) {
        const items: string[] = [];
        for (let i = 0; i < value.length; i++) {
            items.push(writeJson(value[i], seen, `${path}[${i}]`));
        }
        out = `[${items.join(",")}]`;
    } else if (isPlainObject(value)) {
        const entries = Object.keys(value)
            .sort()
            .map((key) => `${JSON.stringify(key)}:${writeJson(value[key], seen, `${path}.${key}`)}`);
        out = `{${entries.join(",")}}`;
    } else {
        throw unsupported(path, "non-plain object");
    }

    seen.delete(value);
    return out;
}

function isPlainObject(value: object): value is Record<string, unknown> {
    const proto: unknown = Object.getPrototypeOf(value);
    return proto === Object.prototype || proto === null;
}

function unsupported(path: string, kind: string): SignedCookieError {
    return new SignedCookieError("INVALID_VALUE", `Unsupported value at ${path}: ${kind}.`, undefined, { path });
}
