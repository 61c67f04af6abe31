import { describe, expect, it, vi } from "vitest";
import {
    JsonSerializer,
    SerializedCookieCodec,
    SimpleCookieCodec,
    TimestampSigner,
    isValidCookieName,
    toSerializeOptions,
    type JsonValue,
} from "../src";
import { createClock, errorCodeOf, SECRET } from "./helpers";

function createSimple(ttlSeconds: number | null = 60) {
    const clock = createClock(1_700_000_000_000);
    const signer = new TimestampSigner(SECRET, { clock: clock.now });
    const codec = new SimpleCookieCodec(signer, { ttlSeconds, cookie: { domain: "example.test", sameSite: "strict" } });
    return { clock, signer, codec };
}

function createSerialized(payloadTransformer?: (raw: JsonValue) => JsonValue) {
    const clock = createClock(1_700_000_000_000);
    const signer = new TimestampSigner(SECRET, { clock: clock.now });
    const codec = new SerializedCookieCodec(signer, {
        ttlSeconds: 60,
        serializer: new JsonSerializer({ compress: false }),
        payloadTransformer,
    });
    return { clock, signer, codec };
}

describe("SimpleCookieCodec", () => {
    it("round trips a string within the TTL", () => {
        const { codec } = createSimple();
        const cookie = codec.encode("flash", "hello");

        expect(cookie?.name).toBe("flash");
        const data = codec.decode("flash", cookie?.value);
        expect(data.value).toBe("hello");
        expect(data.error).toBeNull();
    });

    it("emits nothing for a null value", () => {
        const { codec, signer } = createSimple();
        const sign = vi.spyOn(signer, "sign");

        expect(codec.encode("flash", null)).toBeNull();
        expect(sign).not.toHaveBeenCalled();
    });

    it("emits a cookie for an empty string", () => {
        const { codec } = createSimple();
        const cookie = codec.encode("flash", "");

        expect(cookie).not.toBeNull();
        expect(codec.decode("flash", cookie?.value).value).toBe("");
    });

    it("passes transport attributes through and derives max-age from the TTL", () => {
        const { codec } = createSimple();

        expect(codec.encode("flash", "x")?.options).toEqual({
            domain: "example.test",
            sameSite: "strict",
            maxAgeSeconds: 60,
        });
    });

    it("omits max-age without a TTL", () => {
        const { codec } = createSimple(null);
        expect(codec.encode("flash", "x")?.options).toEqual({ domain: "example.test", sameSite: "strict" });
    });

    it("does not call the signer for a missing or empty cookie", () => {
        const { codec, signer } = createSimple();
        const unsign = vi.spyOn(signer, "unsign");

        for (const raw of [null, undefined, ""]) {
            const data = codec.decode("flash", raw);
            expect(data.value).toBeNull();
            expect(data.error).toBeNull();
        }
        expect(unsign).not.toHaveBeenCalled();
    });

    it("captures verification failures on the result", () => {
        const { codec, clock } = createSimple();
        const token = codec.encode("flash", "hello")?.value ?? "";

        expect(codec.decode("flash", "garbage").error?.code).toBe("INVALID_TOKEN");
        expect(codec.decode("flash", `${token.slice(0, -1)}${token.endsWith("A") ? "B" : "A"}`).error?.code).toBe(
            "INVALID_SIGNATURE"
        );

        clock.advanceSeconds(61);
        const expired = codec.decode("flash", token);
        expect(expired.value).toBeNull();
        expect(expired.error?.code).toBe("EXPIRED_SIGNATURE");
    });

    it("rejects non-string values at encode time", () => {
        const { codec } = createSimple();
        // Runtime callers are not bound by the static type.
        const attempt = () => codec.encode("flash", 42 as unknown as string);
        expect(errorCodeOf(attempt)).toBe("INVALID_VALUE");
    });

    it("reports invalid UTF-8 as DESERIALIZATION_ERROR", () => {
        const { codec, signer } = createSimple();
        const token = signer.sign(Buffer.from([0xc3, 0x28]));

        expect(codec.decode("flash", token).error?.code).toBe("DESERIALIZATION_ERROR");
    });
});

describe("SerializedCookieCodec", () => {
    it("round trips structured values", () => {
        const { codec } = createSerialized();
        const value = { messages: ["saved", "sent"], count: 2, nested: { ok: true, none: null } };

        expect(codec.decode("state", codec.encode("state", value)?.value).value).toEqual(value);
    });

    it("produces identical tokens for equal values", () => {
        const { codec } = createSerialized();
        expect(codec.encode("state", { a: 1, b: 2 })?.value).toBe(codec.encode("state", { b: 2, a: 1 })?.value);
    });

    it("carries base64url canonical JSON in the payload segment", () => {
        const { codec } = createSerialized();
        const token = codec.encode("state", { extra: "data" })?.value ?? "";

        expect(token.split(".")[0]).toBe("eyJleHRyYSI6ImRhdGEifQ");
    });

    it("reports signed garbage as DESERIALIZATION_ERROR", () => {
        const { codec, signer } = createSerialized();
        const data = codec.decode("state", signer.sign(Buffer.from("{not json")));

        expect(data.value).toBeNull();
        expect(data.error?.code).toBe("DESERIALIZATION_ERROR");
    });

    it("applies the payload transformer and rejects on throw", () => {
        const { codec } = createSerialized((raw) => {
            if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
                throw new Error("expected an object");
            }
            return { ...raw, migrated: true };
        });

        expect(codec.decode("state", codec.encode("state", { v: 1 })?.value).value).toEqual({ v: 1, migrated: true });
        expect(codec.decode("state", codec.encode("state", "text")?.value).error?.code).toBe("DESERIALIZATION_ERROR");
    });

    it("rejects unsupported values at encode time", () => {
        const { codec } = createSerialized();
        const attempt = () => codec.encode("state", { when: new Date(0) } as unknown as JsonValue);
        expect(errorCodeOf(attempt)).toBe("INVALID_VALUE");
    });

    it("propagates errors that are not decode failures", () => {
        const { codec, signer } = createSerialized();
        vi.spyOn(signer, "unsign").mockImplementation(() => {
            throw new Error("boom");
        });

        expect(() => codec.decode("state", "anything")).toThrow("boom");
    });
});

describe("cookie helpers", () => {
    it("validates cookie names", () => {
        expect(isValidCookieName("my_cookie")).toBe(true);
        expect(isValidCookieName("")).toBe(false);
        expect(isValidCookieName("bad name")).toBe(false);
        expect(isValidCookieName("semi;colon")).toBe(false);
    });

    it("applies defaults when mapping to serialize options", () => {
        expect(toSerializeOptions({})).toEqual({ path: "/", httpOnly: true, secure: false, sameSite: "lax" });
        expect(toSerializeOptions({ domain: "example.test", httpOnly: false, maxAgeSeconds: 59.9 })).toEqual({
            path: "/",
            httpOnly: false,
            secure: false,
            sameSite: "lax",
            domain: "example.test",
            maxAge: 59,
        });
    });
});
