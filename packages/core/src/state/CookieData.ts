import type { DecodeError } from "../errors";

/**
 * Per-request holder of a signed cookie's decoded value.
 *
 * A decode result carries either a value or an error, never both. Handlers
 * may replace {@link CookieData.value}; the error is informational and stays
 * as it was read.
 */
export class CookieData<T> {
    private current: T | null;

    private constructor(
        private readonly initial: T | null,
        private readonly decodeError: DecodeError | null
    ) {
        this.current = initial;
    }

    static empty<T>(): CookieData<T> {
        return new CookieData<T>(null, null);
    }

    static of<T>(value: T): CookieData<T> {
        return new CookieData<T>(value, null);
    }

    static failed<T>(error: DecodeError): CookieData<T> {
        return new CookieData<T>(null, error);
    }

    get value(): T | null {
        return this.current;
    }

    set value(next: T | null) {
        this.current = next;
    }

    get error(): DecodeError | null {
        return this.decodeError;
    }

    /**
     * The value as decoded from the inbound cookie, before any handler ran.
     */
    get previous(): T | null {
        return this.initial;
    }
}
