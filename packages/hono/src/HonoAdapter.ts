import {
  defaultErrorBody,
  isSignedCookieError,
  RequestState,
  statusFromErrorCode,
  toSerializeOptions,
  type HttpContext,
  type HttpMiddleware,
  type SignedCookieError,
} from "@cookiestate/core";
import type { Context, MiddlewareHandler } from "hono";
import { parse as parseCookie, serialize as serializeCookie } from "cookie";

/**
 * Context key holding the request's cookie state on a Hono context.
 */
export const COOKIESTATE_HONO_KEY = "cookieState";

/**
 * Adapter options for Hono integration.
 */
export type CookieStateHonoAdapterOptions = {
  onError?: (error: SignedCookieError, c: Context) => Promise<Response | void> | Response | void;
};

/**
 * Creates a framework-neutral `HttpContext` from Hono context.
 */
export function createHonoHttpContext(c: Context): HttpContext {
  const found: unknown = c.get(COOKIESTATE_HONO_KEY);
  const state = found instanceof RequestState ? found : new RequestState();
  if (state !== found) {
    c.set(COOKIESTATE_HONO_KEY, state);
  }

  return {
    state,

    getCookie(name: string): string | null {
      const raw = c.req.header("cookie");
      if (!raw) {
        return null;
      }

      const parsed = parseCookie(raw);
      return parsed[name] ?? null;
    },

    setCookie(name, value, options) {
      c.header("Set-Cookie", serializeCookie(name, value, toSerializeOptions(options)), { append: true });
    },
  };
}

/**
 * Converts core middleware into a Hono middleware handler.
 *
 * Hono turns handler exceptions into a response and records them on
 * `c.error`; such a request counts as failed, so nothing after `next()` in the
 * core middleware runs and the error response is left as Hono built it.
 */
export function toHonoMiddleware(
  middleware: HttpMiddleware,
  options?: CookieStateHonoAdapterOptions,
): MiddlewareHandler {
  return async (c, next) => {
    const ctx = createHonoHttpContext(c);

    try {
      await middleware(ctx, async () => {
        await next();
        if (c.error) {
          throw c.error;
        }
      });
    } catch (error) {
      if (c.error !== undefined && error === c.error) {
        return;
      }

      if (isSignedCookieError(error)) {
        if (options?.onError) {
          const handled = await options.onError(error, c);
          if (handled) {
            return handled;
          }
          if (c.finalized) {
            return;
          }
        }
        return c.json(defaultErrorBody(error.code, error.message), statusFromErrorCode(error.code));
      }
      throw error;
    }
  };
}
