import {
  defaultErrorBody,
  isSignedCookieError,
  RequestState,
  statusFromErrorCode,
  toSerializeOptions,
  type HttpContext,
  type HttpMiddleware,
  type SignedCookieError,
  type SignedCookieMiddleware,
} from "@cookiestate/core";
import { parse as parseCookie, serialize as serializeCookie } from "cookie";

export type CookieStateExpressRequest = {
  headers: Record<string, string | string[] | undefined>;
  cookieState?: RequestState;
};

export type CookieStateExpressResponse = {
  status(code: number): unknown;
  json(body: unknown): unknown;
  getHeader(name: string): unknown;
  setHeader(name: string, value: unknown): unknown;
  writeHead(statusCode: number, ...rest: unknown[]): unknown;
};

export type CookieStateExpressNext = (error?: unknown) => void;
export type CookieStateExpressHandler = (
  req: CookieStateExpressRequest,
  res: CookieStateExpressResponse,
  next: CookieStateExpressNext,
) => Promise<void>;

export type CookieStateExpressErrorHandler = (
  error: unknown,
  req: CookieStateExpressRequest,
  res: CookieStateExpressResponse,
  next: CookieStateExpressNext,
) => void;

export type CookieStateExpressAdapterOptions = {
  onError?: (
    error: SignedCookieError,
    req: CookieStateExpressRequest,
    res: CookieStateExpressResponse,
  ) => Promise<void> | void;
};

export function createExpressHttpContext(req: CookieStateExpressRequest, res: CookieStateExpressResponse): HttpContext {
  const state = req.cookieState ?? new RequestState();
  req.cookieState = state;

  return {
    state,

    getCookie(name: string): string | null {
      const header = req.headers.cookie;
      if (!header) {
        return null;
      }

      const parsed = parseCookie(Array.isArray(header) ? header.join("; ") : header);
      return parsed[name] ?? null;
    },

    setCookie(name, value, options) {
      appendSetCookie(res, serializeCookie(name, value, toSerializeOptions(options)));
    },
  };
}

/**
 * Mounts a signed cookie on an Express app.
 *
 * Express handlers finish by writing the response rather than by returning,
 * so write-back runs right before headers are flushed. Responses with a 5xx
 * status, and requests marked by {@link toExpressErrorMarker}, are treated as
 * failed and keep the client's cookie.
 */
export function toExpressMiddleware<TValue>(cookie: SignedCookieMiddleware<TValue>): CookieStateExpressHandler {
  return async (req, res, next) => {
    const ctx = createExpressHttpContext(req, res);

    try {
      cookie.onRequest(ctx);
    } catch (error) {
      next(error);
      return;
    }

    onBeforeHeaders(res, (statusCode) => {
      if (statusCode < 500) {
        cookie.onResponse(ctx);
      }
    });
    next();
  };
}

/**
 * Error middleware that marks the request as failed before passing the error
 * on, so no signed cookie is written with the error response. Mount it after
 * the routes and before the app's own error handlers.
 */
export function toExpressErrorMarker(): CookieStateExpressErrorHandler {
  return (error, req, _res, next) => {
    req.cookieState?.markFailed();
    next(error);
  };
}

/**
 * Wraps a guard such as `requireValidCookie()`, mapping its errors to JSON.
 */
export function toExpressGuard(
  middleware: HttpMiddleware,
  options?: CookieStateExpressAdapterOptions,
): CookieStateExpressHandler {
  return async (req, res, next) => {
    const ctx = createExpressHttpContext(req, res);

    try {
      await middleware(ctx, async () => {
        next();
      });
    } catch (error) {
      if (isSignedCookieError(error)) {
        if (options?.onError) {
          await options.onError(error, req, res);
          return;
        }

        res.status(statusFromErrorCode(error.code));
        res.json(defaultErrorBody(error.code, error.message));
        return;
      }

      next(error);
    }
  };
}

function onBeforeHeaders(res: CookieStateExpressResponse, listener: (statusCode: number) => void): void {
  const writeHead = res.writeHead;
  let fired = false;

  res.writeHead = (statusCode: number, ...rest: unknown[]): unknown => {
    if (!fired) {
      fired = true;
      listener(statusCode);
    }
    return writeHead.call(res, statusCode, ...rest);
  };
}

function appendSetCookie(res: CookieStateExpressResponse, value: string): void {
  const prev = res.getHeader("Set-Cookie");

  if (!prev) {
    res.setHeader("Set-Cookie", value);
    return;
  }

  const list = Array.isArray(prev) ? prev.map(String) : [String(prev)];
  list.push(value);
  res.setHeader("Set-Cookie", list);
}
