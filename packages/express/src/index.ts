export {
  createExpressHttpContext,
  toExpressErrorMarker,
  toExpressGuard,
  toExpressMiddleware,
  type CookieStateExpressAdapterOptions,
  type CookieStateExpressErrorHandler,
  type CookieStateExpressHandler,
  type CookieStateExpressNext,
  type CookieStateExpressRequest,
  type CookieStateExpressResponse,
} from "./ExpressAdapter";
