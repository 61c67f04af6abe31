export {
  COOKIESTATE_HONO_KEY,
  createHonoHttpContext,
  toHonoMiddleware,
  type CookieStateHonoAdapterOptions,
} from "./HonoAdapter";
