export * from "./types";
export * from "./errors";

export * from "./http/HttpContext";

export * from "./signer/TimestampSigner";
export * from "./serializer/JsonSerializer";
export * from "./cookie/CookieCodec";

export * from "./state/CookieData";
export * from "./state/RequestState";

export * from "./SignedCookie";
