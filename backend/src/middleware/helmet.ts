import helmet from "helmet";
import { getEnv } from "../config/env.js";

// JSON-only API: nothing it serves is meant to be framed, embedded or loaded by other sites.
export function createHelmet() {
  const env = getEnv();

  return helmet({
    contentSecurityPolicy: {
      useDefaults: false,
      directives: {
        defaultSrc: ["'none'"],
        frameAncestors: ["'none'"],
        baseUri: ["'none'"],
        formAction: ["'none'"],
      },
    },
    crossOriginResourcePolicy: { policy: env.CORS_ORIGIN === "*" ? "cross-origin" : "same-site" },
    referrerPolicy: { policy: "no-referrer" },
    hsts: env.NODE_ENV === "production" ? {
      maxAge: 31536000,
      includeSubDomains: true,
      preload: true,
    } : false,
  });
}
