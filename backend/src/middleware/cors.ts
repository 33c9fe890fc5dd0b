import cors from "cors";
import { getEnv } from "../config/env.js";

// Browsers hide the rate limiter's headers from cross-origin scripts unless listed here.
export const EXPOSED_HEADERS = [
  "RateLimit-Limit",
  "RateLimit-Remaining",
  "RateLimit-Reset",
  "RateLimit-Policy",
  "Retry-After",
];

export function createCors() {
  const env = getEnv();

  return cors({
    origin: parseOrigins(env.CORS_ORIGIN),
    methods: ["GET", "POST", "PUT", "OPTIONS"],
    allowedHeaders: ["Content-Type", "Authorization", "X-Request-ID"],
    exposedHeaders: EXPOSED_HEADERS,
    maxAge: 86400,
  });
}

/** `*` allows any origin; otherwise a comma-separated list of allowed origins. */
export function parseOrigins(value: string): string | string[] {
  const origins = value
    .split(",")
    .map((origin) => origin.trim())
    .filter(Boolean);
  if (origins.length === 0 || origins.includes("*")) return "*";
  return origins.length === 1 ? origins[0] ?? "*" : origins;
}
