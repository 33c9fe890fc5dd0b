import express, { type Express } from "express";
import { getEnv } from "./config/env.js";
import { createCors } from "./middleware/cors.js";
import { errorHandler, notFoundHandler } from "./middleware/error.js";
import { createHelmet } from "./middleware/helmet.js";
import { createRateLimiter } from "./middleware/rateLimit.js";
import healthRoutes from "./routes/health.js";
import { createV1Routes } from "./routes/v1/index.js";
import type { EtlServices } from "./services/etlServices.js";
import { logger, logResponse } from "./utils/logger.js";

declare global {
  namespace Express {
    interface Request {
      requestTime?: number;
    }
  }
}

export function createApp(services: EtlServices): Express {
  const env = getEnv();
  const app = express();

  app.use(express.json({ limit: env.REQUEST_BODY_LIMIT }));
  app.use(express.text({ type: ["application/x-ndjson", "text/plain"], limit: env.REQUEST_BODY_LIMIT }));

  app.use(createHelmet());
  app.use(createCors());

  app.use((req, res, next) => {
    req.requestTime = Date.now();
    logger.debug({
      msg: "Incoming request",
      method: req.method,
      url: req.url,
      ip: req.ip,
    });
    const done = logResponse(req);
    res.on("finish", () => done(res.statusCode, Date.now() - (req.requestTime ?? Date.now())));
    next();
  });

  app.use(healthRoutes);
  app.use("/api/v1", createRateLimiter(), createV1Routes(services));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
