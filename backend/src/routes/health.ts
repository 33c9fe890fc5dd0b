import { Router } from "express";
import { getEnv } from "../config/env.js";

export const SERVICE_NAME = "drink-etl";

const router = Router();

router.get("/health", (_req, res) => {
  const env = getEnv();

  res.json({
    status: "healthy",
    service: SERVICE_NAME,
    timestamp: new Date().toISOString(),
    uptime: process.uptime(),
    environment: env.NODE_ENV,
    memory: {
      used: Math.round(process.memoryUsage().heapUsed / 1024 / 1024),
      total: Math.round(process.memoryUsage().heapTotal / 1024 / 1024),
    },
  });
});

router.get("/health/ready", (_req, res) => {
  res.json({
    ready: true,
    timestamp: new Date().toISOString(),
  });
});

router.get("/health/live", (_req, res) => {
  res.json({
    alive: true,
    timestamp: new Date().toISOString(),
  });
});

export default router;
