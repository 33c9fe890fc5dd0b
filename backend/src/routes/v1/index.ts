import { Router } from "express";
import type { EtlServices } from "../../services/etlServices.js";
import { createRecordsRouter } from "./records.js";

export function createV1Routes(services: EtlServices): Router {
  const router = Router();

  router.use("/", createRecordsRouter(services));

  return router;
}
