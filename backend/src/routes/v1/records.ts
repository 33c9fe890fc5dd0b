import { Router } from "express";
import { z } from "zod";
import { buildAnalytics } from "../../analytics/drinkAnalytics.js";
import type { BlobRunResult } from "../../etl/types.js";
import { AppError, asyncHandler } from "../../middleware/error.js";
import type { EtlServices } from "../../services/etlServices.js";

const blobNameSchema = z
  .string()
  .min(1)
  .max(200)
  .regex(/^[A-Za-z0-9][A-Za-z0-9._-]*$/, "Blob name may only contain letters, digits, '.', '_' and '-'");

// Requests do not wait out the trigger's retry delays; the CLI trigger keeps them.
const HTTP_FIRE_OPTIONS = { maxAttempts: 1 } as const;

const listQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(50),
  offset: z.coerce.number().int().min(0).default(0),
});

export function createRecordsRouter(services: EtlServices): Router {
  const router = Router();
  const { pipeline, trigger, store, blobs, schema } = services;

  router.post(
    "/process",
    asyncHandler(async (req, res) => {
      const summary = await pipeline.processDirect(req.body);
      res.json(summary);
    })
  );

  router.put(
    "/blobs/raw/:name",
    asyncHandler(async (req, res) => {
      const name = blobNameSchema.parse(req.params.name);
      if (typeof req.body !== "string") {
        throw new AppError("Expected an NDJSON text body", 415, "unsupported_media_type");
      }

      await blobs.write(trigger.rawContainer, name, req.body, "application/x-ndjson");
      const result = await trigger.fire(name, HTTP_FIRE_OPTIONS);
      res.json(toRunResponse(result));
    })
  );

  router.post(
    "/blobs/raw/:name/process",
    asyncHandler(async (req, res) => {
      const name = blobNameSchema.parse(req.params.name);
      const result = await trigger.fire(name, HTTP_FIRE_OPTIONS);
      res.json(toRunResponse(result));
    })
  );

  router.get(
    "/records",
    asyncHandler(async (req, res) => {
      const query = listQuerySchema.parse(req.query);
      const [items, total] = await Promise.all([store.list(query), store.count()]);
      res.json({ items, total, limit: query.limit, offset: query.offset });
    })
  );

  router.get(
    "/records/:id",
    asyncHandler(async (req, res) => {
      const document = await store.get(req.params.id);
      if (!document) {
        throw new AppError(`Record ${req.params.id} was not found`, 404, "record_not_found");
      }
      res.json(document);
    })
  );

  router.get(
    "/analytics",
    asyncHandler(async (_req, res) => {
      const docs = await store.all();
      res.json(buildAnalytics(docs, schema));
    })
  );

  return router;
}

function toRunResponse(result: BlobRunResult) {
  const { batch } = result;
  return {
    status: "success",
    blob: result.blobName,
    mirror: result.mirrorBlobName,
    total: batch.total,
    valid: batch.valid,
    stored: batch.stored,
    failed: batch.failed,
    skipped: batch.skipped,
  };
}
