import type { Env } from "../config/env.js";
import { BlobTrigger } from "../etl/blobTrigger.js";
import { RecordPipeline } from "../etl/pipeline.js";
import { resolveRecordSchema } from "../etl/schema.js";
import type { RecordSchema } from "../etl/types.js";
import { LocalBlobStore, S3BlobStore, type BlobStore } from "../storage/blobStore.js";
import { SqliteDocumentStore, type DocumentStore } from "../storage/documentStore.js";
import { createChildLogger } from "../utils/logger.js";

export type EtlServices = {
  schema: RecordSchema;
  store: DocumentStore;
  blobs: BlobStore;
  pipeline: RecordPipeline;
  trigger: BlobTrigger;
};

export function createBlobStore(env: Env): BlobStore {
  if (env.BLOB_BACKEND === "local") {
    return new LocalBlobStore({ rootDir: env.LOCAL_BLOB_ROOT });
  }

  const { AWS_S3_BUCKET_NAME, AWS_REGION, AWS_ACCESS_KEY_ID, AWS_SECRET_ACCESS_KEY } = env;
  if (!AWS_S3_BUCKET_NAME || !AWS_REGION || !AWS_ACCESS_KEY_ID || !AWS_SECRET_ACCESS_KEY) {
    const missing = [
      !AWS_S3_BUCKET_NAME && "AWS_S3_BUCKET_NAME",
      !AWS_REGION && "AWS_REGION",
      !AWS_ACCESS_KEY_ID && "AWS_ACCESS_KEY_ID",
      !AWS_SECRET_ACCESS_KEY && "AWS_SECRET_ACCESS_KEY",
    ]
      .filter(Boolean)
      .join(", ");
    throw new Error(`BLOB_BACKEND=s3 requires ${missing}`);
  }

  return new S3BlobStore({
    bucket: AWS_S3_BUCKET_NAME,
    region: AWS_REGION,
    accessKeyId: AWS_ACCESS_KEY_ID,
    secretAccessKey: AWS_SECRET_ACCESS_KEY,
  });
}

/** Wires the pipeline from explicit collaborators; callers may pass their own store or blobs. */
export function createEtlServices(
  env: Env,
  overrides: Partial<Pick<EtlServices, "store" | "blobs">> = {}
): EtlServices {
  const schema = resolveRecordSchema(env.RECORD_SCHEMA);
  const store = overrides.store ?? new SqliteDocumentStore({ dbPath: env.STORE_DB_PATH, collection: env.STORE_COLLECTION });
  const blobs = overrides.blobs ?? createBlobStore(env);

  const pipeline = new RecordPipeline({
    store,
    blobs,
    schema,
    processedContainer: env.PROCESSED_CONTAINER,
    logger: createChildLogger({ component: "record-pipeline", schema: schema.name }),
  });

  const trigger = new BlobTrigger({
    pipeline,
    blobs,
    rawContainer: env.RAW_CONTAINER,
    maxAttempts: env.BLOB_TRIGGER_MAX_ATTEMPTS,
    retryDelayMs: env.BLOB_TRIGGER_RETRY_DELAY_MS,
  });

  return { schema, store, blobs, pipeline, trigger };
}
