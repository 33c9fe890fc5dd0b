import test from "node:test";
import assert from "node:assert/strict";
import { parseEnv } from "../src/config/env.js";
import { createBlobStore } from "../src/services/etlServices.js";
import { LocalBlobStore, S3BlobStore } from "../src/storage/blobStore.js";

test("parseEnv applies defaults", () => {
  const env = parseEnv({});

  assert.equal(env.PORT, 8080);
  assert.equal(env.RECORD_SCHEMA, "canonical");
  assert.equal(env.STORE_COLLECTION, "cocktails");
  assert.equal(env.RAW_CONTAINER, "raw");
  assert.equal(env.PROCESSED_CONTAINER, "processed");
  assert.equal(env.BLOB_TRIGGER_MAX_ATTEMPTS, 5);
  assert.equal(env.LOG_PRETTY, false);
});

test("parseEnv coerces numbers and flags", () => {
  const env = parseEnv({ PORT: "3000", LOG_PRETTY: "true", BLOB_TRIGGER_RETRY_DELAY_MS: "0", RECORD_SCHEMA: "cocktaildb" });

  assert.equal(env.PORT, 3000);
  assert.equal(env.LOG_PRETTY, true);
  assert.equal(env.BLOB_TRIGGER_RETRY_DELAY_MS, 0);
  assert.equal(env.RECORD_SCHEMA, "cocktaildb");
});

test("parseEnv rejects an unknown record schema", () => {
  assert.throws(() => parseEnv({ RECORD_SCHEMA: "csv" }));
});

test("createBlobStore picks the configured backend", () => {
  assert.ok(createBlobStore(parseEnv({})) instanceof LocalBlobStore);

  const s3 = createBlobStore(
    parseEnv({
      BLOB_BACKEND: "s3",
      AWS_REGION: "us-east-1",
      AWS_ACCESS_KEY_ID: "test-key",
      AWS_SECRET_ACCESS_KEY: "test-secret",
      AWS_S3_BUCKET_NAME: "drinks-test",
    })
  );
  assert.ok(s3 instanceof S3BlobStore);
  assert.equal(s3.bucket, "drinks-test");
});

test("createBlobStore names missing S3 settings", () => {
  assert.throws(() => createBlobStore(parseEnv({ BLOB_BACKEND: "s3", AWS_REGION: "us-east-1" })), {
    message: "BLOB_BACKEND=s3 requires AWS_S3_BUCKET_NAME, AWS_ACCESS_KEY_ID, AWS_SECRET_ACCESS_KEY"
  });
});
