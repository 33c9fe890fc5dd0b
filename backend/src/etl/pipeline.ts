import path from "node:path";
import type { BlobStore } from "../storage/blobStore.js";
import type { DocumentStore } from "../storage/documentStore.js";
import { createChildLogger, type Logger } from "../utils/logger.js";
import { parseNdjson, parseRecordArray } from "./decode.js";
import { canonicalSchema } from "./schema.js";
import { enrichRecord, findValidationIssue, recordIdentifier, validateRecord } from "./transform.js";
import type { BatchResult, BlobRunResult, DirectRunSummary, RawRecord, RecordSchema } from "./types.js";

export type RecordPipelineOptions = {
  store: DocumentStore;
  blobs: BlobStore;
  processedContainer: string;
  schema?: RecordSchema;
  logger?: Logger;
  clock?: () => Date;
};

export class RecordPipeline {
  readonly schema: RecordSchema;
  readonly processedContainer: string;

  private readonly store: DocumentStore;
  private readonly blobs: BlobStore;
  private readonly log: Logger;
  private readonly clock: () => Date;

  constructor(options: RecordPipelineOptions) {
    this.store = options.store;
    this.blobs = options.blobs;
    this.processedContainer = options.processedContainer;
    this.schema = options.schema ?? canonicalSchema;
    this.log = options.logger ?? createChildLogger({ component: "record-pipeline" });
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Validates, enriches and upserts each record in turn. Invalid records and failed
   * writes are reported in the result; neither stops the rest of the batch.
   */
  async processBatch(records: RawRecord[]): Promise<BatchResult> {
    const result: BatchResult = {
      total: records.length,
      valid: 0,
      stored: 0,
      enriched: [],
      storedIds: [],
      failed: [],
      skipped: [],
    };

    for (const [index, record] of records.entries()) {
      const recordId = recordIdentifier(record, this.schema);

      if (!validateRecord(record, { schema: this.schema, logger: this.log })) {
        const reason = findValidationIssue(record, this.schema)?.reason ?? "missing_required_fields";
        this.log.warn({ msg: "Skipping invalid record", recordId, index, reason });
        result.skipped.push({ index, recordId, reason });
        continue;
      }

      const enriched = enrichRecord(record, this.clock(), this.schema);
      result.valid += 1;
      result.enriched.push(enriched);

      try {
        await this.store.upsert(enriched);
        result.stored += 1;
        result.storedIds.push(enriched.id);
        this.log.info({ msg: "Record stored", recordId: enriched.id, collection: this.store.collection });
      } catch (error) {
        const reason = error instanceof Error ? error.message : "unknown_error";
        this.log.error({ msg: "Error writing record to document store", recordId: enriched.id, error: reason });
        result.failed.push({ index, recordId: enriched.id, reason });
      }
    }

    return result;
  }

  /**
   * Handles one raw NDJSON blob: decodes it, processes the batch and mirrors the enriched
   * records to the processed container. Decode and mirror failures propagate.
   */
  async processBlob(blobName: string, content: string): Promise<BlobRunResult> {
    this.log.info({ msg: "Processing blob", blobName, bytes: Buffer.byteLength(content, "utf-8") });

    const records = parseNdjson(content);
    const batch = await this.processBatch(records);

    const mirrorBlobName = processedBlobName(blobName, this.clock());
    await this.blobs.write(this.processedContainer, mirrorBlobName, JSON.stringify(batch.enriched, null, 2));
    this.log.info({
      msg: "Processed data written",
      container: this.processedContainer,
      blobName: mirrorBlobName,
      records: batch.enriched.length,
    });

    return { blobName, mirrorBlobName, batch };
  }

  async processDirect(body: unknown): Promise<DirectRunSummary> {
    const records = parseRecordArray(body);
    this.log.info({ msg: "Received direct invocation", items: records.length });

    const batch = await this.processBatch(records);
    return {
      status: "success",
      processed: batch.stored,
      total: batch.total,
    };
  }
}

export function processedBlobName(blobName: string, now: Date): string {
  const year = now.getUTCFullYear();
  const month = String(now.getUTCMonth() + 1).padStart(2, "0");
  const day = String(now.getUTCDate()).padStart(2, "0");
  return `processed/${year}/${month}/${day}/${path.posix.basename(blobName)}`;
}
