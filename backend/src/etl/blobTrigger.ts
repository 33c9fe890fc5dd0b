import { setTimeout as sleep } from "node:timers/promises";
import { BlobNotFoundError, type BlobStore } from "../storage/blobStore.js";
import { createChildLogger, type Logger } from "../utils/logger.js";
import type { RecordPipeline } from "./pipeline.js";
import type { BlobRunResult } from "./types.js";

export type BlobTriggerOptions = {
  pipeline: RecordPipeline;
  blobs: BlobStore;
  rawContainer: string;
  maxAttempts: number;
  retryDelayMs: number;
  logger?: Logger;
};

export type FireOptions = {
  maxAttempts?: number;
};

/**
 * Runs the pipeline for a blob in the raw container. A failed run, including content
 * that does not decode, is retried as a whole; the last error is rethrown once attempts
 * are exhausted. A missing blob fails at once.
 */
export class BlobTrigger {
  readonly rawContainer: string;

  private readonly pipeline: RecordPipeline;
  private readonly blobs: BlobStore;
  private readonly maxAttempts: number;
  private readonly retryDelayMs: number;
  private readonly log: Logger;

  constructor(options: BlobTriggerOptions) {
    this.pipeline = options.pipeline;
    this.blobs = options.blobs;
    this.rawContainer = options.rawContainer;
    this.maxAttempts = Math.max(1, Math.floor(options.maxAttempts));
    this.retryDelayMs = Math.max(0, options.retryDelayMs);
    this.log = options.logger ?? createChildLogger({ component: "blob-trigger" });
  }

  async fire(blobName: string, options: FireOptions = {}): Promise<BlobRunResult> {
    const maxAttempts = Math.max(1, Math.floor(options.maxAttempts ?? this.maxAttempts));
    let lastError: unknown;

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      try {
        const content = await this.blobs.read(this.rawContainer, blobName);
        return await this.pipeline.processBlob(blobName, content);
      } catch (error) {
        lastError = error;
        this.log.error({
          msg: "Error processing blob",
          blobName,
          attempt,
          maxAttempts,
          error: error instanceof Error ? error.message : String(error),
        });

        if (error instanceof BlobNotFoundError || attempt === maxAttempts) {
          break;
        }
        if (this.retryDelayMs > 0) {
          await sleep(this.retryDelayMs);
        }
      }
    }

    throw lastError;
  }
}
