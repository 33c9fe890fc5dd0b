import { pathToFileURL } from "node:url";
import { initEnv } from "../config/env.js";
import { createEtlServices } from "../services/etlServices.js";
import type { BlobTrigger } from "./blobTrigger.js";

type TriggerRunSummary = {
  blobs: Array<{
    name: string;
    status: "ok" | "error";
    mirror?: string;
    total?: number;
    stored?: number;
    reason?: string;
  }>;
  hasErrors: boolean;
};

export async function runBlobTrigger(trigger: BlobTrigger, blobNames: string[]): Promise<TriggerRunSummary> {
  const summary: TriggerRunSummary = { blobs: [], hasErrors: false };

  for (const name of blobNames) {
    try {
      const result = await trigger.fire(name);
      summary.blobs.push({
        name,
        status: "ok",
        mirror: result.mirrorBlobName,
        total: result.batch.total,
        stored: result.batch.stored,
      });
    } catch (error) {
      summary.hasErrors = true;
      summary.blobs.push({
        name,
        status: "error",
        reason: error instanceof Error ? error.message : "unknown_error",
      });
    }
  }

  return summary;
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  const names = process.argv.slice(2);
  if (names.length === 0) {
    console.error("[trigger] usage: npm run trigger -- <raw blob name> [...]");
    process.exitCode = 1;
  } else {
    const { trigger } = createEtlServices(initEnv());
    runBlobTrigger(trigger, names)
      .then((summary) => {
        console.log(JSON.stringify(summary, null, 2));
        if (summary.hasErrors) {
          process.exitCode = 1;
        }
      })
      .catch((error) => {
        console.error("[trigger] failed", error);
        process.exitCode = 1;
      });
  }
}
