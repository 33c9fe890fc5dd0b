import { z } from "zod";
import { AppError } from "../middleware/error.js";
import type { RawRecord } from "./types.js";

export class BatchDecodeError extends AppError {
  constructor(message: string) {
    super(message, 400, "batch_decode_error");
  }
}

const rawRecordSchema = z.record(z.string(), z.unknown());
const recordArraySchema = z.array(rawRecordSchema);

export function parseNdjson(content: string): RawRecord[] {
  const records: RawRecord[] = [];
  const lines = content.split(/\r?\n/);

  lines.forEach((line, index) => {
    if (!line.trim()) return;

    let value: unknown;
    try {
      value = JSON.parse(line);
    } catch (error) {
      const reason = error instanceof Error ? error.message : "unknown_error";
      throw new BatchDecodeError(`Line ${index + 1} is not valid JSON: ${reason}`);
    }

    if (!isPlainObject(value)) {
      throw new BatchDecodeError(`Line ${index + 1} is not a JSON object`);
    }
    records.push(value);
  });

  return records;
}

export function parseRecordArray(body: unknown): RawRecord[] {
  if (!Array.isArray(body)) {
    throw new BatchDecodeError("Expected a JSON array of records");
  }

  const parsed = recordArraySchema.safeParse(body);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? issue.path.join(".") : "";
    throw new BatchDecodeError(`Item ${where || "?"} is not a JSON object`);
  }
  return parsed.data;
}

function isPlainObject(value: unknown): value is RawRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
