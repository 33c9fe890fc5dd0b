import { createChildLogger, type Logger } from "../utils/logger.js";
import { canonicalSchema, requiredFields, slotIndexes } from "./schema.js";
import type { EnrichedRecord, IngredientEntry, Provenance, RawRecord, RecordSchema, SkipReason } from "./types.js";

export const PROVENANCE: Readonly<Provenance> = Object.freeze({
  source_api: "TheCocktailDB",
  cloud_provider: "Azure",
  processing_service: "Azure Functions",
});

export const MISSING_ID_PLACEHOLDER = "N/A";

const defaultLogger = createChildLogger({ component: "record-transformer" });

export type ValidationIssue = {
  reason: SkipReason;
  missing: string[];
};

export type ValidateOptions = {
  schema?: RecordSchema;
  logger?: Logger;
};

/**
 * Checks that every required field is present and truthy, and that the identifier is a
 * string or number. An empty string counts as missing. Logs a warning naming the record
 * when it fails.
 */
export function validateRecord(record: RawRecord, options: ValidateOptions = {}): boolean {
  const schema = options.schema ?? canonicalSchema;
  const issue = findValidationIssue(record, schema);
  if (!issue) {
    return true;
  }

  const log = options.logger ?? defaultLogger;
  if (issue.reason === "missing_required_fields") {
    log.warn({
      msg: "Missing required fields in record",
      recordId: recordIdentifier(record, schema),
      missing: issue.missing,
    });
  } else {
    log.warn({
      msg: "Record identifier is not a string or number",
      recordId: MISSING_ID_PLACEHOLDER,
      idField: schema.fields.id,
      idType: Array.isArray(record[schema.fields.id]) ? "array" : typeof record[schema.fields.id],
    });
  }
  return false;
}

export function findValidationIssue(record: RawRecord, schema: RecordSchema = canonicalSchema): ValidationIssue | null {
  const missing = requiredFields(schema).filter((field) => !record[field]);
  if (missing.length > 0) {
    return { reason: "missing_required_fields", missing };
  }

  const id = record[schema.fields.id];
  if (typeof id !== "string" && typeof id !== "number") {
    return { reason: "invalid_identifier", missing: [] };
  }
  return null;
}

/**
 * Folds the numbered ingredient/measure slots into an ordered list. Slots without an
 * ingredient are skipped; an absent measure becomes "".
 */
export function decodeIngredientSlots(record: RawRecord, schema: RecordSchema = canonicalSchema): IngredientEntry[] {
  const entries: IngredientEntry[] = [];
  for (const slot of slotIndexes()) {
    const ingredient = slotText(record[schema.ingredientKey(slot)]);
    if (!ingredient) continue;
    entries.push({
      ingredient,
      measure: slotText(record[schema.measureKey(slot)]),
    });
  }
  return entries;
}

/**
 * Builds the stored form of a record that already passed {@link validateRecord}.
 * The input object is left untouched.
 */
export function enrichRecord(record: RawRecord, now: Date, schema: RecordSchema = canonicalSchema): EnrichedRecord {
  const ingredients = decodeIngredientSlots(record, schema);

  const working: RawRecord = { ...record };
  for (const slot of slotIndexes()) {
    delete working[schema.ingredientKey(slot)];
    delete working[schema.measureKey(slot)];
  }

  return {
    ...working,
    processing_timestamp: now.toISOString(),
    ...PROVENANCE,
    ingredients,
    id: slotText(record[schema.fields.id]),
  };
}

export function recordIdentifier(record: RawRecord, schema: RecordSchema = canonicalSchema): string {
  return slotText(record[schema.fields.id]) || MISSING_ID_PLACEHOLDER;
}

function slotText(value: unknown): string {
  if (!value) return "";
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return "";
}
