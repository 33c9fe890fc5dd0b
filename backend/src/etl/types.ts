export type RawRecord = Record<string, unknown>;

export type IngredientEntry = {
  ingredient: string;
  measure: string;
};

export type Provenance = {
  source_api: string;
  cloud_provider: string;
  processing_service: string;
};

export type EnrichedRecord = RawRecord &
  Provenance & {
    id: string;
    ingredients: IngredientEntry[];
    processing_timestamp: string;
  };

export type RecordSchemaName = "canonical" | "cocktaildb";

export type RecordSchema = {
  name: RecordSchemaName;
  fields: {
    id: string;
    name: string;
    category: string;
    alcoholic: string;
    instructions: string;
  };
  ingredientKey: (slot: number) => string;
  measureKey: (slot: number) => string;
};

export type SkipReason = "missing_required_fields" | "invalid_identifier";

export type SkippedRecord = {
  index: number;
  recordId: string;
  reason: SkipReason;
};

export type FailedRecord = {
  index: number;
  recordId: string;
  reason: string;
};

export type BatchResult = {
  total: number;
  valid: number;
  stored: number;
  enriched: EnrichedRecord[];
  storedIds: string[];
  failed: FailedRecord[];
  skipped: SkippedRecord[];
};

export type BlobRunResult = {
  blobName: string;
  mirrorBlobName: string;
  batch: BatchResult;
};

export type DirectRunSummary = {
  status: "success";
  processed: number;
  total: number;
};
