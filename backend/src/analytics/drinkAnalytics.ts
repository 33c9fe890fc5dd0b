import { canonicalSchema } from "../etl/schema.js";
import type { EnrichedRecord, RecordSchema } from "../etl/types.js";

export type Complexity = "simple" | "intermediate" | "complex";

export type StagedDrink = {
  id: string;
  name: string;
  category: string;
  isAlcoholic: boolean;
  ingredientNames: string[];
  ingredientCount: number;
  instructionWordCount: number;
  complexity: Complexity;
  estimatedPrepMinutes: number;
  processedAt: string | null;
};

export type DrinkSegment = {
  category: string;
  isAlcoholic: boolean;
  drinkCount: number;
  avgIngredients: number;
  avgPrepMinutes: number;
  simpleCount: number;
  intermediateCount: number;
  complexCount: number;
  simplePercentage: number;
  intermediatePercentage: number;
  complexPercentage: number;
  popularityRank: number;
};

export type IngredientUsage = {
  ingredient: string;
  drinks: number;
};

export type DrinkSummary = {
  totalDrinks: number;
  categories: number;
  alcoholicPercentage: number;
  topIngredients: IngredientUsage[];
  lastProcessedAt: string | null;
};

const PREP_MINUTES: Record<Complexity, number> = {
  simple: 5,
  intermediate: 15,
  complex: 30,
};

const TOP_INGREDIENT_LIMIT = 10;
const UNKNOWN_CATEGORY = "Unknown";

export function classifyComplexity(ingredientCount: number): Complexity {
  if (ingredientCount < 3) return "simple";
  if (ingredientCount <= 6) return "intermediate";
  return "complex";
}

export function stageDocument(doc: EnrichedRecord, schema: RecordSchema = canonicalSchema): StagedDrink {
  const ingredientNames = Array.isArray(doc.ingredients)
    ? doc.ingredients.map((entry) => entry.ingredient).filter((name) => typeof name === "string" && name.length > 0)
    : [];
  const instructions = textField(doc[schema.fields.instructions]);
  const complexity = classifyComplexity(ingredientNames.length);

  return {
    id: doc.id,
    name: textField(doc[schema.fields.name]),
    category: textField(doc[schema.fields.category]) || UNKNOWN_CATEGORY,
    isAlcoholic: doc[schema.fields.alcoholic] === "Alcoholic",
    ingredientNames,
    ingredientCount: ingredientNames.length,
    instructionWordCount: instructions.split(/\s+/).filter(Boolean).length,
    complexity,
    estimatedPrepMinutes: PREP_MINUTES[complexity],
    processedAt: textField(doc.processing_timestamp) || null,
  };
}

export function buildSegments(staged: StagedDrink[]): DrinkSegment[] {
  const groups = new Map<string, StagedDrink[]>();
  for (const drink of staged) {
    const key = `${drink.category}\u0000${drink.isAlcoholic ? 1 : 0}`;
    const group = groups.get(key);
    if (group) {
      group.push(drink);
    } else {
      groups.set(key, [drink]);
    }
  }

  const segments = Array.from(groups.values()).map((drinks) => {
    const count = drinks.length;
    const simpleCount = drinks.filter((d) => d.complexity === "simple").length;
    const intermediateCount = drinks.filter((d) => d.complexity === "intermediate").length;
    const complexCount = drinks.filter((d) => d.complexity === "complex").length;

    return {
      category: drinks[0]?.category ?? UNKNOWN_CATEGORY,
      isAlcoholic: drinks[0]?.isAlcoholic ?? false,
      drinkCount: count,
      avgIngredients: round1(average(drinks.map((d) => d.ingredientCount))),
      avgPrepMinutes: round1(average(drinks.map((d) => d.estimatedPrepMinutes))),
      simpleCount,
      intermediateCount,
      complexCount,
      simplePercentage: round1((simpleCount * 100) / count),
      intermediatePercentage: round1((intermediateCount * 100) / count),
      complexPercentage: round1((complexCount * 100) / count),
      popularityRank: 0,
    };
  });

  segments.sort((a, b) => {
    if (b.drinkCount !== a.drinkCount) return b.drinkCount - a.drinkCount;
    const byCategory = a.category.localeCompare(b.category);
    if (byCategory !== 0) return byCategory;
    return Number(b.isAlcoholic) - Number(a.isAlcoholic);
  });

  return segments.map((segment, index) => ({ ...segment, popularityRank: index + 1 }));
}

export function summarize(staged: StagedDrink[]): DrinkSummary {
  const usage = new Map<string, IngredientUsage>();
  for (const drink of staged) {
    const seen = new Set<string>();
    for (const name of drink.ingredientNames) {
      const key = name.trim().toLowerCase();
      if (!key || seen.has(key)) continue;
      seen.add(key);

      const entry = usage.get(key);
      if (entry) {
        entry.drinks += 1;
      } else {
        usage.set(key, { ingredient: name.trim(), drinks: 1 });
      }
    }
  }

  const topIngredients = Array.from(usage.entries())
    .sort(([keyA, a], [keyB, b]) => b.drinks - a.drinks || keyA.localeCompare(keyB))
    .slice(0, TOP_INGREDIENT_LIMIT)
    .map(([, entry]) => entry);

  const alcoholic = staged.filter((d) => d.isAlcoholic).length;
  const processed = staged
    .map((d) => d.processedAt)
    .filter((value): value is string => value !== null)
    .sort();

  return {
    totalDrinks: staged.length,
    categories: new Set(staged.map((d) => d.category)).size,
    alcoholicPercentage: staged.length > 0 ? round1((alcoholic * 100) / staged.length) : 0,
    topIngredients,
    lastProcessedAt: processed.at(-1) ?? null,
  };
}

export function buildAnalytics(docs: EnrichedRecord[], schema: RecordSchema = canonicalSchema) {
  const staged = docs.map((doc) => stageDocument(doc, schema));
  return {
    summary: summarize(staged),
    segments: buildSegments(staged),
  };
}

function textField(value: unknown): string {
  return typeof value === "string" ? value : "";
}

function average(values: number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

function round1(value: number): number {
  return Math.round(value * 10) / 10;
}
