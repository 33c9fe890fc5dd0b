import type { RecordSchema, RecordSchemaName } from "./types.js";

export const SLOT_COUNT = 15;

export const canonicalSchema: RecordSchema = {
  name: "canonical",
  fields: {
    id: "id",
    name: "name",
    category: "category",
    alcoholic: "alcoholic_flag",
    instructions: "instructions",
  },
  ingredientKey: (slot) => `ingredient_${slot}`,
  measureKey: (slot) => `measure_${slot}`,
};

// Field names of TheCocktailDB lookup/search payloads.
export const cocktailDbSchema: RecordSchema = {
  name: "cocktaildb",
  fields: {
    id: "idDrink",
    name: "strDrink",
    category: "strCategory",
    alcoholic: "strAlcoholic",
    instructions: "strInstructions",
  },
  ingredientKey: (slot) => `strIngredient${slot}`,
  measureKey: (slot) => `strMeasure${slot}`,
};

const schemas: Record<RecordSchemaName, RecordSchema> = {
  canonical: canonicalSchema,
  cocktaildb: cocktailDbSchema,
};

export function resolveRecordSchema(name: RecordSchemaName): RecordSchema {
  return schemas[name];
}

export function requiredFields(schema: RecordSchema): string[] {
  const { id, name, category, alcoholic, instructions } = schema.fields;
  return [id, name, category, alcoholic, instructions];
}

export function slotIndexes(): number[] {
  return Array.from({ length: SLOT_COUNT }, (_, i) => i + 1);
}
