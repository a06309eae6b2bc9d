export type PriceTier = "standard" | "budget";

export interface ShoppingItem {
  readonly name: string;
  readonly keywords: readonly string[];
  readonly price: number;
  readonly store: string;
  readonly tier: PriceTier;
}

export interface RecipeEntry {
  readonly title: string;
  readonly keywords: readonly string[];
  readonly servings: number;
  readonly ingredients: readonly string[];
  readonly steps: readonly string[];
}

export interface CalorieEntry {
  readonly food: string;
  readonly aliases: readonly string[];
  readonly kcalPer100g: number;
}

export interface WeatherEntry {
  readonly location: string;
  readonly condition: string;
  readonly temperatureC: number;
  readonly suggestion: string;
}

export interface HealthGuideline {
  readonly condition: string;
  readonly aliases: readonly string[];
  readonly guidance: string;
}

export interface MockCatalog {
  readonly shopping: readonly ShoppingItem[];
  readonly recipes: readonly RecipeEntry[];
  readonly calories: readonly CalorieEntry[];
  readonly weather: readonly WeatherEntry[];
  readonly defaultLocation: string;
  readonly healthGuidelines: readonly HealthGuideline[];
}

function asObject(value: unknown, where: string): Record<string, unknown> {
  if (typeof value === "object" && value !== null && !Array.isArray(value)) {
    return value as Record<string, unknown>;
  }
  throw new Error(`MOCK_CATALOG_VALIDATION_ERROR ${where} must be an object`);
}

function asArray(value: unknown, where: string): readonly unknown[] {
  if (!Array.isArray(value)) {
    throw new Error(`MOCK_CATALOG_VALIDATION_ERROR ${where} must be an array`);
  }
  return value;
}

function asString(value: unknown, where: string): string {
  if (typeof value !== "string" || value.trim() === "") {
    throw new Error(`MOCK_CATALOG_VALIDATION_ERROR ${where} must be a non-empty string`);
  }
  return value;
}

function asNumber(value: unknown, where: string): number {
  if (typeof value !== "number" || !Number.isFinite(value) || value < 0) {
    throw new Error(`MOCK_CATALOG_VALIDATION_ERROR ${where} must be a non-negative number`);
  }
  return value;
}

function asStrings(value: unknown, where: string): readonly string[] {
  return asArray(value, where).map((item, idx) => asString(item, `${where}[${idx}]`));
}

function parseTier(value: unknown, where: string): PriceTier {
  if (value === "standard" || value === "budget") {
    return value;
  }
  throw new Error(`MOCK_CATALOG_VALIDATION_ERROR ${where} must be standard|budget`);
}

export function parseMockCatalog(value: unknown): MockCatalog {
  const root = asObject(value, "catalog");

  const shopping = asArray(root.shopping, "shopping").map((raw, idx) => {
    const row = asObject(raw, `shopping[${idx}]`);
    return {
      name: asString(row.name, `shopping[${idx}].name`),
      keywords: asStrings(row.keywords, `shopping[${idx}].keywords`),
      price: asNumber(row.price, `shopping[${idx}].price`),
      store: asString(row.store, `shopping[${idx}].store`),
      tier: parseTier(row.tier, `shopping[${idx}].tier`),
    };
  });

  const recipes = asArray(root.recipes, "recipes").map((raw, idx) => {
    const row = asObject(raw, `recipes[${idx}]`);
    return {
      title: asString(row.title, `recipes[${idx}].title`),
      keywords: asStrings(row.keywords, `recipes[${idx}].keywords`),
      servings: asNumber(row.servings, `recipes[${idx}].servings`),
      ingredients: asStrings(row.ingredients, `recipes[${idx}].ingredients`),
      steps: asStrings(row.steps, `recipes[${idx}].steps`),
    };
  });

  const calories = asArray(root.calories, "calories").map((raw, idx) => {
    const row = asObject(raw, `calories[${idx}]`);
    return {
      food: asString(row.food, `calories[${idx}].food`),
      aliases: asStrings(row.aliases, `calories[${idx}].aliases`),
      kcalPer100g: asNumber(row.kcalPer100g, `calories[${idx}].kcalPer100g`),
    };
  });

  const weather = asArray(root.weather, "weather").map((raw, idx) => {
    const row = asObject(raw, `weather[${idx}]`);
    return {
      location: asString(row.location, `weather[${idx}].location`),
      condition: asString(row.condition, `weather[${idx}].condition`),
      temperatureC: typeof row.temperatureC === "number" ? row.temperatureC : 0,
      suggestion: asString(row.suggestion, `weather[${idx}].suggestion`),
    };
  });

  const healthGuidelines = asArray(root.healthGuidelines, "healthGuidelines").map((raw, idx) => {
    const row = asObject(raw, `healthGuidelines[${idx}]`);
    return {
      condition: asString(row.condition, `healthGuidelines[${idx}].condition`),
      aliases: asStrings(row.aliases, `healthGuidelines[${idx}].aliases`),
      guidance: asString(row.guidance, `healthGuidelines[${idx}].guidance`),
    };
  });

  return {
    shopping,
    recipes,
    calories,
    weather,
    defaultLocation: asString(root.defaultLocation, "defaultLocation"),
    healthGuidelines,
  };
}
