import {
  ArgumentError,
  assertOnlyKeys,
  optionalFlag,
  optionalText,
  requireText,
} from "./tool.arguments";
import type { MockCatalog, ShoppingItem } from "./mock_catalog";
import type { ArgumentCheck, ToolCapability } from "./tool.types";
import { ToolNoMatchError } from "./tool.types";
import type { ToolArguments } from "../turn/turn.types";

export const TOOL_NAMES = Object.freeze({
  SHOPPING_SEARCH: "shopping_search",
  RECIPE_SEARCH: "recipe_search",
  CALORIE_LOOKUP: "calorie_lookup",
  WEATHER_LOOKUP: "weather_lookup",
  HEALTH_GUIDELINES: "health_guidelines",
} as const);

function checked<T>(parse: () => T): ArgumentCheck<T> {
  try {
    return { ok: true, args: parse() };
  } catch (error) {
    if (error instanceof ArgumentError) {
      return { ok: false, reason: error.message };
    }
    throw error;
  }
}

function normalize(text: string): string {
  return text.normalize("NFC").toLowerCase();
}

function mentions(haystack: string, needles: readonly string[]): boolean {
  const normalized = normalize(haystack);
  return needles.some((needle) => normalized.includes(normalize(needle)));
}

interface ShoppingArgs {
  readonly query: string;
  readonly cheaper: boolean;
}

// Items sharing a first keyword are interchangeable offers for one ingredient.
function groupByIngredient(items: readonly ShoppingItem[]): readonly (readonly ShoppingItem[])[] {
  const groups = new Map<string, ShoppingItem[]>();
  for (const item of items) {
    const groupKey = item.keywords[0] ?? item.name;
    const group = groups.get(groupKey);
    if (group) {
      group.push(item);
    } else {
      groups.set(groupKey, [item]);
    }
  }
  return [...groups.values()];
}

function cheapest(items: readonly ShoppingItem[]): ShoppingItem | undefined {
  return items.reduce<ShoppingItem | undefined>(
    (best, item) => (best === undefined || item.price < best.price ? item : best),
    undefined
  );
}

function pickOffer(group: readonly ShoppingItem[], cheaper: boolean): ShoppingItem | undefined {
  if (cheaper) {
    return cheapest(group);
  }
  return cheapest(group.filter((item) => item.tier === "standard")) ?? cheapest(group);
}

export function createShoppingSearch(catalog: MockCatalog): ToolCapability<ShoppingArgs> {
  const groups = groupByIngredient(catalog.shopping);
  return {
    name: TOOL_NAMES.SHOPPING_SEARCH,
    description: "식재료 가격 검색 (예상 비용 보고)",
    argumentHint: '{"query": string, "cheaper"?: boolean}',
    validate: (args: ToolArguments) =>
      checked(() => {
        assertOnlyKeys(args, ["query", "cheaper"]);
        return { query: requireText(args, "query"), cheaper: optionalFlag(args, "cheaper") };
      }),
    async invoke(args) {
      const offers: ShoppingItem[] = [];
      for (const group of groups) {
        const matched = group.some((item) => mentions(args.query, item.keywords));
        const offer = matched ? pickOffer(group, args.cheaper) : undefined;
        if (offer) {
          offers.push(offer);
        }
      }
      if (offers.length === 0) {
        throw new ToolNoMatchError(`no shopping items for '${args.query}'`);
      }

      const total = offers.reduce((sum, item) => sum + item.price, 0);
      return {
        value: {
          query: args.query,
          cheaper: args.cheaper,
          items: offers.map((item) => ({ name: item.name, price: item.price, store: item.store })),
          total,
        },
        costEstimate: total,
      };
    },
  };
}

interface QueryArgs {
  readonly query: string;
}

export function createRecipeSearch(catalog: MockCatalog): ToolCapability<QueryArgs> {
  return {
    name: TOOL_NAMES.RECIPE_SEARCH,
    description: "레시피 검색",
    argumentHint: '{"query": string}',
    validate: (args: ToolArguments) =>
      checked(() => {
        assertOnlyKeys(args, ["query"]);
        return { query: requireText(args, "query") };
      }),
    async invoke(args) {
      const recipes = catalog.recipes.filter((recipe) => mentions(args.query, recipe.keywords));
      if (recipes.length === 0) {
        throw new ToolNoMatchError(`no recipes for '${args.query}'`);
      }
      return {
        value: {
          recipes: recipes.map((recipe) => ({
            title: recipe.title,
            servings: recipe.servings,
            ingredients: recipe.ingredients,
            steps: recipe.steps,
          })),
        },
        costEstimate: 0,
      };
    },
  };
}

interface FoodArgs {
  readonly food: string;
}

export function createCalorieLookup(catalog: MockCatalog): ToolCapability<FoodArgs> {
  return {
    name: TOOL_NAMES.CALORIE_LOOKUP,
    description: "음식 100g당 열량 조회",
    argumentHint: '{"food": string}',
    validate: (args: ToolArguments) =>
      checked(() => {
        assertOnlyKeys(args, ["food"]);
        return { food: requireText(args, "food") };
      }),
    async invoke(args) {
      const entry = catalog.calories.find((row) => mentions(args.food, [row.food, ...row.aliases]));
      if (!entry) {
        throw new ToolNoMatchError(`no calorie data for '${args.food}'`);
      }
      return {
        value: { food: entry.food, kcalPer100g: entry.kcalPer100g },
        costEstimate: 0,
      };
    },
  };
}

interface LocationArgs {
  readonly location?: string;
}

export function createWeatherLookup(catalog: MockCatalog): ToolCapability<LocationArgs> {
  return {
    name: TOOL_NAMES.WEATHER_LOOKUP,
    description: "지역 날씨와 어울리는 요리 조회",
    argumentHint: '{"location"?: string}',
    validate: (args: ToolArguments) =>
      checked(() => {
        assertOnlyKeys(args, ["location"]);
        return { location: optionalText(args, "location") };
      }),
    async invoke(args) {
      const location = args.location ?? catalog.defaultLocation;
      const entry = catalog.weather.find((row) => mentions(location, [row.location]));
      if (!entry) {
        throw new ToolNoMatchError(`no weather data for '${location}'`);
      }
      return {
        value: {
          location: entry.location,
          condition: entry.condition,
          temperatureC: entry.temperatureC,
          suggestion: entry.suggestion,
        },
        costEstimate: 0,
      };
    },
  };
}

interface ConditionArgs {
  readonly condition: string;
}

export function createHealthGuidelines(catalog: MockCatalog): ToolCapability<ConditionArgs> {
  return {
    name: TOOL_NAMES.HEALTH_GUIDELINES,
    description: "건강 상태별 식단 가이드",
    argumentHint: '{"condition": string}',
    validate: (args: ToolArguments) =>
      checked(() => {
        assertOnlyKeys(args, ["condition"]);
        return { condition: requireText(args, "condition") };
      }),
    async invoke(args) {
      const entry = catalog.healthGuidelines.find((row) =>
        mentions(args.condition, [row.condition, ...row.aliases])
      );
      if (!entry) {
        throw new ToolNoMatchError(`no guideline for '${args.condition}'`);
      }
      return {
        value: { condition: entry.condition, guidance: entry.guidance },
        costEstimate: 0,
      };
    },
  };
}
