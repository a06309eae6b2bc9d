import {
  createCalorieLookup,
  createHealthGuidelines,
  createRecipeSearch,
  createShoppingSearch,
  createWeatherLookup,
} from "./capabilities";
import type { MockCatalog } from "./mock_catalog";
import type { RegisteredTool, ToolCapability } from "./tool.types";

export function toRegisteredTool<TArgs>(capability: ToolCapability<TArgs>): RegisteredTool {
  return {
    name: capability.name,
    description: capability.description,
    argumentHint: capability.argumentHint,
    bind(args) {
      const checked = capability.validate(args);
      if (!checked.ok) {
        return checked;
      }
      return { ok: true, args: (signal: AbortSignal) => capability.invoke(checked.args, signal) };
    },
  };
}

export interface ToolRegistry {
  register(tool: RegisteredTool): this;
  get(name: string): RegisteredTool | undefined;
  list(): readonly RegisteredTool[];
}

class StaticToolRegistry implements ToolRegistry {
  private readonly tools = new Map<string, RegisteredTool>();

  register(tool: RegisteredTool): this {
    if (this.tools.has(tool.name)) {
      throw new Error(`TOOL_REGISTRY_ERROR duplicate tool '${tool.name}'`);
    }
    this.tools.set(tool.name, tool);
    return this;
  }

  get(name: string): RegisteredTool | undefined {
    return this.tools.get(name);
  }

  list(): readonly RegisteredTool[] {
    return [...this.tools.values()];
  }
}

export function createToolRegistry(): ToolRegistry {
  return new StaticToolRegistry();
}

export function createMockToolRegistry(catalog: MockCatalog): ToolRegistry {
  return createToolRegistry()
    .register(toRegisteredTool(createShoppingSearch(catalog)))
    .register(toRegisteredTool(createRecipeSearch(catalog)))
    .register(toRegisteredTool(createCalorieLookup(catalog)))
    .register(toRegisteredTool(createWeatherLookup(catalog)))
    .register(toRegisteredTool(createHealthGuidelines(catalog)));
}
