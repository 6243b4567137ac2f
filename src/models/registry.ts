import { ConfigurationError } from "../common/errors.js";
import { knnPlugin } from "./knn.js";
import { majorityPlugin } from "./majority.js";
import { nearestCentroidPlugin } from "./nearestCentroid.js";
import type { ModelPlugin } from "./types.js";

export interface ModelRegistry {
  get(kind: string): ModelPlugin;
  has(kind: string): boolean;
  kinds(): string[];
}

export function createModelRegistry(plugins: readonly ModelPlugin[]): ModelRegistry {
  const byKind = new Map<string, ModelPlugin>();
  for (const plugin of plugins) {
    if (byKind.has(plugin.kind)) {
      throw new ConfigurationError(`Model kind "${plugin.kind}" is registered twice.`);
    }
    byKind.set(plugin.kind, plugin);
  }
  return {
    get(kind) {
      const plugin = byKind.get(kind);
      if (!plugin) {
        throw new ConfigurationError(
          `Unknown model kind "${kind}". Known kinds: ${[...byKind.keys()].sort().join(", ")}.`,
        );
      }
      return plugin;
    },
    has(kind) {
      return byKind.has(kind);
    },
    kinds() {
      return [...byKind.keys()].sort();
    },
  };
}

export function defaultModelRegistry(): ModelRegistry {
  return createModelRegistry([majorityPlugin, knnPlugin, nearestCentroidPlugin]);
}
