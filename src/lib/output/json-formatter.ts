import type { LRUStoreJSON } from "../lru";
import type { StepResult } from "../script/types";

export interface JsonOutput {
  steps?: StepResult[];
  store?: LRUStoreJSON<unknown, unknown>;
  bench?: Record<string, number>;
}

export function formatJson(data: JsonOutput): string {
  return JSON.stringify(data, null, 2);
}
