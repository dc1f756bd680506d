import { isLRUStoreError } from "../errors";
import type { LRUStore } from "../lru";
import type { ScriptLine, ScriptOp, ScriptValue, StepResult } from "./types";

function apply(store: LRUStore<ScriptValue, ScriptValue>, op: ScriptOp): unknown {
  switch (op.kind) {
    case "set":
      store.write(op.key, op.value);
      return undefined;
    case "get":
      return store.read(op.key);
    case "peek":
      return store.peek(op.key);
    case "delete":
      store.delete(op.key);
      return undefined;
    case "has":
      return store.contains(op.key);
    case "pop":
      return store.pop(op.key);
    case "resize":
      store.resize(op.capacity);
      return undefined;
    case "lru":
      return store.leastRecentlyUsed;
    case "mru":
      return store.mostRecentlyUsed;
    case "keys":
      return store.keys().toArray();
    case "values":
      return store.values().toArray();
    case "items":
      return store.items().toArray();
    case "clear":
      store.clear();
      return undefined;
  }
}

/**
 * Apply each scripted operation in order. Store failures become failed steps
 * and the run carries on; any other error propagates.
 */
export function runScript(
  store: LRUStore<ScriptValue, ScriptValue>,
  lines: Iterable<ScriptLine>,
): StepResult[] {
  const results: StepResult[] = [];
  for (const { line, source, op } of lines) {
    try {
      const value = apply(store, op);
      results.push(
        value === undefined
          ? { line, source, ok: true }
          : { line, source, ok: true, value },
      );
    } catch (error) {
      if (!isLRUStoreError(error)) throw error;
      results.push({ line, source, ok: false, error: error.code });
    }
  }
  return results;
}
