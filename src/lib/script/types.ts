import type { LRUStoreErrorCode } from "../errors";

/** A script value: JSON when the token parses as JSON, the raw text otherwise. */
export type ScriptValue = unknown;

export type ScriptOp =
  | { kind: "set"; key: ScriptValue; value: ScriptValue }
  | { kind: "get"; key: ScriptValue }
  | { kind: "peek"; key: ScriptValue }
  | { kind: "delete"; key: ScriptValue }
  | { kind: "has"; key: ScriptValue }
  | { kind: "pop"; key: ScriptValue }
  | { kind: "resize"; capacity: number }
  | { kind: "lru" }
  | { kind: "mru" }
  | { kind: "keys" }
  | { kind: "values" }
  | { kind: "items" }
  | { kind: "clear" };

export type ScriptOpKind = ScriptOp["kind"];

export interface ScriptLine {
  /** 1-based line number in the source script */
  line: number;
  /** The line as written, trimmed */
  source: string;
  op: ScriptOp;
}

export type StepResult =
  | { line: number; source: string; ok: true; value?: unknown }
  | { line: number; source: string; ok: false; error: LRUStoreErrorCode };
