import type { LRUStore } from "../lru";
import type { StepResult } from "../script/types";

type Styler = (s: string) => string;

const style = {
  bold: (s: string) => `\x1b[1m${s}\x1b[22m`,
  dim: (s: string) => `\x1b[2m${s}\x1b[22m`,
  green: (s: string) => `\x1b[32m${s}\x1b[39m`,
  red: (s: string) => `\x1b[31m${s}\x1b[39m`,
};

const plainStyle: Record<keyof typeof style, Styler> = {
  bold: (s) => s,
  dim: (s) => s,
  green: (s) => s,
  red: (s) => s,
};

export interface FormatOptions {
  /** Drop ANSI escapes, for pipes and tests */
  plain?: boolean;
}

function pick(options: FormatOptions) {
  return options.plain ? plainStyle : style;
}

export function renderValue(value: unknown): string {
  if (typeof value === "bigint") return `${value}n`;
  return JSON.stringify(value) ?? String(value);
}

/**
 * One line per step: `line 3: get "a" -> 1` on success,
 * `line 4: peek "z" !! KEY_NOT_FOUND` on failure.
 */
export function formatStep(result: StepResult, options: FormatOptions = {}): string {
  const s = pick(options);
  const prefix = s.dim(`line ${result.line}:`);
  if (!result.ok) {
    return `${prefix} ${result.source} ${s.red(`!! ${result.error}`)}`;
  }
  if (!("value" in result)) {
    return `${prefix} ${result.source}`;
  }
  return `${prefix} ${result.source} ${s.green(`-> ${renderValue(result.value)}`)}`;
}

export function formatStoreSummary(
  store: LRUStore<unknown, unknown>,
  options: FormatOptions = {},
): string {
  const s = pick(options);
  const keys = store.keys().toArray().map(renderValue);
  const edge = (pickKey: () => unknown) =>
    store.filled === 0 ? "-" : renderValue(pickKey());

  return [
    `${s.bold("Store")}: capacity=${store.capacity} filled=${store.filled}`,
    `${s.dim("lru")}: ${edge(() => store.leastRecentlyUsed)}  ${s.dim("mru")}: ${edge(() => store.mostRecentlyUsed)}`,
    `${s.dim("keys")}: ${keys.length > 0 ? keys.join(", ") : "(empty)"}`,
  ].join("\n");
}
