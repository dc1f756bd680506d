import type { ScriptLine, ScriptOp, ScriptOpKind, ScriptValue } from "./types";

export class ScriptParseError extends Error {
  constructor(
    readonly line: number,
    message: string,
  ) {
    super(`line ${line}: ${message}`);
    this.name = "ScriptParseError";
  }
}

// Quoted strings may contain spaces; everything else splits on whitespace.
const TOKEN_PATTERN = /"(?:[^"\\]|\\.)*"|\S+/g;

const ARITY: Record<ScriptOpKind, number> = {
  set: 2,
  get: 1,
  peek: 1,
  delete: 1,
  has: 1,
  pop: 1,
  resize: 1,
  lru: 0,
  mru: 0,
  keys: 0,
  values: 0,
  items: 0,
  clear: 0,
};

const ALIASES: Record<string, ScriptOpKind> = {
  del: "delete",
};

function isOpKind(name: string): name is ScriptOpKind {
  return Object.prototype.hasOwnProperty.call(ARITY, name);
}

export function tokenize(line: string): string[] {
  return line.match(TOKEN_PATTERN) ?? [];
}

/**
 * Turn a token into a value: valid JSON becomes the parsed value, so `42` is
 * a number and `"42"` a string; anything else stays as written.
 */
export function parseValue(token: string): ScriptValue {
  try {
    return JSON.parse(token);
  } catch {
    return token;
  }
}

/**
 * Script keys must be primitives: an array or object token is parsed afresh
 * on every line and the store matches such keys by identity.
 */
function scriptKey(arg: ScriptValue, line: number): ScriptValue {
  if (typeof arg === "object" && arg !== null) {
    throw new ScriptParseError(
      line,
      "keys must be strings, numbers, booleans or null",
    );
  }
  return arg;
}

function buildOp(
  kind: ScriptOpKind,
  args: ScriptValue[],
  line: number,
): ScriptOp {
  switch (kind) {
    case "set":
      return { kind, key: scriptKey(args[0], line), value: args[1] };
    case "get":
    case "peek":
    case "delete":
    case "has":
    case "pop":
      return { kind, key: scriptKey(args[0], line) };
    case "resize": {
      const capacity = args[0];
      if (typeof capacity !== "number") {
        throw new ScriptParseError(line, "resize expects a number");
      }
      return { kind, capacity };
    }
    default:
      return { kind };
  }
}

export function parseLine(text: string, line: number): ScriptLine | null {
  const source = text.trim();
  if (!source || source.startsWith("#")) return null;

  const [command, ...rest] = tokenize(source);
  const name = command.toLowerCase();
  const kind = ALIASES[name] ?? name;
  if (!isOpKind(kind)) {
    throw new ScriptParseError(line, `unknown command "${command}"`);
  }

  const expected = ARITY[kind];
  if (rest.length !== expected) {
    throw new ScriptParseError(
      line,
      `${kind} takes ${expected} argument${expected === 1 ? "" : "s"}, got ${rest.length}`,
    );
  }

  return { line, source, op: buildOp(kind, rest.map(parseValue), line) };
}

/**
 * Parse a whole script. Blank lines and `#` comments are skipped; the first
 * malformed line aborts parsing with a ScriptParseError.
 */
export function parseScript(text: string): ScriptLine[] {
  const parsed: ScriptLine[] = [];
  const lines = text.split(/\r?\n/);
  lines.forEach((raw, index) => {
    const entry = parseLine(raw, index + 1);
    if (entry) parsed.push(entry);
  });
  return parsed;
}
