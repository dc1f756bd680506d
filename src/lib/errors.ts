export type LRUStoreErrorCode =
  | "INVALID_CAPACITY"
  | "KEY_NOT_FOUND"
  | "EMPTY_STORE";

/**
 * Base class for every failure raised by an LRUStore.
 * A failed call never leaves the store partially mutated.
 */
export class LRUStoreError extends Error {
  readonly code: LRUStoreErrorCode;

  constructor(code: LRUStoreErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidCapacityError extends LRUStoreError {
  readonly capacity: number;

  constructor(capacity: number) {
    super(
      "INVALID_CAPACITY",
      `LRU store capacity must be an integer >= 1 (got ${capacity})`,
    );
    this.capacity = capacity;
  }
}

export class KeyNotFoundError extends LRUStoreError {
  readonly key: unknown;

  constructor(key: unknown) {
    super("KEY_NOT_FOUND", `Key not found: ${describeKey(key)}`);
    this.key = key;
  }
}

export class EmptyStoreError extends LRUStoreError {
  constructor(accessor: string) {
    super("EMPTY_STORE", `Cannot read ${accessor} of an empty LRU store`);
  }
}

export function isLRUStoreError(error: unknown): error is LRUStoreError {
  return error instanceof LRUStoreError;
}

function describeKey(key: unknown): string {
  if (typeof key === "string") return JSON.stringify(key);
  if (typeof key === "symbol") return key.toString();
  if (typeof key === "object" && key !== null) {
    return `[${key.constructor?.name ?? "object"}]`;
  }
  return String(key);
}
