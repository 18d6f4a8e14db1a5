// ===============================
// Storage port
// ===============================
export type SqlValue = string | number | Date | null;

export type Row = Record<string, SqlValue>;

export interface Filter {
  column: string;
  value: SqlValue;
}

export interface SelectOptions {
  orderBy?: string;
  limit?: number;
}

/**
 * Row gateway bound to one open transaction. Table and column names come
 * from the entity descriptors, never from callers.
 */
export interface StoreTransaction {
  /** Inserts `row` and returns the key the store assigned to `key`. */
  insert(table: string, key: string, row: Row): Promise<number>;
  select(
    table: string,
    columns: readonly string[],
    where?: Filter,
    options?: SelectOptions
  ): Promise<Row[]>;
  update(table: string, where: Filter, row: Row): Promise<number>;
  remove(table: string, where: Filter): Promise<number>;
  count(table: string, where: Filter): Promise<number>;
}

export interface WorkoutStore {
  /**
   * Runs `work` in one transaction: committed when it resolves, rolled
   * back when it throws.
   */
  transaction<T>(work: (tx: StoreTransaction) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}

export interface Logger {
  log(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

export function toSqlValue(column: string, value: unknown): SqlValue {
  if (value === undefined || value === null) return null;
  if (
    typeof value === "string" ||
    typeof value === "number" ||
    value instanceof Date
  ) {
    return value;
  }
  throw new TypeError(`Column ${column} cannot store a ${typeof value}`);
}

/** Equality as the `utf8mb4_0900_ai_ci` collation sees it: text ignores case and accents. */
export function sameValue(a: SqlValue, b: SqlValue): boolean {
  if (a instanceof Date && b instanceof Date) return a.getTime() === b.getTime();
  if (typeof a === "string" && typeof b === "string") {
    return a.localeCompare(b, "en", { sensitivity: "base" }) === 0;
  }
  return a === b;
}
