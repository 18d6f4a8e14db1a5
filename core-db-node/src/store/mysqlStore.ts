import { z } from "zod";
import { ConstraintViolation, DependencyConflict } from "../errors";
import type {
  Filter,
  Logger,
  Row,
  SelectOptions,
  SqlValue,
  StoreTransaction,
  WorkoutStore,
} from "./store";

/**
 * The slice of a mysql2/promise connection this store uses.
 * A `PoolConnection` satisfies it.
 */
export interface SqlConnection {
  query(sql: string, values?: SqlValue[]): Promise<[unknown, unknown]>;
  beginTransaction(): Promise<void>;
  commit(): Promise<void>;
  rollback(): Promise<void>;
  release(): void;
}

export interface SqlPool {
  getConnection(): Promise<SqlConnection>;
  end(): Promise<void>;
}

// ===============================
// Result shapes
// ===============================
const sqlValue = z.union([z.string(), z.number(), z.date(), z.null()]);
const rowsResult = z.array(z.record(sqlValue));
const headerResult = z.object({
  insertId: z.number(),
  affectedRows: z.number(),
});
const countResult = z.array(z.object({ count: z.coerce.number() })).length(1);

const driverError = z.object({
  code: z.string(),
  sqlMessage: z.string().optional(),
});

const CONSTRAINT_CODES = new Set([
  "ER_NO_REFERENCED_ROW_2",
  "ER_DUP_ENTRY",
  "ER_BAD_NULL_ERROR",
  "ER_CHECK_CONSTRAINT_VIOLATED",
  "ER_DATA_TOO_LONG",
]);
const DEPENDENCY_CODES = new Set(["ER_ROW_IS_REFERENCED_2"]);

/** Maps MySQL constraint failures onto the repository's error types. */
export function translateDriverError(error: unknown): unknown {
  const parsed = driverError.safeParse(error);
  if (!parsed.success) return error;

  const { code, sqlMessage } = parsed.data;
  const message = sqlMessage ?? code;
  if (CONSTRAINT_CODES.has(code)) return new ConstraintViolation(message);
  if (DEPENDENCY_CODES.has(code)) return new DependencyConflict(message);
  return error;
}

export function quoteId(identifier: string): string {
  return `\`${identifier.replace(/`/g, "``")}\``;
}

function whereClause(where: Filter): string {
  return `WHERE ${quoteId(where.column)} = ?`;
}

class MysqlTransaction implements StoreTransaction {
  constructor(private readonly conn: SqlConnection) {}

  private async run(sql: string, values: SqlValue[]): Promise<unknown> {
    try {
      const [result] = await this.conn.query(sql, values);
      return result;
    } catch (error) {
      throw translateDriverError(error);
    }
  }

  async insert(table: string, _key: string, row: Row): Promise<number> {
    const columns = Object.keys(row);
    const sql = `INSERT INTO ${quoteId(table)} (${columns
      .map(quoteId)
      .join(", ")}) VALUES (${columns.map(() => "?").join(", ")})`;

    const header = headerResult.parse(await this.run(sql, Object.values(row)));
    return header.insertId;
  }

  async select(
    table: string,
    columns: readonly string[],
    where?: Filter,
    options: SelectOptions = {}
  ): Promise<Row[]> {
    const parts = [`SELECT ${columns.map(quoteId).join(", ")} FROM ${quoteId(table)}`];
    const values: SqlValue[] = [];

    if (where) {
      parts.push(whereClause(where));
      values.push(where.value);
    }
    if (options.orderBy) parts.push(`ORDER BY ${quoteId(options.orderBy)}`);
    if (options.limit !== undefined) {
      parts.push("LIMIT ?");
      values.push(options.limit);
    }

    return rowsResult.parse(await this.run(parts.join(" "), values));
  }

  async update(table: string, where: Filter, row: Row): Promise<number> {
    const columns = Object.keys(row);
    const sql = `UPDATE ${quoteId(table)} SET ${columns
      .map((column) => `${quoteId(column)} = ?`)
      .join(", ")} ${whereClause(where)}`;

    const header = headerResult.parse(
      await this.run(sql, [...Object.values(row), where.value])
    );
    return header.affectedRows;
  }

  async remove(table: string, where: Filter): Promise<number> {
    const sql = `DELETE FROM ${quoteId(table)} ${whereClause(where)}`;
    const header = headerResult.parse(await this.run(sql, [where.value]));
    return header.affectedRows;
  }

  async count(table: string, where: Filter): Promise<number> {
    const sql = `SELECT COUNT(*) AS count FROM ${quoteId(table)} ${whereClause(where)}`;
    const [row] = countResult.parse(await this.run(sql, [where.value]));
    return row.count;
  }
}

export interface MysqlStoreOptions {
  logger?: Logger;
}

/**
 * Store backed by a mysql2 pool. Each transaction borrows one pooled
 * connection and always gives it back.
 */
export class MysqlStore implements WorkoutStore {
  private readonly logger: Logger;

  constructor(
    private readonly pool: SqlPool,
    options: MysqlStoreOptions = {}
  ) {
    this.logger = options.logger ?? console;
  }

  async transaction<T>(work: (tx: StoreTransaction) => Promise<T>): Promise<T> {
    const conn = await this.pool.getConnection();
    try {
      await conn.beginTransaction();
      const result = await work(new MysqlTransaction(conn));
      await conn.commit();
      return result;
    } catch (error) {
      try {
        await conn.rollback();
        this.logger.error("[Store] Transaction rolled back:", String(error));
      } catch (rollbackError) {
        this.logger.error(
          "[Store] Rollback failed after:",
          String(error),
          "-",
          String(rollbackError)
        );
      }
      throw error;
    } finally {
      conn.release();
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
