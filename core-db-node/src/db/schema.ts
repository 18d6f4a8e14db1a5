import { readFile } from "node:fs/promises";
import type { SqlPool } from "../store/mysqlStore";

const SCHEMA_FILE = new URL("./schema.sql", import.meta.url);

/** Splits a SQL script into statements, dropping `--` comment lines. */
export function splitStatements(script: string): string[] {
  return script
    .split("\n")
    .filter((line) => !line.trimStart().startsWith("--"))
    .join("\n")
    .split(";")
    .map((statement) => statement.trim())
    .filter((statement) => statement.length > 0);
}

export async function loadSchemaStatements(): Promise<string[]> {
  return splitStatements(await readFile(SCHEMA_FILE, "utf8"));
}

/**
 * Creates the tables that do not exist yet. DDL commits implicitly in
 * MySQL, so this runs outside a transaction.
 */
export async function ensureSchema(pool: SqlPool): Promise<number> {
  const statements = await loadSchemaStatements();
  const conn = await pool.getConnection();
  try {
    for (const statement of statements) {
      await conn.query(statement);
    }
  } finally {
    conn.release();
  }
  return statements.length;
}
