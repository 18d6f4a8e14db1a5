import { readFileSync } from "node:fs";
import { describe, expect, it } from "vitest";
import type { SqlConnection, SqlPool } from "../store/mysqlStore";
import { ensureSchema, loadSchemaStatements, splitStatements } from "./schema";

const schema = readFileSync(new URL("./schema.sql", import.meta.url), "utf8");

describe("splitStatements", () => {
  it("drops comment lines and empty statements", () => {
    const script = "-- header\nCREATE TABLE a (id INT);\n\n  -- note\nCREATE TABLE b (id INT);\n";
    expect(splitStatements(script)).toEqual(["CREATE TABLE a (id INT)", "CREATE TABLE b (id INT)"]);
  });
});

describe("schema.sql", () => {
  it("creates the five tables", async () => {
    const statements = await loadSchemaStatements();
    expect(statements.map((s) => /CREATE TABLE IF NOT EXISTS (\w+)/.exec(s)?.[1])).toEqual([
      "users",
      "workout_types",
      "exercises",
      "workout_sessions",
      "exercise_logs",
    ]);
  });

  it("restricts deletes except for a session's logs", () => {
    expect(schema).toMatch(/REFERENCES workout_types \(workout_type_id\) ON DELETE RESTRICT/);
    expect(schema).toMatch(/REFERENCES users \(user_id\) ON DELETE RESTRICT/);
    expect(schema).toMatch(/REFERENCES exercises \(exercise_id\) ON DELETE RESTRICT/);
    expect(schema).toMatch(/REFERENCES workout_sessions \(session_id\) ON DELETE CASCADE/);
  });

  it("checks set numbers and session times", () => {
    expect(schema).toContain("CHECK (set_number IS NULL OR set_number >= 1)");
    expect(schema).toContain(
      "CHECK (end_time IS NULL OR start_time IS NULL OR end_time >= start_time)"
    );
  });

  it("keeps usernames and emails unique", () => {
    expect(schema).toContain("UNIQUE KEY uq_users_username (username)");
    expect(schema).toContain("UNIQUE KEY uq_users_email (email)");
  });

  it("refreshes last_edited_timestamp on update in every table", () => {
    const refreshed = schema.match(
      /last_edited_timestamp DATETIME\(3\) NOT NULL DEFAULT CURRENT_TIMESTAMP\(3\) ON UPDATE CURRENT_TIMESTAMP\(3\)/g
    );
    expect(refreshed).toHaveLength(5);
  });
});

describe("ensureSchema", () => {
  it("runs every statement on one connection and releases it", async () => {
    const executed: string[] = [];
    let released = false;
    const conn: SqlConnection = {
      query: async (sql) => {
        executed.push(sql);
        return [{ affectedRows: 0 }, []];
      },
      beginTransaction: async () => undefined,
      commit: async () => undefined,
      rollback: async () => undefined,
      release: () => {
        released = true;
      },
    };
    const pool: SqlPool = { getConnection: async () => conn, end: async () => undefined };

    await expect(ensureSchema(pool)).resolves.toBe(5);
    expect(executed).toHaveLength(5);
    expect(released).toBe(true);
  });
});
