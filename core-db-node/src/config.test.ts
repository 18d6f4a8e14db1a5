import { describe, expect, it } from "vitest";
import { loadDatabaseConfig } from "./config";

describe("loadDatabaseConfig", () => {
  it("falls back to local defaults", () => {
    expect(loadDatabaseConfig({})).toEqual({
      host: "localhost",
      user: "root",
      password: "root",
      port: 3306,
      database: "fitness_tracker",
      connectionLimit: 10,
    });
  });

  it("reads MYSQL_* variables", () => {
    const config = loadDatabaseConfig({
      MYSQL_HOST: "db",
      MYSQL_USER: "app",
      MYSQL_PASSWORD: "test-secret",
      MYSQL_PORT: "3307",
      MYSQL_DATABASE: "gym",
      MYSQL_CONNECTION_LIMIT: "4",
    });

    expect(config).toEqual({
      host: "db",
      user: "app",
      password: "test-secret",
      port: 3307,
      database: "gym",
      connectionLimit: 4,
    });
  });
});
