import mysql from "mysql2/promise";
import type { DatabaseConfig } from "../config";

/**
 * Pool shared by the MySQL store and the schema bootstrap.
 * Timestamps travel as UTC `Date` objects in both directions.
 */
export function createPool(config: DatabaseConfig): mysql.Pool {
  return mysql.createPool({
    host: config.host,
    user: config.user,
    password: config.password,
    port: config.port,
    database: config.database,
    waitForConnections: true,
    connectionLimit: config.connectionLimit,
    timezone: "Z",
    dateStrings: false,
  });
}
