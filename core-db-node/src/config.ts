// ===============================
// Config (MySQL)
// ===============================
export interface DatabaseConfig {
  host: string;
  user: string;
  password: string;
  port: number;
  database: string;
  connectionLimit: number;
}

export function loadDatabaseConfig(
  env: NodeJS.ProcessEnv = process.env
): DatabaseConfig {
  return {
    host: env.MYSQL_HOST ?? "localhost",
    user: env.MYSQL_USER ?? "root",
    password: env.MYSQL_PASSWORD ?? "root",
    port: Number(env.MYSQL_PORT ?? 3306),
    database: env.MYSQL_DATABASE ?? "fitness_tracker",
    connectionLimit: Number(env.MYSQL_CONNECTION_LIMIT ?? 10),
  };
}
