export * from "./errors";
export * from "./models/entities";
export { DESCRIPTORS, descriptorFor } from "./models/descriptors";
export type { Column, Dependent, EntityDescriptor, Reference } from "./models/descriptors";
export { WorkoutRepository } from "./repository";
export type {
  ListOptions,
  RecordedSession,
  RegisterUserInput,
  RepositoryOptions,
  SerializedEntity,
  SessionDetails,
} from "./repository";
export { hashPassword, SALT_ROUNDS } from "./passwords";
export {
  DEFAULT_SETS_PER_EXERCISE,
  HEAVY_MUSCLE_GROUPS,
  planSets,
  wholeMinutesBetween,
  workingWeight,
} from "./sessionPlan";
export type { PlannedSet } from "./sessionPlan";
export { MemoryStore } from "./store/memoryStore";
export { MysqlStore, translateDriverError } from "./store/mysqlStore";
export type { MysqlStoreOptions, SqlConnection, SqlPool } from "./store/mysqlStore";
export type {
  Filter,
  Logger,
  Row,
  SelectOptions,
  SqlValue,
  StoreTransaction,
  WorkoutStore,
} from "./store/store";
export { loadDatabaseConfig } from "./config";
export type { DatabaseConfig } from "./config";
export { createPool } from "./db/pool";
export { ensureSchema, loadSchemaStatements, splitStatements } from "./db/schema";
