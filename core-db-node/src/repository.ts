import type { z } from "zod";
import { ConstraintViolation, DependencyConflict, NotFound, Precondition } from "./errors";
import {
  descriptorFor,
  TIMESTAMP_COLUMNS,
  type EntityDescriptor,
} from "./models/descriptors";
import type {
  CreateInput,
  EntityKind,
  EntityMap,
  Exercise,
  ExerciseLog,
  NewEntity,
  PatchInput,
  User,
  WorkoutSession,
  WorkoutType,
} from "./models/entities";
import { hashPassword } from "./passwords";
import { DEFAULT_SETS_PER_EXERCISE, planSets } from "./sessionPlan";
import {
  toSqlValue,
  type Logger,
  type Row,
  type StoreTransaction,
  type WorkoutStore,
} from "./store/store";

export interface RepositoryOptions {
  clock?: () => Date;
  logger?: Logger;
  /** bcrypt cost used by `registerUser`. */
  passwordRounds?: number;
}

export interface ListOptions {
  limit?: number;
}

export interface RegisterUserInput {
  username: string;
  email: string;
  password: string;
  first_name?: string | null;
  last_name?: string | null;
}

export type SessionDetails = Pick<
  CreateInput<"workoutSession">,
  "location" | "perceived_exertion" | "notes" | "workout_source"
>;

export interface RecordedSession {
  session: WorkoutSession;
  logs: ExerciseLog[];
}

export type SerializedEntity = Record<string, string | number | null>;

// ===============================
// Helpers
// ===============================
function parseOrThrow<Output, Input>(
  schema: z.ZodType<Output, z.ZodTypeDef, Input>,
  input: unknown,
  kind: EntityKind
): Output {
  const parsed = schema.safeParse(input);
  if (parsed.success) return parsed.data;

  const issues = parsed.error.issues.map(
    (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`
  );
  throw new ConstraintViolation(
    `Invalid ${kind}: ${issues.join("; ")}`,
    kind,
    issues
  );
}

function suppliedKeys(values: object): Set<string> {
  return new Set(
    Object.entries(values)
      .filter(([, value]) => value !== undefined)
      .map(([column]) => column)
  );
}

function toRow(values: object, columns: readonly string[]): Row {
  const row: Row = {};
  for (const [column, value] of Object.entries(values)) {
    if (columns.includes(column)) row[column] = toSqlValue(column, value);
  }
  return row;
}

function allColumns<K extends EntityKind>(d: EntityDescriptor<K>): string[] {
  return [d.key, ...d.columns, ...TIMESTAMP_COLUMNS];
}

// ===============================
// Repository
// ===============================

/**
 * Persistence entry point for users, workout types, exercises, workout
 * sessions and exercise logs. Every public operation runs in exactly one
 * store transaction.
 *
 * Delete policy: a session takes its exercise logs with it; every other
 * relation is restricted (users with sessions, workout types with
 * exercises, exercises with logs).
 */
export class WorkoutRepository {
  private readonly clock: () => Date;
  private readonly logger: Logger;
  private readonly passwordRounds: number | undefined;

  constructor(
    private readonly store: WorkoutStore,
    options: RepositoryOptions = {}
  ) {
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? console;
    this.passwordRounds = options.passwordRounds;
  }

  // ===============================
  // CRUD
  // ===============================
  create<K extends EntityKind>(kind: K, input: CreateInput<K>): Promise<EntityMap[K]> {
    return this.store.transaction((tx) => this.insert(tx, kind, input));
  }

  get<K extends EntityKind>(kind: K, key: number): Promise<EntityMap[K]> {
    return this.store.transaction((tx) => this.load(tx, kind, key));
  }

  find<K extends EntityKind>(kind: K, key: number): Promise<EntityMap[K] | null> {
    return this.store.transaction((tx) => this.lookup(tx, kind, key));
  }

  update<K extends EntityKind>(
    kind: K,
    key: number,
    patch: PatchInput<K>
  ): Promise<EntityMap[K]> {
    return this.store.transaction((tx) => this.modify(tx, kind, key, patch));
  }

  delete(kind: EntityKind, key: number): Promise<void> {
    return this.store.transaction((tx) => this.remove(tx, kind, key));
  }

  list<K extends EntityKind>(kind: K, options: ListOptions = {}): Promise<EntityMap[K][]> {
    const d = descriptorFor(kind);
    return this.store.transaction(async (tx) => {
      const { limit } = options;
      if (limit !== undefined && !(Number.isInteger(limit) && limit >= 0)) {
        throw new ConstraintViolation(
          `limit must be a non-negative integer, got ${limit}`,
          kind,
          ["limit: must be a non-negative integer"]
        );
      }
      const rows = await tx.select(d.table, allColumns(d), undefined, {
        orderBy: d.key,
        limit,
      });
      return rows.map((row) => d.record.parse(row));
    });
  }

  // ===============================
  // Relationships
  // ===============================
  sessionsForUser(userId: number): Promise<WorkoutSession[]> {
    return this.children("user", userId, "workoutSession", "user_id");
  }

  exercisesForWorkoutType(workoutTypeId: number): Promise<Exercise[]> {
    return this.children("workoutType", workoutTypeId, "exercise", "workout_type_id");
  }

  logsForSession(sessionId: number): Promise<ExerciseLog[]> {
    return this.children("workoutSession", sessionId, "exerciseLog", "session_id");
  }

  logsForExercise(exerciseId: number): Promise<ExerciseLog[]> {
    return this.children("exercise", exerciseId, "exerciseLog", "exercise_id");
  }

  userByUsername(username: string): Promise<User | null> {
    const d = descriptorFor("user");
    return this.store.transaction(async (tx) => {
      const [row] = await tx.select(d.table, allColumns(d), {
        column: "username",
        value: username.trim(),
      });
      return row ? d.record.parse(row) : null;
    });
  }

  // ===============================
  // Composite operations
  // ===============================
  async registerUser(input: RegisterUserInput): Promise<User> {
    if (!input.password) {
      throw new ConstraintViolation("password is required", "user", ["password: Required"]);
    }
    const { password, ...profile } = input;
    const password_hash = await hashPassword(password, this.passwordRounds);
    return this.create("user", { ...profile, password_hash });
  }

  /** Not idempotent: every call inserts a new row. */
  seedWorkoutType(fields: CreateInput<"workoutType">): Promise<WorkoutType> {
    return this.create("workoutType", fields);
  }

  /**
   * Records a finished session for `userId`: `setsPerExercise` logs per
   * exercise, then closes the session and stores its duration. Nothing is
   * kept if any step fails.
   */
  recordWorkoutSession(
    userId: number,
    exerciseIds: readonly number[],
    setsPerExercise: number = DEFAULT_SETS_PER_EXERCISE,
    details: SessionDetails = {}
  ): Promise<RecordedSession> {
    return this.store.transaction(async (tx) => {
      if (exerciseIds.length === 0) {
        throw new Precondition("At least one exercise is required", "workoutSession");
      }
      if (!Number.isInteger(setsPerExercise) || setsPerExercise < 1) {
        throw new Precondition(
          `setsPerExercise must be a positive integer, got ${setsPerExercise}`,
          "workoutSession"
        );
      }
      if (!(await this.lookup(tx, "user", userId))) {
        throw new Precondition(`User ${userId} does not exist`, "user");
      }

      const exercises: Exercise[] = [];
      const missing: number[] = [];
      for (const exerciseId of exerciseIds) {
        const exercise = await this.lookup(tx, "exercise", exerciseId);
        if (exercise) exercises.push(exercise);
        else missing.push(exerciseId);
      }
      if (missing.length > 0) {
        throw new Precondition(`Unknown exercises: ${missing.join(", ")}`, "exercise");
      }

      const startedAt = this.clock();
      const started = await this.insert(tx, "workoutSession", {
        ...details,
        user_id: userId,
        workout_date: startedAt,
        start_time: startedAt,
      });

      const logs: ExerciseLog[] = [];
      for (const exercise of exercises) {
        for (const set of planSets(exercise, setsPerExercise)) {
          logs.push(
            await this.insert(tx, "exerciseLog", { ...set, session_id: started.session_id })
          );
        }
      }

      const session = await this.modify(tx, "workoutSession", started.session_id, {
        end_time: this.clock(),
      });

      this.logger.log(
        `[Workouts] Session ${session.session_id} recorded for user ${userId}: ${logs.length} sets, ${session.total_duration} min`
      );
      return { session, logs };
    });
  }

  // ===============================
  // Serialization
  // ===============================

  /** Plain object over the entity's declared columns; dates as ISO strings. */
  serialize<K extends EntityKind>(kind: K, entity: EntityMap[K]): SerializedEntity {
    const d = descriptorFor(kind);
    const out: SerializedEntity = {};
    const columns = [d.key, ...d.columns];
    for (const column of columns) {
      const value = toSqlValue(column, entity[column]);
      out[column] = value instanceof Date ? value.toISOString() : value;
    }
    out.created_timestamp = entity.created_timestamp.toISOString();
    out.last_edited_timestamp = entity.last_edited_timestamp.toISOString();
    return out;
  }

  /** Debug form, e.g. `<WorkoutType(workout_type_id=1, workout_name=Yoga, ...)>`. */
  describe<K extends EntityKind>(kind: K, entity: EntityMap[K]): string {
    const fields = Object.entries(this.serialize(kind, entity))
      .map(([column, value]) => `${column}=${value}`)
      .join(", ");
    return `<${descriptorFor(kind).label}(${fields})>`;
  }

  async close(): Promise<void> {
    await this.store.close();
  }

  // ===============================
  // Transaction-scoped steps
  // ===============================
  private async lookup<K extends EntityKind>(
    tx: StoreTransaction,
    kind: K,
    key: number
  ): Promise<EntityMap[K] | null> {
    const d = descriptorFor(kind);
    const [row] = await tx.select(d.table, allColumns(d), { column: d.key, value: key });
    return row ? d.record.parse(row) : null;
  }

  private async load<K extends EntityKind>(
    tx: StoreTransaction,
    kind: K,
    key: number
  ): Promise<EntityMap[K]> {
    const entity = await this.lookup(tx, kind, key);
    if (!entity) throw new NotFound(kind, key);
    return entity;
  }

  private async insert<K extends EntityKind>(
    tx: StoreTransaction,
    kind: K,
    input: CreateInput<K>
  ): Promise<EntityMap[K]> {
    const d = descriptorFor(kind);
    const parsed = parseOrThrow(d.create, input, kind);
    const fields = d.settle ? d.settle(parsed, suppliedKeys(input)) : parsed;

    const row = toRow(fields, d.columns);
    await this.checkReferences(tx, d, row);
    await this.checkUnique(tx, d, row, null);

    const now = this.clock();
    const key = await tx.insert(d.table, d.key, {
      ...row,
      created_timestamp: now,
      last_edited_timestamp: now,
    });
    return this.load(tx, kind, key);
  }

  private async modify<K extends EntityKind>(
    tx: StoreTransaction,
    kind: K,
    key: number,
    patch: PatchInput<K>
  ): Promise<EntityMap[K]> {
    const d = descriptorFor(kind);
    const existing = await this.load(tx, kind, key);
    const changes = parseOrThrow(d.patch, patch, kind);

    const current: Record<string, unknown> = {};
    for (const column of d.columns) current[column] = existing[column];
    for (const [column, value] of Object.entries(changes)) {
      if (value !== undefined) current[column] = value;
    }

    const merged: NewEntity<K> = parseOrThrow(d.create, current, kind);
    const fields = d.settle ? d.settle(merged, suppliedKeys(patch)) : merged;

    const row = toRow(fields, d.columns);
    await this.checkReferences(tx, d, row);
    await this.checkUnique(tx, d, row, key);

    const previous = existing.last_edited_timestamp;
    const now = this.clock();
    await tx.update(d.table, { column: d.key, value: key }, {
      ...row,
      last_edited_timestamp: now.getTime() < previous.getTime() ? previous : now,
    });
    return this.load(tx, kind, key);
  }

  private async remove(tx: StoreTransaction, kind: EntityKind, key: number): Promise<void> {
    const d = descriptorFor(kind);
    await this.load(tx, kind, key);

    const blocking: EntityKind[] = [];
    for (const dependent of d.dependents) {
      if (dependent.onDelete !== "restrict") continue;
      const table = descriptorFor(dependent.kind).table;
      if ((await tx.count(table, { column: dependent.column, value: key })) > 0) {
        blocking.push(dependent.kind);
      }
    }
    if (blocking.length > 0) {
      throw new DependencyConflict(
        `Cannot delete ${kind} ${key}: still referenced by ${blocking.join(", ")}`,
        kind,
        blocking
      );
    }

    for (const dependent of d.dependents) {
      if (dependent.onDelete !== "cascade") continue;
      await tx.remove(descriptorFor(dependent.kind).table, {
        column: dependent.column,
        value: key,
      });
    }
    await tx.remove(d.table, { column: d.key, value: key });
  }

  private async children<P extends EntityKind, C extends EntityKind>(
    parent: P,
    parentKey: number,
    child: C,
    column: string
  ): Promise<EntityMap[C][]> {
    return this.store.transaction(async (tx) => {
      await this.load(tx, parent, parentKey);
      const d = descriptorFor(child);
      const rows = await tx.select(
        d.table,
        allColumns(d),
        { column, value: parentKey },
        { orderBy: d.key }
      );
      return rows.map((row) => d.record.parse(row));
    });
  }

  private async checkReferences<K extends EntityKind>(
    tx: StoreTransaction,
    d: EntityDescriptor<K>,
    row: Row
  ): Promise<void> {
    for (const reference of d.references) {
      const value = row[reference.column];
      if (value === null || value === undefined) continue;

      const target = descriptorFor(reference.target);
      const found = await tx.count(target.table, { column: target.key, value });
      if (found === 0) {
        throw new ConstraintViolation(
          `${reference.column} ${String(value)} does not reference an existing ${reference.target}`,
          d.kind,
          [`${reference.column}: dangling reference`]
        );
      }
    }
  }

  private async checkUnique<K extends EntityKind>(
    tx: StoreTransaction,
    d: EntityDescriptor<K>,
    row: Row,
    selfKey: number | null
  ): Promise<void> {
    for (const column of d.unique) {
      const value = row[column];
      if (value === null || value === undefined) continue;

      const holders = await tx.select(d.table, [d.key], { column, value });
      if (holders.some((holder) => holder[d.key] !== selfKey)) {
        throw new ConstraintViolation(
          `${d.kind} with ${column} ${String(value)} already exists`,
          d.kind,
          [`${column}: must be unique`]
        );
      }
    }
  }
}
