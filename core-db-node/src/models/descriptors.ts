import type { z } from "zod";
import { ConstraintViolation } from "../errors";
import { wholeMinutesBetween } from "../sessionPlan";
import {
  exerciseLogSchemas,
  exerciseSchemas,
  userSchemas,
  workoutSessionSchemas,
  workoutTypeSchemas,
  type CreateInputMap,
  type EntityKind,
  type EntityMap,
  type NewEntityMap,
  type NewWorkoutSession,
  type PatchInputMap,
  type PatchMap,
} from "./entities";

export type Column<K extends EntityKind> = keyof EntityMap[K] & string;

export const TIMESTAMP_COLUMNS = [
  "created_timestamp",
  "last_edited_timestamp",
] as const;

export interface Reference<K extends EntityKind> {
  column: Column<K>;
  target: EntityKind;
}

/** Rows of another entity that point at this one. */
export interface Dependent {
  kind: EntityKind;
  column: string;
  onDelete: "restrict" | "cascade";
}

export interface EntityDescriptor<K extends EntityKind> {
  kind: K;
  label: string;
  table: string;
  key: Column<K>;
  /** Data columns in storage order, without the key and the timestamps. */
  columns: readonly Column<K>[];
  create: z.ZodType<NewEntityMap[K], z.ZodTypeDef, CreateInputMap[K]>;
  patch: z.ZodType<PatchMap[K], z.ZodTypeDef, PatchInputMap[K]>;
  record: z.ZodType<EntityMap[K], z.ZodTypeDef, unknown>;
  references: readonly Reference<K>[];
  dependents: readonly Dependent[];
  /** Enforced by the repository before every write. */
  unique: readonly Column<K>[];
  /**
   * Cross-field rules applied after validation. `supplied` holds the
   * fields the caller set explicitly in this write.
   */
  settle?(fields: NewEntityMap[K], supplied: ReadonlySet<string>): NewEntityMap[K];
}

/**
 * Keeps `end_time >= start_time` and derives `total_duration` (whole minutes)
 * whenever both ends of the session are known.
 */
export function settleSessionTiming(
  fields: NewWorkoutSession,
  supplied: ReadonlySet<string>
): NewWorkoutSession {
  const { start_time, end_time } = fields;
  if (!start_time || !end_time) return fields;

  if (end_time.getTime() < start_time.getTime()) {
    throw new ConstraintViolation(
      "end_time must not be earlier than start_time",
      "workoutSession"
    );
  }

  const minutes = wholeMinutesBetween(start_time, end_time);
  if (
    supplied.has("total_duration") &&
    fields.total_duration !== null &&
    fields.total_duration !== minutes
  ) {
    throw new ConstraintViolation(
      `total_duration ${fields.total_duration} does not match the ${minutes} minutes between start_time and end_time`,
      "workoutSession"
    );
  }

  return { ...fields, total_duration: minutes };
}

type DescriptorRegistry = { readonly [K in EntityKind]: EntityDescriptor<K> };

export const DESCRIPTORS: DescriptorRegistry = {
  user: {
    kind: "user",
    label: "User",
    table: "users",
    key: "user_id",
    columns: ["username", "email", "password_hash", "first_name", "last_name"],
    ...userSchemas,
    references: [],
    dependents: [{ kind: "workoutSession", column: "user_id", onDelete: "restrict" }],
    unique: ["username", "email"],
  },
  workoutType: {
    kind: "workoutType",
    label: "WorkoutType",
    table: "workout_types",
    key: "workout_type_id",
    columns: [
      "workout_name",
      "muscle_group_targeted",
      "category_type",
      "description",
      "difficulty_level",
    ],
    ...workoutTypeSchemas,
    references: [],
    dependents: [{ kind: "exercise", column: "workout_type_id", onDelete: "restrict" }],
    unique: [],
  },
  exercise: {
    kind: "exercise",
    label: "Exercise",
    table: "exercises",
    key: "exercise_id",
    columns: [
      "workout_type_id",
      "exercise_name",
      "description",
      "equipment_required",
      "primary_muscle_group",
      "difficulty_level",
      "calories_burned_per_minute",
      "muscle_groups_secondary",
      "video_tutorial_link",
      "image_url",
    ],
    ...exerciseSchemas,
    references: [{ column: "workout_type_id", target: "workoutType" }],
    dependents: [{ kind: "exerciseLog", column: "exercise_id", onDelete: "restrict" }],
    unique: [],
  },
  workoutSession: {
    kind: "workoutSession",
    label: "WorkoutSession",
    table: "workout_sessions",
    key: "session_id",
    columns: [
      "user_id",
      "workout_date",
      "start_time",
      "end_time",
      "total_duration",
      "location",
      "perceived_exertion",
      "notes",
      "workout_source",
    ],
    ...workoutSessionSchemas,
    references: [{ column: "user_id", target: "user" }],
    // a session owns its logs
    dependents: [{ kind: "exerciseLog", column: "session_id", onDelete: "cascade" }],
    unique: [],
    settle: settleSessionTiming,
  },
  exerciseLog: {
    kind: "exerciseLog",
    label: "ExerciseLog",
    table: "exercise_logs",
    key: "exercise_log_id",
    columns: [
      "session_id",
      "exercise_id",
      "set_number",
      "repetitions",
      "weight",
      "duration",
      "rest_time",
      "notes",
      "difficulty_level",
    ],
    ...exerciseLogSchemas,
    references: [
      { column: "session_id", target: "workoutSession" },
      { column: "exercise_id", target: "exercise" },
    ],
    dependents: [],
    unique: [],
  },
};

export function descriptorFor<K extends EntityKind>(kind: K): EntityDescriptor<K> {
  return DESCRIPTORS[kind];
}
