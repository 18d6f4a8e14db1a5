import { z } from "zod";

// ===============================
// Field building blocks
// ===============================
const key = z.number().int().positive();
const requiredText = z.string().trim().min(1);
const optionalText = z.string().trim().nullable().default(null);
const optionalCount = z.number().int().nonnegative().nullable().default(null);
const optionalAmount = z.number().nonnegative().nullable().default(null);
const optionalDate = z.date().nullable().default(null);

const timestamps = {
  created_timestamp: z.date(),
  last_edited_timestamp: z.date(),
};

// ===============================
// Users
// ===============================
const userFields = z.object({
  username: requiredText,
  email: requiredText,
  password_hash: z.string().min(1),
  first_name: optionalText,
  last_name: optionalText,
});

// Stored lower-case; the unique index compares emails without case.
const emailInput = z.string().trim().toLowerCase().email();

export const userSchemas = {
  create: userFields.extend({ email: emailInput }).strict(),
  patch: userFields.extend({ email: emailInput }).partial().strict(),
  record: userFields.extend({ user_id: key, ...timestamps }),
};

// ===============================
// Workout types
// ===============================
const workoutTypeFields = z.object({
  workout_name: requiredText,
  muscle_group_targeted: requiredText,
  category_type: optionalText,
  description: optionalText,
  difficulty_level: optionalText,
});

export const workoutTypeSchemas = {
  create: workoutTypeFields.strict(),
  patch: workoutTypeFields.partial().strict(),
  record: workoutTypeFields.extend({ workout_type_id: key, ...timestamps }),
};

// ===============================
// Exercises
// ===============================
const exerciseFields = z.object({
  workout_type_id: key,
  exercise_name: requiredText,
  description: optionalText,
  equipment_required: optionalText,
  primary_muscle_group: optionalText,
  difficulty_level: optionalText,
  calories_burned_per_minute: optionalAmount,
  // comma separated, e.g. "Triceps, Shoulders"
  muscle_groups_secondary: optionalText,
  video_tutorial_link: optionalText,
  image_url: optionalText,
});

export const exerciseSchemas = {
  create: exerciseFields.strict(),
  patch: exerciseFields.partial().strict(),
  record: exerciseFields.extend({ exercise_id: key, ...timestamps }),
};

// ===============================
// Workout sessions
// ===============================
const workoutSessionFields = z.object({
  user_id: key,
  workout_date: z.date(),
  start_time: optionalDate,
  end_time: optionalDate,
  // minutes
  total_duration: optionalCount,
  location: optionalText,
  perceived_exertion: optionalCount,
  notes: optionalText,
  workout_source: optionalText,
});

export const workoutSessionSchemas = {
  create: workoutSessionFields.strict(),
  patch: workoutSessionFields.partial().strict(),
  record: workoutSessionFields.extend({ session_id: key, ...timestamps }),
};

// ===============================
// Exercise logs (one row per set)
// ===============================
const exerciseLogFields = z.object({
  session_id: key,
  exercise_id: key,
  set_number: z.number().int().min(1).nullable().default(null),
  repetitions: optionalCount,
  weight: optionalAmount,
  // seconds
  duration: optionalCount,
  rest_time: optionalCount,
  notes: optionalText,
  difficulty_level: optionalText,
});

export const exerciseLogSchemas = {
  create: exerciseLogFields.strict(),
  patch: exerciseLogFields.partial().strict(),
  record: exerciseLogFields.extend({ exercise_log_id: key, ...timestamps }),
};

// ===============================
// Types
// ===============================
export type User = z.output<typeof userSchemas.record>;
export type WorkoutType = z.output<typeof workoutTypeSchemas.record>;
export type Exercise = z.output<typeof exerciseSchemas.record>;
export type WorkoutSession = z.output<typeof workoutSessionSchemas.record>;
export type ExerciseLog = z.output<typeof exerciseLogSchemas.record>;

export interface EntityMap {
  user: User;
  workoutType: WorkoutType;
  exercise: Exercise;
  workoutSession: WorkoutSession;
  exerciseLog: ExerciseLog;
}

export type EntityKind = keyof EntityMap;

/** What callers pass to `create`. */
export interface CreateInputMap {
  user: z.input<typeof userSchemas.create>;
  workoutType: z.input<typeof workoutTypeSchemas.create>;
  exercise: z.input<typeof exerciseSchemas.create>;
  workoutSession: z.input<typeof workoutSessionSchemas.create>;
  exerciseLog: z.input<typeof exerciseLogSchemas.create>;
}

/** Validated fields of a row about to be inserted (no key, no timestamps). */
export interface NewEntityMap {
  user: z.output<typeof userSchemas.create>;
  workoutType: z.output<typeof workoutTypeSchemas.create>;
  exercise: z.output<typeof exerciseSchemas.create>;
  workoutSession: z.output<typeof workoutSessionSchemas.create>;
  exerciseLog: z.output<typeof exerciseLogSchemas.create>;
}

/** What callers pass to `update`. */
export interface PatchInputMap {
  user: z.input<typeof userSchemas.patch>;
  workoutType: z.input<typeof workoutTypeSchemas.patch>;
  exercise: z.input<typeof exerciseSchemas.patch>;
  workoutSession: z.input<typeof workoutSessionSchemas.patch>;
  exerciseLog: z.input<typeof exerciseLogSchemas.patch>;
}

export interface PatchMap {
  user: z.output<typeof userSchemas.patch>;
  workoutType: z.output<typeof workoutTypeSchemas.patch>;
  exercise: z.output<typeof exerciseSchemas.patch>;
  workoutSession: z.output<typeof workoutSessionSchemas.patch>;
  exerciseLog: z.output<typeof exerciseLogSchemas.patch>;
}

export type CreateInput<K extends EntityKind> = CreateInputMap[K];
export type PatchInput<K extends EntityKind> = PatchInputMap[K];
export type NewEntity<K extends EntityKind> = NewEntityMap[K];

export type NewWorkoutSession = NewEntity<"workoutSession">;
