import type { Exercise } from "./models/entities";

// ===============================
// Recorded session rules
// ===============================
export const DEFAULT_SETS_PER_EXERCISE = 3;

/** Muscle groups that get the heavier working weight. */
export const HEAVY_MUSCLE_GROUPS: readonly string[] = ["Chest", "Back", "Legs"];

const HEAVY_WEIGHT = 50.0;
const LIGHT_WEIGHT = 25.0;
const WORKING_REPS = 10;
const LAST_SET_REPS = 8;
const REST_SECONDS = 60;
const SET_DIFFICULTY = "Medium";

export interface PlannedSet {
  exercise_id: number;
  set_number: number;
  repetitions: number;
  weight: number;
  rest_time: number;
  difficulty_level: string;
}

export function workingWeight(
  exercise: Pick<Exercise, "primary_muscle_group">
): number {
  const group = exercise.primary_muscle_group;
  return group !== null && HEAVY_MUSCLE_GROUPS.includes(group)
    ? HEAVY_WEIGHT
    : LIGHT_WEIGHT;
}

/**
 * Sets 1..N for one exercise. Every set is 10 reps except the last, which
 * drops to 8.
 */
export function planSets(
  exercise: Pick<Exercise, "exercise_id" | "primary_muscle_group">,
  setsPerExercise: number = DEFAULT_SETS_PER_EXERCISE
): PlannedSet[] {
  const weight = workingWeight(exercise);
  const sets: PlannedSet[] = [];

  for (let setNumber = 1; setNumber <= setsPerExercise; setNumber++) {
    sets.push({
      exercise_id: exercise.exercise_id,
      set_number: setNumber,
      repetitions: setNumber < setsPerExercise ? WORKING_REPS : LAST_SET_REPS,
      weight,
      rest_time: REST_SECONDS,
      difficulty_level: SET_DIFFICULTY,
    });
  }

  return sets;
}

export function wholeMinutesBetween(start: Date, end: Date): number {
  return Math.floor((end.getTime() - start.getTime()) / 60_000);
}
