// src/seed.ts
import { pathToFileURL } from "node:url";
import { loadDatabaseConfig } from "./config";
import { createPool } from "./db/pool";
import { ensureSchema } from "./db/schema";
import { WorkoutRepository } from "./repository";
import { MysqlStore } from "./store/mysqlStore";
import type { Logger } from "./store/store";

const DEMO_USERNAME = "demo";

// ===============================
// Example rows
// ===============================
export interface SeedResult {
  workoutTypeId: number;
  sessionId: number | null;
}

export async function seed(
  repo: WorkoutRepository,
  logger: Logger = console
): Promise<SeedResult> {
  const workoutType = await repo.seedWorkoutType({
    workout_name: "Strength Training",
    muscle_group_targeted: "Full Body",
    category_type: "Weightlifting",
    description: "A high-intensity workout for muscle building.",
  });
  logger.log(`[Seed] WorkoutType ${workoutType.workout_type_id} created`);

  const exercises = await repo.list("exercise", { limit: 3 });
  if (exercises.length === 0) {
    logger.log("[Seed] No exercises yet, skipping the example session");
    return { workoutTypeId: workoutType.workout_type_id, sessionId: null };
  }

  const user =
    (await repo.userByUsername(DEMO_USERNAME)) ??
    (await repo.registerUser({
      username: DEMO_USERNAME,
      email: "demo@example.com",
      password: "demo-password",
    }));

  const { session, logs } = await repo.recordWorkoutSession(
    user.user_id,
    exercises.map((exercise) => exercise.exercise_id),
    3,
    { location: "Home Gym", perceived_exertion: 7, notes: "Felt strong today" }
  );
  logger.log(
    `[Seed] Session ${session.session_id}: ${logs.length} sets, ${session.total_duration} min`
  );

  return {
    workoutTypeId: workoutType.workout_type_id,
    sessionId: session.session_id,
  };
}

async function main(): Promise<void> {
  const pool = createPool(loadDatabaseConfig());
  const repo = new WorkoutRepository(new MysqlStore(pool));

  try {
    const statements = await ensureSchema(pool);
    console.log(`[Seed] Schema ready (${statements} tables)`);
    await seed(repo);
  } finally {
    await repo.close();
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().catch((error) => {
    console.error("[Seed] ERROR:", error);
    process.exitCode = 1;
  });
}
