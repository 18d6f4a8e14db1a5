import { describe, expect, it } from "vitest";
import { ConstraintViolation } from "../errors";
import { DESCRIPTORS, descriptorFor, settleSessionTiming } from "./descriptors";
import type { NewWorkoutSession } from "./entities";

const base: NewWorkoutSession = {
  user_id: 1,
  workout_date: new Date("2026-03-02T00:00:00.000Z"),
  start_time: null,
  end_time: null,
  total_duration: null,
  location: null,
  perceived_exertion: null,
  notes: null,
  workout_source: null,
};

describe("settleSessionTiming", () => {
  it("leaves open sessions alone", () => {
    const open = { ...base, start_time: new Date("2026-03-02T10:00:00.000Z") };
    expect(settleSessionTiming(open, new Set())).toBe(open);
  });

  it("fills in the duration when both ends are known", () => {
    const settled = settleSessionTiming(
      {
        ...base,
        start_time: new Date("2026-03-02T10:00:00.000Z"),
        end_time: new Date("2026-03-02T10:59:59.000Z"),
        total_duration: 12,
      },
      new Set(["end_time"])
    );
    expect(settled.total_duration).toBe(59);
  });

  it("rejects a supplied duration that disagrees", () => {
    expect(() =>
      settleSessionTiming(
        {
          ...base,
          start_time: new Date("2026-03-02T10:00:00.000Z"),
          end_time: new Date("2026-03-02T10:30:00.000Z"),
          total_duration: 25,
        },
        new Set(["total_duration"])
      )
    ).toThrow(ConstraintViolation);
  });
});

describe("descriptors", () => {
  it("looks descriptors up by kind", () => {
    expect(descriptorFor("exerciseLog").table).toBe("exercise_logs");
    expect(descriptorFor("workoutSession").key).toBe("session_id");
  });

  it("restricts every relation except session logs", () => {
    const policies = Object.values(DESCRIPTORS).flatMap((d) =>
      d.dependents.map((dep) => `${d.kind}->${dep.kind}:${dep.onDelete}`)
    );
    expect(policies).toEqual([
      "user->workoutSession:restrict",
      "workoutType->exercise:restrict",
      "exercise->exerciseLog:restrict",
      "workoutSession->exerciseLog:cascade",
    ]);
  });

  it("takes exercise links as plain text", () => {
    const { create, record } = descriptorFor("exercise");

    const parsed = create.parse({
      workout_type_id: 1,
      exercise_name: "Plank",
      image_url: " /img/plank.png ",
      video_tutorial_link: "videos/plank.mp4",
    });
    expect(parsed.image_url).toBe("/img/plank.png");
    expect(parsed.video_tutorial_link).toBe("videos/plank.mp4");

    const stored = record.parse({
      ...parsed,
      exercise_id: 1,
      created_timestamp: new Date("2026-03-02T10:00:00.000Z"),
      last_edited_timestamp: new Date("2026-03-02T10:00:00.000Z"),
    });
    expect(stored.image_url).toBe("/img/plank.png");
  });

  it("lower-cases emails on the way in and checks their shape", () => {
    const { create, patch, record } = descriptorFor("user");
    const fields = { username: "demo", password_hash: "test-hash" };

    expect(create.parse({ ...fields, email: " Demo@Example.COM " }).email).toBe("demo@example.com");
    expect(patch.parse({ email: "Demo@Example.com" }).email).toBe("demo@example.com");
    expect(create.safeParse({ ...fields, email: "demo" }).success).toBe(false);

    // rows already stored are read back as they are
    const stored = record.parse({
      ...fields,
      email: "legacy-address",
      user_id: 1,
      first_name: null,
      last_name: null,
      created_timestamp: new Date("2026-03-02T10:00:00.000Z"),
      last_edited_timestamp: new Date("2026-03-02T10:00:00.000Z"),
    });
    expect(stored.email).toBe("legacy-address");
  });

  it("drops unknown columns from stored records", () => {
    const parsed = descriptorFor("user").record.parse({
      user_id: 1,
      username: "demo",
      email: "demo@example.com",
      password_hash: "test-hash",
      first_name: null,
      last_name: null,
      created_timestamp: new Date("2026-03-02T10:00:00.000Z"),
      last_edited_timestamp: new Date("2026-03-02T10:00:00.000Z"),
      _internal: "bookkeeping",
    });

    expect(Object.keys(parsed)).not.toContain("_internal");
  });
});
