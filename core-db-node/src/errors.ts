import type { EntityKind } from "./models/entities";

export type RepositoryErrorCode =
  | "CONSTRAINT_VIOLATION"
  | "NOT_FOUND"
  | "DEPENDENCY_CONFLICT"
  | "PRECONDITION";

/**
 * Base class for every rejection the repository surfaces to its callers.
 * A rejected operation never leaves partial rows behind.
 */
export abstract class RepositoryError extends Error {
  abstract readonly code: RepositoryErrorCode;

  constructor(message: string, readonly entity?: EntityKind) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Missing required field, invalid value, dangling foreign key,
 * duplicate unique value or failed check.
 */
export class ConstraintViolation extends RepositoryError {
  readonly code = "CONSTRAINT_VIOLATION";

  constructor(
    message: string,
    entity?: EntityKind,
    readonly issues: string[] = []
  ) {
    super(message, entity);
  }
}

export class NotFound extends RepositoryError {
  readonly code = "NOT_FOUND";

  constructor(entity: EntityKind, readonly key: number) {
    super(`${entity} ${key} not found`, entity);
  }
}

/** Delete blocked by rows that still reference the target. */
export class DependencyConflict extends RepositoryError {
  readonly code = "DEPENDENCY_CONFLICT";

  constructor(
    message: string,
    entity?: EntityKind,
    readonly dependents: EntityKind[] = []
  ) {
    super(message, entity);
  }
}

/** Composite operation called with an invalid combination of inputs. */
export class Precondition extends RepositoryError {
  readonly code = "PRECONDITION";
}
