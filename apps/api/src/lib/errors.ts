export type WorkflowErrorCode =
  | "not_found"
  | "not_authorized"
  | "duplicate_active_application"
  | "cooldown_active"
  | "invalid_state"
  | "already_claimed"
  | "not_owner"
  | "invalid_score"
  | "missing_score"
  | "already_decided";

/**
 * A recoverable, actor-local failure. Raised before any state is mutated and
 * reported back to the invoking actor only.
 */
export class WorkflowError extends Error {
  public constructor(
    public readonly code: WorkflowErrorCode,
    message: string = code,
  ) {
    super(message);
    this.name = "WorkflowError";
  }
}

export class CooldownActiveError extends WorkflowError {
  public constructor(public readonly retryAfterSeconds: number) {
    super("cooldown_active", `cooldown active for another ${retryAfterSeconds}s`);
    this.name = "CooldownActiveError";
  }
}

export function isWorkflowError(error: unknown): error is WorkflowError {
  return error instanceof WorkflowError;
}
