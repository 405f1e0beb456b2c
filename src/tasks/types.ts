export type TaskStatus = "pending" | "completed" | "failed";

export type TaskRecord = {
  id: string;
  status: TaskStatus;
  prompt: string;
  /** Present only when status is "completed". */
  result?: string;
  /** Present only when status is "failed". */
  error?: string;
  createdAt: number;
  completedAt?: number;
};

/** The terminal state a webhook (or the simulator) reports for a task. */
export type TaskOutcome =
  | { status: "completed"; result: string }
  | { status: "failed"; error: string };

export type UpdateResult =
  | { applied: true; task: TaskRecord }
  | { applied: false; reason: "not_found" }
  | { applied: false; reason: "already_terminal"; task: TaskRecord };

export function isTerminal(status: TaskStatus): boolean {
  return status !== "pending";
}
