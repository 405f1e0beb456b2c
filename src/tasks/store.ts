import { randomUUID } from "node:crypto";
import { ValidationError } from "../errors.js";
import { log } from "../utils/logger.js";
import { isTerminal, type TaskOutcome, type TaskRecord, type UpdateResult } from "./types.js";

/**
 * Registry of submitted tasks. Constructed once per process and handed to
 * whatever needs it, so tests get a fresh store and a persistent backend can
 * slot in behind the same interface.
 */
export interface TaskStore {
  create(prompt: string, id?: string): TaskRecord;
  update(id: string, outcome: TaskOutcome): UpdateResult;
  get(id: string): TaskRecord | undefined;
  list(limit?: number): TaskRecord[];
  readonly size: number;
}

export type InMemoryTaskStoreOptions = {
  now?: () => number;
  generateId?: () => string;
};

export class InMemoryTaskStore implements TaskStore {
  private tasks = new Map<string, TaskRecord>();
  private now: () => number;
  private generateId: () => string;

  constructor(opts: InMemoryTaskStoreOptions = {}) {
    this.now = opts.now ?? Date.now;
    this.generateId = opts.generateId ?? randomUUID;
  }

  get size(): number {
    return this.tasks.size;
  }

  create(prompt: string, id?: string): TaskRecord {
    const taskId = id ?? this.generateId();
    if (this.tasks.has(taskId)) {
      throw new ValidationError("DUPLICATE_TASK", `Task "${taskId}" already exists`);
    }

    const task: TaskRecord = {
      id: taskId,
      status: "pending",
      prompt,
      createdAt: this.now(),
    };
    this.tasks.set(taskId, task);
    log.debug("Task created", { taskId });
    return { ...task };
  }

  update(id: string, outcome: TaskOutcome): UpdateResult {
    const task = this.tasks.get(id);
    if (!task) {
      log.warn("Update for unknown task", { taskId: id, status: outcome.status });
      return { applied: false, reason: "not_found" };
    }

    if (isTerminal(task.status)) {
      log.warn("Ignoring update for task already in a terminal state", {
        taskId: id,
        current: task.status,
        incoming: outcome.status,
      });
      return { applied: false, reason: "already_terminal", task: { ...task } };
    }

    // Replace rather than mutate so copies handed out earlier stay consistent.
    const next: TaskRecord =
      outcome.status === "completed"
        ? { ...task, status: "completed", result: outcome.result, completedAt: this.now() }
        : { ...task, status: "failed", error: outcome.error, completedAt: this.now() };
    this.tasks.set(id, next);
    log.info(`Task ${outcome.status}`, { taskId: id });
    return { applied: true, task: { ...next } };
  }

  get(id: string): TaskRecord | undefined {
    const task = this.tasks.get(id);
    return task ? { ...task } : undefined;
  }

  /** Newest first. */
  list(limit = 50): TaskRecord[] {
    return [...this.tasks.values()]
      .sort((a, b) => b.createdAt - a.createdAt)
      .slice(0, limit)
      .map((t) => ({ ...t }));
  }
}
