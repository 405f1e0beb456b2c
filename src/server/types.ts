import type { TaskStatus } from "../tasks/types.js";

// --- REST responses ---

export type QueueResponse = {
  id: string;
  status: TaskStatus;
};

export type StatusResponse = {
  id: string;
  status: TaskStatus;
  result?: string;
  error?: string;
  createdAt: number;
  completedAt?: number;
};

export type WebhookAck = {
  status: "received" | "duplicate" | "ignored";
  id: string;
};

export type HealthResponse = {
  status: "healthy";
  service: string;
};

export type ErrorResponse = {
  error: string;
  reason?: string;
};
