import type { TaskRecord } from "../state/tasks.js";

export interface SubmitTaskInput {
  readonly taskId?: string;
  readonly tenantId: string;
  readonly description: string;
  readonly capabilities?: readonly string[];
  readonly strategy?: string;
  readonly experimentId?: string;
  readonly sessionId?: string;
}

export interface SubmittedTask {
  readonly taskId: string;
  readonly capabilities: readonly string[];
  readonly variant: TaskRecord["variant"];
  readonly agentId: string | null;
}

export type AttemptResult =
  | { readonly kind: "success"; readonly output: unknown; readonly latencyMs: number }
  | { readonly kind: "failure"; readonly error: Error; readonly latencyMs: number }
  | { readonly kind: "cancelled" };
