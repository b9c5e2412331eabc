import { logger } from "../config/logger.js";
import { DispatchFailureError, describeError } from "../shared/errors.js";
import type { AgentDescriptor, AgentInvoker, AgentResponse, TaskPayload } from "./types.js";

const MAX_ERROR_BODY_CHARS = 500;

type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

/** Invokes agents over HTTP: POST of the task payload as JSON. */
export class HttpAgentInvoker implements AgentInvoker {
  constructor(
    private readonly headers: Readonly<Record<string, string>> = {},
    private readonly fetchFn: FetchFn = fetch,
  ) {}

  async invoke(agent: AgentDescriptor, payload: TaskPayload, signal: AbortSignal): Promise<AgentResponse> {
    if (!agent.endpoint) {
      throw new DispatchFailureError(agent.id, "agent has no endpoint configured");
    }

    let response: Response;
    try {
      response = await this.fetchFn(agent.endpoint, {
        method: "POST",
        headers: { "Content-Type": "application/json", ...this.headers },
        body: JSON.stringify(payload),
        signal,
      });
    } catch (error) {
      if (signal.aborted) {
        throw signal.reason ?? error;
      }
      throw new DispatchFailureError(agent.id, describeError(error), { cause: error });
    }

    if (!response.ok) {
      const body = await response.text();
      logger.warn({ agentId: agent.id, status: response.status }, "Agent returned non-2xx");
      throw new DispatchFailureError(
        agent.id,
        `HTTP ${response.status}: ${body.slice(0, MAX_ERROR_BODY_CHARS)}`,
      );
    }

    const contentType = response.headers.get("content-type") ?? "";
    const output: unknown = contentType.includes("application/json")
      ? await response.json()
      : await response.text();

    return { output };
  }
}
