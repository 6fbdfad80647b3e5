import type { AgentLogger } from "@reqcase/agents";

/**
 * Runs stage executions off the request path. Each dispatched job is tracked
 * until it settles so shutdown (and tests) can wait for in-flight work.
 */
export class BackgroundTaskRunner {
  private readonly inFlight = new Set<Promise<void>>();

  constructor(private readonly logger: AgentLogger) {}

  dispatch(taskId: string, job: () => Promise<void>): void {
    const execution: Promise<void> = Promise.resolve()
      .then(job)
      .catch((error: unknown) => {
        this.logger.error({ taskId, err: error }, "Background task execution crashed");
      })
      .finally(() => {
        this.inFlight.delete(execution);
      });
    this.inFlight.add(execution);
  }

  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }
}
