import { InvalidArgumentError, RunAlreadyStartedError, RunNotStartedError } from '../errors/index.js';

/**
 * Holds the id of the run an orchestrator serves. Set exactly once.
 */
export class RunContext {
  private current: number | null = null;

  start(runId: number): void {
    if (!Number.isSafeInteger(runId) || runId < 0) {
      throw new InvalidArgumentError(`runId must be a non-negative safe integer, got ${runId}`, { runId });
    }
    if (this.current !== null) {
      throw new RunAlreadyStartedError(this.current);
    }
    this.current = runId;
  }

  get runId(): number {
    if (this.current === null) {
      throw new RunNotStartedError();
    }
    return this.current;
  }

  get started(): boolean {
    return this.current !== null;
  }
}
