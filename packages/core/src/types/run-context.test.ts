import { describe, expect, it } from 'vitest';
import { InvalidArgumentError, RunAlreadyStartedError, RunNotStartedError } from '../errors/index.js';
import { RunContext } from './run-context.js';

describe('RunContext', () => {
  it('throws when read before a run is started', () => {
    const context = new RunContext();
    expect(context.started).toBe(false);
    expect(() => context.runId).toThrow(RunNotStartedError);
  });

  it('returns the started run id', () => {
    const context = new RunContext();
    context.start(42);
    expect(context.started).toBe(true);
    expect(context.runId).toBe(42);
  });

  it('can only be started once', () => {
    const context = new RunContext();
    context.start(1);
    expect(() => context.start(2)).toThrow(RunAlreadyStartedError);
    expect(context.runId).toBe(1);
  });

  it('rejects negative or fractional run ids', () => {
    const context = new RunContext();
    expect(() => context.start(-1)).toThrow(InvalidArgumentError);
    expect(() => context.start(1.5)).toThrow(InvalidArgumentError);
    expect(context.started).toBe(false);
  });
});
