import type { EnvelopeBuilder } from '../envelope/envelope-builder.js';
import { InvalidArgumentError, SubmitError } from '../errors/index.js';
import type { IdentityMapper, Participant } from '../identity/index.js';
import type { TransportAdapter } from '../transport/transport-adapter.js';
import type { MessageEnvelope, PendingCorrelation } from '../types/envelope.js';

/** Default delay between two response polls */
export const DEFAULT_POLL_INTERVAL_MS = 3000;

export interface RoundOrchestratorOptions {
  pollIntervalMs?: number;
}

export interface RoundOrchestratorEvents {
  /** A destination was dropped from the round because its request could not be submitted */
  onSubmitFailed?: (address: string, error: SubmitError) => void;
  /** The deadline passed with requests still unanswered */
  onRoundTimeout?: (unanswered: number) => void;
}

export interface PullResult {
  resolved: Map<string, MessageEnvelope>;
  failed: Set<string>;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Scatter/gather over a store-and-forward transport.
 *
 * A round submits one request per envelope, then polls for responses until
 * every request is answered or dropped, or the deadline passes. Per-node
 * failures shrink the result set; only caller errors (unknown destination,
 * invalid envelope, run not started) are thrown.
 */
export class RoundOrchestrator {
  private mapper: IdentityMapper;
  private builder: EnvelopeBuilder;
  private adapter: TransportAdapter;
  private pollIntervalMs: number;
  private events: RoundOrchestratorEvents;

  constructor(
    mapper: IdentityMapper,
    builder: EnvelopeBuilder,
    adapter: TransportAdapter,
    options: RoundOrchestratorOptions = {},
    events: RoundOrchestratorEvents = {},
  ) {
    this.mapper = mapper;
    this.builder = builder;
    this.adapter = adapter;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.events = events;

    if (!Number.isFinite(this.pollIntervalMs) || this.pollIntervalMs <= 0) {
      throw new InvalidArgumentError(`pollIntervalMs must be a positive number, got ${this.pollIntervalMs}`);
    }
  }

  /**
   * Submit every envelope and return the correlations to poll.
   *
   * All envelopes are validated and their destinations resolved before the
   * first submission, so a caller error leaves the transport untouched.
   */
  async push(envelopes: readonly MessageEnvelope[]): Promise<PendingCorrelation[]> {
    const outbound: Array<{ envelope: MessageEnvelope; destination: Participant }> = [];
    for (const envelope of envelopes) {
      this.builder.validate(envelope);
      outbound.push({ envelope, destination: this.mapper.participantFor(envelope.dstNodeId) });
    }

    const pending: PendingCorrelation[] = [];
    for (const { envelope, destination } of outbound) {
      try {
        const correlationId = await this.adapter.submit(envelope, destination);
        pending.push({ correlationId, destination });
      } catch (error) {
        if (!(error instanceof SubmitError)) throw error;
        console.error(`[RoundOrchestrator] Dropping node ${destination.nodeId} from the round: ${error.message}`);
        this.events.onSubmitFailed?.(destination.address, error);
      }
    }
    return pending;
  }

  /**
   * One pass over the pending correlations.
   */
  async pull(pending: readonly PendingCorrelation[]): Promise<PullResult> {
    const resolved = new Map<string, MessageEnvelope>();
    const failed = new Set<string>();

    for (const correlation of pending) {
      const result = await this.adapter.resolve(correlation);
      if (result.status === 'resolved') {
        resolved.set(correlation.correlationId, result.envelope);
      } else if (result.status === 'failed') {
        failed.add(correlation.correlationId);
      }
    }
    return { resolved, failed };
  }

  /**
   * Send every envelope and collect the replies that arrive before the
   * deadline. Without a timeout the call waits until every request is
   * answered or dropped.
   */
  async sendAndReceive(envelopes: readonly MessageEnvelope[], timeoutMs?: number): Promise<MessageEnvelope[]> {
    if (timeoutMs !== undefined && (!Number.isFinite(timeoutMs) || timeoutMs < 0)) {
      throw new InvalidArgumentError(`timeoutMs must be a finite number >= 0, got ${timeoutMs}`, { timeoutMs });
    }

    let outstanding = await this.push(envelopes);
    const deadline = timeoutMs === undefined ? null : Date.now() + timeoutMs;
    const results: MessageEnvelope[] = [];

    for (;;) {
      const { resolved, failed } = await this.pull(outstanding);
      results.push(...resolved.values());
      outstanding = outstanding.filter((p) => !resolved.has(p.correlationId) && !failed.has(p.correlationId));

      if (outstanding.length === 0) {
        return results;
      }

      let wait = this.pollIntervalMs;
      if (deadline !== null) {
        const remaining = deadline - Date.now();
        if (remaining <= 0) {
          console.warn(
            `[RoundOrchestrator] Timed out with ${outstanding.length} unanswered message(s), returning ${results.length} reply(ies)`,
          );
          this.events.onRoundTimeout?.(outstanding.length);
          return results;
        }
        wait = Math.min(wait, remaining);
      }
      await sleep(wait);
    }
  }
}
