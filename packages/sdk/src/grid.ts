import {
  EnvelopeBuilder,
  type EnvelopeCodec,
  type EnvelopeCrypto,
  IdentityMapper,
  type MessageEnvelope,
  type NodeId,
  type PendingCorrelation,
  type PullResult,
  RoundOrchestrator,
  RunContext,
  ShutdownBroadcaster,
  type Transport,
  TransportAdapter,
  describeError,
} from 'roundgrid-protocol';
import { type Environment, type GridConfig, resolveGridConfig } from './config.js';

export const DEFAULT_STOP_REASON = 'Run complete';
export const DEFAULT_STOP_GROUP_ID = 'shutdown';
export const DEFAULT_STOP_TTL_SECONDS = 60;

export interface GridOptions {
  /** Participant addresses, fixed for the lifetime of the grid */
  participants: readonly string[];
  transport: Transport;
  crypto?: EnvelopeCrypto;
  codec?: EnvelopeCodec;
  /** Explicit settings; anything left out comes from the environment */
  config?: Partial<GridConfig>;
  env?: Environment;
}

export interface StopSignalOptions {
  groupId?: string;
  ttlSeconds?: number;
}

export type StatusHandler = (status: string, detail?: string) => void;

/**
 * Coordinator-side entry point: one grid serves one run over a fixed set of
 * participants.
 */
export class Grid {
  readonly config: GridConfig;
  private mapper: IdentityMapper;
  private runContext = new RunContext();
  private builder: EnvelopeBuilder;
  private orchestrator: RoundOrchestrator;
  private broadcaster: ShutdownBroadcaster;
  private stopSent = false;

  private statusHandlers: StatusHandler[] = [];

  constructor(options: GridOptions) {
    this.config = resolveGridConfig(options.config, options.env);
    this.mapper = new IdentityMapper(options.participants);
    this.builder = new EnvelopeBuilder(this.mapper, this.runContext, {
      defaultTtlSeconds: this.config.defaultTtlSeconds,
    });

    const adapter = new TransportAdapter(
      options.transport,
      {
        codec: options.codec,
        crypto: options.crypto,
        encryptionEnabled: this.config.encryptionEnabled && options.crypto !== undefined,
      },
      {
        onEncryptionFallback: (address) => this.emitStatus('encryption:fallback', address),
        onResponseFailed: (correlationId, reason) => this.emitStatus('response:failed', `${correlationId}: ${reason}`),
      },
    );

    this.orchestrator = new RoundOrchestrator(
      this.mapper,
      this.builder,
      adapter,
      { pollIntervalMs: this.config.pollIntervalMs },
      {
        onSubmitFailed: (address, error) => this.emitStatus('submit:failed', `${address}: ${error.message}`),
        onRoundTimeout: (unanswered) => this.emitStatus('round:timeout', String(unanswered)),
      },
    );
    this.broadcaster = new ShutdownBroadcaster(this.mapper, this.builder, this.orchestrator);

    console.log(
      `[Grid] ${this.mapper.size} participant(s), encryption ${adapter.encryptionEnabled ? 'enabled' : 'disabled'}`,
    );
  }

  /** Current run id, or null before startRun */
  get run(): number | null {
    return this.runContext.started ? this.runContext.runId : null;
  }

  startRun(runId: number): void {
    this.runContext.start(runId);
    console.log(`[Grid] Run ${runId} started`);
    this.emitStatus('run:started', String(runId));
  }

  buildMessage(
    payload: Uint8Array,
    messageType: string,
    dstAddress: string,
    groupId: string,
    ttlSeconds?: number,
  ): MessageEnvelope {
    return this.builder.build(payload, messageType, dstAddress, groupId, ttlSeconds);
  }

  /**
   * Send every envelope and wait for replies. ROUNDGRID_MSG_TIMEOUT, when
   * set, replaces `timeoutMs`.
   */
  sendAndReceive(envelopes: readonly MessageEnvelope[], timeoutMs?: number): Promise<MessageEnvelope[]> {
    return this.orchestrator.sendAndReceive(envelopes, this.config.messageTimeoutMs ?? timeoutMs);
  }

  pushMessages(envelopes: readonly MessageEnvelope[]): Promise<PendingCorrelation[]> {
    return this.orchestrator.push(envelopes);
  }

  pullMessages(pending: readonly PendingCorrelation[]): Promise<PullResult> {
    return this.orchestrator.pull(pending);
  }

  listParticipantNodeIds(): NodeId[] {
    return this.mapper.nodeIds();
  }

  listParticipants(): string[] {
    return this.mapper.participants().map((participant) => participant.address);
  }

  async sendStopSignal(reason = DEFAULT_STOP_REASON, options: StopSignalOptions = {}): Promise<MessageEnvelope[]> {
    const envelopes = await this.broadcaster.sendStopSignal(
      reason,
      options.groupId ?? DEFAULT_STOP_GROUP_ID,
      options.ttlSeconds ?? DEFAULT_STOP_TTL_SECONDS,
    );
    this.stopSent = true;
    this.emitStatus('run:stopped', reason);
    return envelopes;
  }

  /**
   * Run `fn` and broadcast the stop signal afterwards, whether it returned
   * or threw. Skipped if `fn` already sent one or never started a run.
   */
  async runWithShutdown<T>(fn: (grid: Grid) => Promise<T>, reason = DEFAULT_STOP_REASON): Promise<T> {
    try {
      return await fn(this);
    } finally {
      if (!this.runContext.started) {
        console.warn('[Grid] No run was started, skipping stop signal');
      } else if (!this.stopSent) {
        await this.sendStopSignal(reason);
      }
    }
  }

  onStatus(handler: StatusHandler): void {
    this.statusHandlers.push(handler);
  }

  private emitStatus(status: string, detail?: string): void {
    for (const handler of this.statusHandlers) {
      try {
        handler(status, detail);
      } catch (error) {
        console.error(`[Grid] Status handler failed on ${status}: ${describeError(error)}`);
      }
    }
  }
}
