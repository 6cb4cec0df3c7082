import type { EnvelopeBuilder } from '../envelope/envelope-builder.js';
import { encodeStopPayload } from '../envelope/system-payload.js';
import type { IdentityMapper } from '../identity/index.js';
import { MESSAGE_TYPES, type MessageEnvelope } from '../types/envelope.js';
import type { RoundOrchestrator } from './round-orchestrator.js';

/**
 * Tells every participant that the run is over. Fire-and-forget: nobody
 * waits for acknowledgements and per-node submit failures are only logged.
 */
export class ShutdownBroadcaster {
  private mapper: IdentityMapper;
  private builder: EnvelopeBuilder;
  private orchestrator: RoundOrchestrator;

  constructor(mapper: IdentityMapper, builder: EnvelopeBuilder, orchestrator: RoundOrchestrator) {
    this.mapper = mapper;
    this.builder = builder;
    this.orchestrator = orchestrator;
  }

  async sendStopSignal(reason: string, groupId: string, ttlSeconds: number): Promise<MessageEnvelope[]> {
    const payload = encodeStopPayload(reason);
    const envelopes = this.mapper
      .participants()
      .map((participant) => this.builder.build(payload, MESSAGE_TYPES.SYSTEM, participant.address, groupId, ttlSeconds));

    const pending = await this.orchestrator.push(envelopes);
    console.log(
      `[ShutdownBroadcaster] Stop signal sent to ${pending.length}/${envelopes.length} participant(s): ${reason}`,
    );
    return envelopes;
  }
}
