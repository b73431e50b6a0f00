/**
 * Governance ledger service.
 *
 * Runs each ledger operation as one serialized transaction against the
 * state store, reading the sequence clock inside the transaction so
 * operations observe a non-decreasing sequence in commit order. Failed
 * operations commit nothing and are reported as outcomes, logged and
 * published on the event bus.
 */

import {
  configureDefaultSpan,
  createInitiative,
  CreateInitiativeInput,
  findInitiative,
  getConfiguration,
  getParticipation,
  getStatus,
  getTotal,
  hasSignaled,
  Identity,
  InitiativeFilter,
  InitiativeId,
  InitiativeStatus,
  LedgerConfiguration,
  listInitiatives,
  listParticipants,
  Outcome,
  ParticipationRecord,
  signal,
  succeed,
  terminateInitiative,
} from '../domain/governance/index.js';
import { eventBus, EventType } from '../infra/eventBus.js';
import { EventLogger, LogLevel } from '../infra/logger.js';
import { SequenceClock } from '../infra/sequenceClock.js';
import { StateStore } from '../infra/storage/stateStore.js';

export interface SignalReceipt extends ParticipationRecord {
  consensusTally: number;
}

const committed = <T>(outcome: Outcome<T>): boolean => outcome.ok;

export class GovernanceService {
  constructor(
    private readonly store: StateStore,
    private readonly logger: EventLogger,
    private readonly clock: SequenceClock,
    private readonly guardian: Identity,
  ) {}

  /**
   * Register a new initiative. Guardian only.
   */
  async createInitiative(caller: Identity, input: CreateInitiativeInput): Promise<Outcome<InitiativeId>> {
    let sequence = 0;
    const outcome = await this.store.transaction((draft) => {
      sequence = this.clock.current();
      return createInitiative(draft, this.guardian, input, { caller, sequence });
    }, committed);

    return this.report('create', caller, outcome, 'initiative.created', (id) => ({
      initiativeId: id,
      title: input.title,
      genesisSequence: sequence,
    }));
  }

  /**
   * Cast the caller's single signal on an open initiative.
   */
  async signal(caller: Identity, id: InitiativeId): Promise<Outcome<SignalReceipt>> {
    const outcome = await this.store.transaction((draft): Outcome<SignalReceipt> => {
      const result = signal(draft, id, { caller, sequence: this.clock.current() });
      if (!result.ok) return result;

      const tally = findInitiative(draft, id)?.consensusTally ?? 0;
      return succeed({ ...result.value, consensusTally: tally });
    }, committed);

    return this.report('signal', caller, outcome, 'initiative.signaled', (receipt) => ({ ...receipt }));
  }

  /**
   * Close an initiative permanently. Guardian only; idempotent.
   */
  async terminate(caller: Identity, id: InitiativeId): Promise<Outcome<void>> {
    const outcome = await this.store.transaction(
      (draft) => terminateInitiative(draft, this.guardian, id, caller),
      committed,
    );

    return this.report('terminate', caller, outcome, 'initiative.terminated', () => ({ initiativeId: id }));
  }

  async configureDefaultSpan(caller: Identity, span: number): Promise<Outcome<number>> {
    const outcome = await this.store.transaction(
      (draft) => configureDefaultSpan(draft, this.guardian, span, caller),
      committed,
    );

    return this.report('configure_default_span', caller, outcome, 'ledger.span.configured', (value) => ({
      standardDeliberationSpan: value,
    }));
  }

  // ─── Queries ────────────────────────────────────────────────────────

  getStatus(id: InitiativeId): InitiativeStatus | null {
    return getStatus(this.store.snapshot(), id, this.clock.current());
  }

  getTotal(): number {
    return getTotal(this.store.snapshot());
  }

  hasSignaled(participant: Identity, id: InitiativeId): boolean {
    return hasSignaled(this.store.snapshot(), participant, id);
  }

  getParticipation(participant: Identity, id: InitiativeId): ParticipationRecord | null {
    return getParticipation(this.store.snapshot(), participant, id);
  }

  listParticipants(id: InitiativeId): ParticipationRecord[] {
    return listParticipants(this.store.snapshot(), id);
  }

  listInitiatives(filter?: InitiativeFilter): InitiativeStatus[] {
    return listInitiatives(this.store.snapshot(), this.clock.current(), filter);
  }

  getConfiguration(): LedgerConfiguration {
    return getConfiguration(this.store.snapshot(), this.guardian);
  }

  currentSequence(): number {
    return this.clock.current();
  }

  // ─── Internals ──────────────────────────────────────────────────────

  private async report<T>(
    operation: string,
    caller: Identity,
    outcome: Outcome<T>,
    event: EventType,
    describe: (value: T) => Record<string, unknown>,
  ): Promise<Outcome<T>> {
    if (outcome.ok) {
      const data = { caller, ...describe(outcome.value) };
      await this.record('info', `ledger.${operation}.accepted`, data);
      eventBus.emit(event, data);
      return outcome;
    }

    const data = { operation, caller, kind: outcome.failure.kind, message: outcome.failure.message };
    await this.record('warn', `ledger.${operation}.rejected`, data);
    eventBus.emit('ledger.operation.rejected', data);
    return outcome;
  }

  /** The outcome is already settled; a failed log write must not change what the caller sees. */
  private async record(level: LogLevel, event: string, data: Record<string, unknown>): Promise<void> {
    try {
      await this.logger.log(level, event, data);
    } catch (error) {
      console.error(`event log write failed for ${event}`, error);
    }
  }
}
