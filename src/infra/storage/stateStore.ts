import fs from 'node:fs/promises';
import path from 'node:path';
import {
  DEFAULT_SPAN,
  Initiative,
  isSpanInBounds,
  LedgerState,
  participationKey,
  ParticipationRecord,
} from '../../domain/governance/governanceTypes.js';
import { createDefaultState } from './defaultState.js';

const isRecord = (value: unknown): value is Record<string, unknown> => (
  typeof value === 'object' && value !== null && !Array.isArray(value)
);

const asNumber = (value: unknown, fallback: number): number => (
  typeof value === 'number' && Number.isFinite(value) ? value : fallback
);

const asString = (value: unknown, fallback: string): string => (
  typeof value === 'string' ? value : fallback
);

const normalizeInitiative = (raw: unknown, index: number): Initiative | null => {
  if (!isRecord(raw)) return null;

  return {
    id: index + 1,
    title: asString(raw.title, ''),
    summary: asString(raw.summary, ''),
    consensusTally: asNumber(raw.consensusTally, 0),
    active: raw.active !== false,
    author: asString(raw.author, ''),
    genesisSequence: asNumber(raw.genesisSequence, 0),
    deliberationSpan: asNumber(raw.deliberationSpan, DEFAULT_SPAN),
  };
};

const normalizeParticipation = (raw: unknown): ParticipationRecord | null => {
  if (!isRecord(raw)) return null;
  if (typeof raw.participant !== 'string' || typeof raw.initiativeId !== 'number') return null;

  return {
    participant: raw.participant,
    initiativeId: raw.initiativeId,
    participated: raw.participated !== false,
    participationSequence: asNumber(raw.participationSequence, 0),
  };
};

/**
 * Rebuild a ledger state from whatever JSON was on disk. Ids are
 * re-derived from array position so they stay dense, and records for
 * ids that do not exist are dropped.
 */
export const normalizeState = (raw: unknown, standardDeliberationSpan: number = DEFAULT_SPAN): LedgerState => {
  const defaults = createDefaultState(standardDeliberationSpan);
  if (!isRecord(raw)) return defaults;

  const initiatives: Initiative[] = [];
  for (const [index, entry] of (Array.isArray(raw.initiatives) ? raw.initiatives : []).entries()) {
    const initiative = normalizeInitiative(entry, index);
    if (!initiative) break;
    initiatives.push(initiative);
  }

  const participation: Record<string, ParticipationRecord> = {};
  for (const entry of Object.values(isRecord(raw.participation) ? raw.participation : {})) {
    const record = normalizeParticipation(entry);
    if (!record || record.initiativeId < 1 || record.initiativeId > initiatives.length) continue;
    participation[participationKey(record.initiativeId, record.participant)] = record;
  }

  const span = asNumber(raw.standardDeliberationSpan, defaults.standardDeliberationSpan);

  return {
    initiatives,
    participation,
    totalInitiatives: initiatives.length,
    standardDeliberationSpan: isSpanInBounds(span) ? span : defaults.standardDeliberationSpan,
  };
};

export class StateStore {
  private state: LedgerState;
  private lock: Promise<void> = Promise.resolve();

  constructor(
    private readonly stateFilePath: string,
    private readonly standardDeliberationSpan: number = DEFAULT_SPAN,
  ) {
    this.state = createDefaultState(standardDeliberationSpan);
  }

  async init(): Promise<void> {
    await fs.mkdir(path.dirname(this.stateFilePath), { recursive: true });

    let raw: string | null = null;
    try {
      raw = await fs.readFile(this.stateFilePath, 'utf-8');
    } catch (error) {
      if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) throw error;
    }

    if (raw === null) {
      this.state = createDefaultState(this.standardDeliberationSpan);
      await this.persist();
      return;
    }

    this.state = normalizeState(JSON.parse(raw), this.standardDeliberationSpan);
  }

  /** Deep copy of the committed state. */
  snapshot(): LedgerState {
    return structuredClone(this.state);
  }

  /**
   * Run `work` against a private draft of the committed state, one
   * transaction at a time. The draft replaces the committed state only
   * when `work` returns normally, `commitWhen` accepts its result and the
   * draft has been written to disk.
   */
  async transaction<T>(
    work: (draft: LedgerState) => Promise<T> | T,
    commitWhen: (result: T) => boolean = () => true,
  ): Promise<T> {
    const previous = this.lock;
    let release: () => void = () => {};

    this.lock = new Promise<void>((resolve) => {
      release = resolve;
    });

    await previous;
    try {
      const draft = structuredClone(this.state);
      const result = await work(draft);
      if (commitWhen(result)) {
        await this.persist(draft);
        this.state = draft;
      }
      return result;
    } finally {
      release();
    }
  }

  async flush(): Promise<void> {
    await this.lock;
    await this.persist();
  }

  private async persist(state: LedgerState = this.state): Promise<void> {
    await fs.writeFile(this.stateFilePath, JSON.stringify(state, null, 2));
  }
}
