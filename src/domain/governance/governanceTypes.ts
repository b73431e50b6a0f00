/**
 * Governance ledger types.
 *
 * A single guardian registers initiatives; any participant may signal
 * consensus once per initiative while its deliberation window is open.
 * All durations and sequence values are ledger seconds.
 */

/** One day. */
export const MIN_SPAN = 86_400;

/** Thirty days. */
export const MAX_SPAN = 2_592_000;

/** Seven days. */
export const DEFAULT_SPAN = 604_800;

export const TITLE_LENGTH = { min: 1, max: 50 } as const;
export const SUMMARY_LENGTH = { min: 1, max: 500 } as const;

export type Identity = string;
export type InitiativeId = number;

export interface Initiative {
  id: InitiativeId;
  title: string;
  summary: string;
  consensusTally: number;
  /** Stored flag. Only `terminate` clears it; expiry never does. */
  active: boolean;
  author: Identity;
  genesisSequence: number;
  deliberationSpan: number;
}

export interface ParticipationRecord {
  participant: Identity;
  initiativeId: InitiativeId;
  participated: boolean;
  participationSequence: number;
}

export interface LedgerState {
  /** Append-only; the initiative with id `n` lives at index `n - 1`. */
  initiatives: Initiative[];
  /** Keyed by `participationKey(initiativeId, participant)`. */
  participation: Record<string, ParticipationRecord>;
  totalInitiatives: number;
  standardDeliberationSpan: number;
}

export interface InitiativeStatus {
  initiative: Initiative;
  isActive: boolean;
  remaining: number;
}

export type InitiativeFilter = 'open' | 'closed';

export interface CreateInitiativeInput {
  title: string;
  summary: string;
  span?: number;
}

/** Caller identity and ledger sequence supplied by the host for one operation. */
export interface CallContext {
  caller: Identity;
  sequence: number;
}

export interface LedgerConfiguration {
  guardian: Identity;
  standardDeliberationSpan: number;
  minSpan: number;
  maxSpan: number;
}

export const participationKey = (initiativeId: InitiativeId, participant: Identity): string => (
  `${initiativeId}:${participant}`
);

export const isSpanInBounds = (span: number): boolean => (
  Number.isInteger(span) && span >= MIN_SPAN && span <= MAX_SPAN
);
