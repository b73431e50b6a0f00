// ─── SDK Types ─────────────────────────────────────────────────────────────
// Self-contained types for the initiative ledger HTTP API.
// These mirror the API responses but are decoupled from internal server types.
// ────────────────────────────────────────────────────────────────────────────

export type InitiativeFilter = 'open' | 'closed';

export type FailureKind =
  | 'UNAUTHORIZED_ACCESS'
  | 'DUPLICATE_PARTICIPATION'
  | 'INVALID_INITIATIVE'
  | 'DELIBERATION_EXPIRED'
  | 'MALFORMED_INPUT'
  | 'INITIATIVE_NOT_FOUND'
  | 'DELIBERATION_WINDOW_EXCEEDED';

// ─── Initiatives ───────────────────────────────────────────────────────────

export interface CreateInitiativeOpts {
  title: string;
  summary: string;
  /** Deliberation span in ledger seconds. Defaults to the ledger's standard span. */
  span?: number;
}

export interface Initiative {
  id: number;
  title: string;
  summary: string;
  consensusTally: number;
  active: boolean;
  author: string;
  genesisSequence: number;
  deliberationSpan: number;
}

export interface InitiativeStatus {
  initiative: Initiative;
  isActive: boolean;
  remaining: number;
}

// ─── Participation ─────────────────────────────────────────────────────────

export interface ParticipationRecord {
  participant: string;
  initiativeId: number;
  participated: boolean;
  participationSequence: number;
}

export interface SignalReceipt extends ParticipationRecord {
  consensusTally: number;
}

export interface SignalCheck {
  initiativeId: number;
  participant: string;
  hasSignaled: boolean;
  record: ParticipationRecord | null;
}

// ─── Ledger ────────────────────────────────────────────────────────────────

export interface LedgerConfiguration {
  guardian: string;
  standardDeliberationSpan: number;
  minSpan: number;
  maxSpan: number;
}

export interface HealthResponse {
  status: string;
  name: string;
  env: string;
  guardian: string;
  totalInitiatives: number;
  sequence: number;
}

// ─── Errors ────────────────────────────────────────────────────────────────

export interface APIErrorEnvelope {
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
}
