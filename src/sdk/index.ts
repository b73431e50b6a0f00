// Initiative ledger SDK entry point
export { LedgerAPIClient, LedgerAPIError } from './client.js';
export type { LedgerAPIClientOptions } from './client.js';
export type {
  InitiativeFilter,
  FailureKind,

  // Initiatives
  CreateInitiativeOpts,
  Initiative,
  InitiativeStatus,

  // Participation
  ParticipationRecord,
  SignalReceipt,
  SignalCheck,

  // Ledger
  LedgerConfiguration,
  HealthResponse,

  // Errors
  APIErrorEnvelope,
} from './types.js';
