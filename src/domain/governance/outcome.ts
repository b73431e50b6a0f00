/**
 * Failures of ledger operations are values, not exceptions.
 */

export const FailureKind = {
  UnauthorizedAccess: 'UNAUTHORIZED_ACCESS',
  DuplicateParticipation: 'DUPLICATE_PARTICIPATION',
  InvalidInitiative: 'INVALID_INITIATIVE',
  DeliberationExpired: 'DELIBERATION_EXPIRED',
  MalformedInput: 'MALFORMED_INPUT',
  InitiativeNotFound: 'INITIATIVE_NOT_FOUND',
  // Reserved for span-bound violations; those currently report MALFORMED_INPUT.
  DeliberationWindowExceeded: 'DELIBERATION_WINDOW_EXCEEDED',
} as const;

export type FailureKind = typeof FailureKind[keyof typeof FailureKind];

export interface Failure {
  kind: FailureKind;
  message: string;
}

export type Outcome<T> =
  | { ok: true; value: T }
  | { ok: false; failure: Failure };

export const succeed = <T>(value: T): Outcome<T> => ({ ok: true, value });

export const fail = <T = never>(kind: FailureKind, message: string): Outcome<T> => ({
  ok: false,
  failure: { kind, message },
});
