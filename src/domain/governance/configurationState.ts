import { requireGuardian } from './authorizationGuard.js';
import {
  Identity,
  isSpanInBounds,
  LedgerConfiguration,
  LedgerState,
  MAX_SPAN,
  MIN_SPAN,
} from './governanceTypes.js';
import { fail, FailureKind, Outcome, succeed } from './outcome.js';

/**
 * Replace the span applied to initiatives created without one.
 * Initiatives that already exist keep the span they were created with.
 */
export function configureDefaultSpan(
  state: LedgerState,
  guardian: Identity,
  newSpan: number,
  caller: Identity,
): Outcome<number> {
  const authorized = requireGuardian(guardian, caller);
  if (!authorized.ok) return authorized;

  if (!isSpanInBounds(newSpan)) {
    return fail(
      FailureKind.MalformedInput,
      `Default span must be an integer between ${MIN_SPAN} and ${MAX_SPAN}.`,
    );
  }

  state.standardDeliberationSpan = newSpan;
  return succeed(newSpan);
}

export const getConfiguration = (state: LedgerState, guardian: Identity): LedgerConfiguration => ({
  guardian,
  standardDeliberationSpan: state.standardDeliberationSpan,
  minSpan: MIN_SPAN,
  maxSpan: MAX_SPAN,
});
