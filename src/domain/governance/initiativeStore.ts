/**
 * Initiative store: allocation, lookup and termination of initiatives.
 *
 * Operations mutate the `LedgerState` they are handed only after every
 * precondition has passed, so a failed outcome leaves it untouched.
 */

import { requireGuardian } from './authorizationGuard.js';
import {
  CallContext,
  CreateInitiativeInput,
  Identity,
  Initiative,
  InitiativeId,
  isSpanInBounds,
  LedgerState,
  MAX_SPAN,
  MIN_SPAN,
  SUMMARY_LENGTH,
  TITLE_LENGTH,
} from './governanceTypes.js';
import { fail, FailureKind, Outcome, succeed } from './outcome.js';

const codePointLength = (text: string): number => Array.from(text).length;

const withinLength = (text: string, bounds: { min: number; max: number }): boolean => {
  const length = codePointLength(text);
  return length >= bounds.min && length <= bounds.max;
};

export const isAssignedId = (state: LedgerState, id: InitiativeId): boolean => (
  Number.isInteger(id) && id >= 1 && id <= state.totalInitiatives
);

export const findInitiative = (state: LedgerState, id: InitiativeId): Initiative | undefined => (
  isAssignedId(state, id) ? state.initiatives[id - 1] : undefined
);

export const getTotal = (state: LedgerState): number => state.totalInitiatives;

export function createInitiative(
  state: LedgerState,
  guardian: Identity,
  input: CreateInitiativeInput,
  ctx: CallContext,
): Outcome<InitiativeId> {
  const authorized = requireGuardian(guardian, ctx.caller);
  if (!authorized.ok) return authorized;

  if (!withinLength(input.title, TITLE_LENGTH)) {
    return fail(
      FailureKind.MalformedInput,
      `Title must be ${TITLE_LENGTH.min}-${TITLE_LENGTH.max} characters.`,
    );
  }

  if (!withinLength(input.summary, SUMMARY_LENGTH)) {
    return fail(
      FailureKind.MalformedInput,
      `Summary must be ${SUMMARY_LENGTH.min}-${SUMMARY_LENGTH.max} characters.`,
    );
  }

  const span = input.span ?? state.standardDeliberationSpan;
  if (!isSpanInBounds(span)) {
    return fail(
      FailureKind.MalformedInput,
      `Deliberation span must be an integer between ${MIN_SPAN} and ${MAX_SPAN}.`,
    );
  }

  const id = state.totalInitiatives + 1;
  state.initiatives.push({
    id,
    title: input.title,
    summary: input.summary,
    consensusTally: 0,
    active: true,
    author: ctx.caller,
    genesisSequence: ctx.sequence,
    deliberationSpan: span,
  });
  state.totalInitiatives = id;

  return succeed(id);
}

/**
 * Close an initiative for good. Terminating an already closed or expired
 * initiative succeeds without change.
 */
export function terminateInitiative(
  state: LedgerState,
  guardian: Identity,
  id: InitiativeId,
  caller: Identity,
): Outcome<void> {
  if (!Number.isInteger(id) || id < 1) {
    return fail(FailureKind.InvalidInitiative, `Initiative id must be a positive integer, got ${id}.`);
  }

  const initiative = findInitiative(state, id);
  if (!initiative) {
    return fail(FailureKind.InitiativeNotFound, `Initiative ${id} not found.`);
  }

  const authorized = requireGuardian(guardian, caller);
  if (!authorized.ok) return authorized;

  initiative.active = false;
  return succeed(undefined);
}
