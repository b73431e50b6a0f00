/**
 * Participation registry: one non-retractable signal per participant
 * and initiative, recorded together with the tally increment.
 */

import {
  CallContext,
  Identity,
  InitiativeId,
  LedgerState,
  participationKey,
  ParticipationRecord,
} from './governanceTypes.js';
import { findInitiative, isAssignedId } from './initiativeStore.js';
import { fail, FailureKind, Outcome, succeed } from './outcome.js';
import { isInitiativeOpen } from './timeWindow.js';

export function signal(
  state: LedgerState,
  id: InitiativeId,
  ctx: CallContext,
): Outcome<ParticipationRecord> {
  if (!isAssignedId(state, id)) {
    return fail(FailureKind.InvalidInitiative, `Initiative ${id} does not exist.`);
  }

  // An in-range id with nothing stored reports the same failure as an out-of-range one.
  const initiative = findInitiative(state, id);
  if (!initiative) {
    return fail(FailureKind.InvalidInitiative, `Initiative ${id} does not exist.`);
  }

  if (!isInitiativeOpen(initiative, ctx.sequence)) {
    return fail(FailureKind.DeliberationExpired, `Deliberation on initiative ${id} has ended.`);
  }

  const key = participationKey(id, ctx.caller);
  if (state.participation[key]?.participated) {
    return fail(
      FailureKind.DuplicateParticipation,
      `${ctx.caller} has already signaled on initiative ${id}.`,
    );
  }

  const record: ParticipationRecord = {
    participant: ctx.caller,
    initiativeId: id,
    participated: true,
    participationSequence: ctx.sequence,
  };

  state.participation[key] = record;
  initiative.consensusTally += 1;

  return succeed({ ...record });
}

export function hasSignaled(state: LedgerState, participant: Identity, id: InitiativeId): boolean {
  if (!isAssignedId(state, id)) return false;
  return state.participation[participationKey(id, participant)]?.participated ?? false;
}

export function getParticipation(
  state: LedgerState,
  participant: Identity,
  id: InitiativeId,
): ParticipationRecord | null {
  if (!isAssignedId(state, id)) return null;
  const record = state.participation[participationKey(id, participant)];
  return record ? { ...record } : null;
}

export function listParticipants(state: LedgerState, id: InitiativeId): ParticipationRecord[] {
  if (!isAssignedId(state, id)) return [];

  return Object.values(state.participation)
    .filter((record) => record.initiativeId === id && record.participated)
    .sort((a, b) => (
      a.participationSequence - b.participationSequence
      || a.participant.localeCompare(b.participant)
    ))
    .map((record) => ({ ...record }));
}
