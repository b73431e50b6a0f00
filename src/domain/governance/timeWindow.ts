import { Initiative, InitiativeId, LedgerState } from './governanceTypes.js';
import { findInitiative } from './initiativeStore.js';

export const expiryOf = (initiative: Initiative): number => (
  initiative.genesisSequence + initiative.deliberationSpan
);

/** Whether the initiative accepts signals at `sequence`. Derived on every read. */
export const isInitiativeOpen = (initiative: Initiative, sequence: number): boolean => (
  initiative.active && sequence < expiryOf(initiative)
);

export function isActive(state: LedgerState, id: InitiativeId, sequence: number): boolean {
  const initiative = findInitiative(state, id);
  return initiative ? isInitiativeOpen(initiative, sequence) : false;
}

/**
 * Sequence units left until expiry. Negative once the window has passed;
 * 0 for unknown ids.
 */
export function remaining(state: LedgerState, id: InitiativeId, sequence: number): number {
  const initiative = findInitiative(state, id);
  return initiative ? expiryOf(initiative) - sequence : 0;
}
