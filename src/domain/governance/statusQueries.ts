import {
  Initiative,
  InitiativeFilter,
  InitiativeId,
  InitiativeStatus,
  LedgerState,
} from './governanceTypes.js';
import { findInitiative } from './initiativeStore.js';
import { expiryOf, isInitiativeOpen } from './timeWindow.js';

const toStatus = (initiative: Initiative, sequence: number): InitiativeStatus => ({
  initiative: { ...initiative },
  isActive: isInitiativeOpen(initiative, sequence),
  remaining: expiryOf(initiative) - sequence,
});

export function getStatus(
  state: LedgerState,
  id: InitiativeId,
  sequence: number,
): InitiativeStatus | null {
  const initiative = findInitiative(state, id);
  return initiative ? toStatus(initiative, sequence) : null;
}

export function listInitiatives(
  state: LedgerState,
  sequence: number,
  filter?: InitiativeFilter,
): InitiativeStatus[] {
  const statuses = state.initiatives.map((initiative) => toStatus(initiative, sequence));
  if (!filter) return statuses;

  const wantOpen = filter === 'open';
  return statuses.filter((status) => status.isActive === wantOpen);
}
