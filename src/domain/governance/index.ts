export * from './governanceTypes.js';
export * from './outcome.js';
export { isGuardian, requireGuardian } from './authorizationGuard.js';
export {
  createInitiative,
  findInitiative,
  getTotal,
  isAssignedId,
  terminateInitiative,
} from './initiativeStore.js';
export {
  getParticipation,
  hasSignaled,
  listParticipants,
  signal,
} from './participationRegistry.js';
export { expiryOf, isActive, isInitiativeOpen, remaining } from './timeWindow.js';
export { configureDefaultSpan, getConfiguration } from './configurationState.js';
export { getStatus, listInitiatives } from './statusQueries.js';
