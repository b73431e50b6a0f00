import { Identity } from './governanceTypes.js';
import { fail, FailureKind, Outcome, succeed } from './outcome.js';

export const isGuardian = (guardian: Identity, caller: Identity): boolean => caller === guardian;

export const requireGuardian = (guardian: Identity, caller: Identity): Outcome<void> => (
  isGuardian(guardian, caller)
    ? succeed(undefined)
    : fail(FailureKind.UnauthorizedAccess, 'Only the guardian may perform this operation.')
);
