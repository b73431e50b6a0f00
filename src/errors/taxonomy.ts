import { FailureKind } from '../domain/governance/outcome.js';

export const ErrorCode = {
  InvalidPayload: 'invalid_payload',
  MissingCallerIdentity: 'missing_caller_identity',
  UnauthorizedAccess: FailureKind.UnauthorizedAccess,
  DuplicateParticipation: FailureKind.DuplicateParticipation,
  InvalidInitiative: FailureKind.InvalidInitiative,
  DeliberationExpired: FailureKind.DeliberationExpired,
  MalformedInput: FailureKind.MalformedInput,
  InitiativeNotFound: FailureKind.InitiativeNotFound,
  DeliberationWindowExceeded: FailureKind.DeliberationWindowExceeded,
  InternalError: 'internal_error',
} as const;

export type ErrorCode = typeof ErrorCode[keyof typeof ErrorCode];

export const failureStatusCode: Record<FailureKind, number> = {
  [FailureKind.UnauthorizedAccess]: 403,
  [FailureKind.DuplicateParticipation]: 409,
  [FailureKind.InvalidInitiative]: 404,
  [FailureKind.DeliberationExpired]: 409,
  [FailureKind.MalformedInput]: 400,
  [FailureKind.InitiativeNotFound]: 404,
  [FailureKind.DeliberationWindowExceeded]: 400,
};

export class DomainError extends Error {
  constructor(
    public readonly code: ErrorCode,
    public readonly statusCode: number,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
  }
}

export const toErrorEnvelope = (
  code: ErrorCode,
  message: string,
  details?: unknown,
): {
  error: {
    code: ErrorCode;
    message: string;
    details?: unknown;
  };
} => ({
  error: {
    code,
    message,
    ...(details === undefined ? {} : { details }),
  },
});
