import { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { AppConfig } from '../config.js';
import { Failure } from '../domain/governance/outcome.js';
import {
  DomainError,
  ErrorCode,
  failureStatusCode,
  toErrorEnvelope,
} from '../errors/taxonomy.js';
import { GovernanceService } from '../services/governanceService.js';

interface RouteDeps {
  config: AppConfig;
  governanceService: GovernanceService;
}

export const CALLER_HEADER = 'x-caller-id';

const createInitiativeSchema = z.object({
  title: z.string(),
  summary: z.string(),
  span: z.number().optional(),
});

const configureSpanSchema = z.object({
  span: z.number(),
});

// Any id text is passed through; the ledger decides what a bad id means.
const initiativeParamsSchema = z.object({
  id: z.string().transform((raw) => Number(raw)),
});

const participantParamsSchema = initiativeParamsSchema.extend({
  participant: z.string().min(1),
});

const listQuerySchema = z.object({
  status: z.enum(['open', 'closed']).optional(),
});

const sendDomainError = (reply: FastifyReply, error: unknown): void => {
  if (error instanceof DomainError) {
    void reply.code(error.statusCode).send(toErrorEnvelope(error.code, error.message, error.details));
    return;
  }

  void reply.code(500).send(toErrorEnvelope(
    ErrorCode.InternalError,
    'Unexpected internal error',
    { error: String(error) },
  ));
};

const sendFailure = (reply: FastifyReply, failure: Failure): FastifyReply => reply
  .code(failureStatusCode[failure.kind])
  .send(toErrorEnvelope(failure.kind, failure.message));

const invalidPayload = (reply: FastifyReply, issues: z.ZodIssue[]): FastifyReply => reply
  .code(400)
  .send(toErrorEnvelope(ErrorCode.InvalidPayload, 'Invalid request.', issues));

const requireCaller = (request: FastifyRequest): string => {
  const header = request.headers[CALLER_HEADER];
  const caller = (Array.isArray(header) ? header[0] : header)?.trim();
  if (!caller) {
    throw new DomainError(
      ErrorCode.MissingCallerIdentity,
      401,
      `Missing ${CALLER_HEADER} header.`,
    );
  }
  return caller;
};

export async function registerRoutes(app: FastifyInstance, deps: RouteDeps): Promise<void> {
  const { governanceService } = deps;

  app.get('/health', async () => ({
    status: 'ok',
    name: deps.config.app.name,
    env: deps.config.app.env,
    guardian: governanceService.getConfiguration().guardian,
    totalInitiatives: governanceService.getTotal(),
    sequence: governanceService.currentSequence(),
  }));

  // ─── Initiatives ────────────────────────────────────────────────────

  app.post('/initiatives', async (request, reply) => {
    const parsed = createInitiativeSchema.safeParse(request.body);
    if (!parsed.success) return invalidPayload(reply, parsed.error.issues);

    try {
      const caller = requireCaller(request);
      const outcome = await governanceService.createInitiative(caller, parsed.data);
      if (!outcome.ok) return sendFailure(reply, outcome.failure);
      return reply.code(201).send({ id: outcome.value });
    } catch (error) {
      sendDomainError(reply, error);
    }
  });

  app.get('/initiatives', async (request, reply) => {
    const parsed = listQuerySchema.safeParse(request.query);
    if (!parsed.success) return invalidPayload(reply, parsed.error.issues);

    return { initiatives: governanceService.listInitiatives(parsed.data.status) };
  });

  app.get('/initiatives/total', async () => ({ total: governanceService.getTotal() }));

  app.get('/initiatives/:id', async (request, reply) => {
    const parsed = initiativeParamsSchema.safeParse(request.params);
    if (!parsed.success) return invalidPayload(reply, parsed.error.issues);

    const status = governanceService.getStatus(parsed.data.id);
    if (!status) {
      return reply.code(404).send(toErrorEnvelope(
        ErrorCode.InitiativeNotFound,
        `Initiative ${parsed.data.id} not found.`,
      ));
    }
    return status;
  });

  app.post('/initiatives/:id/signal', async (request, reply) => {
    const parsed = initiativeParamsSchema.safeParse(request.params);
    if (!parsed.success) return invalidPayload(reply, parsed.error.issues);

    try {
      const caller = requireCaller(request);
      const outcome = await governanceService.signal(caller, parsed.data.id);
      if (!outcome.ok) return sendFailure(reply, outcome.failure);
      return outcome.value;
    } catch (error) {
      sendDomainError(reply, error);
    }
  });

  app.post('/initiatives/:id/terminate', async (request, reply) => {
    const parsed = initiativeParamsSchema.safeParse(request.params);
    if (!parsed.success) return invalidPayload(reply, parsed.error.issues);

    try {
      const caller = requireCaller(request);
      const outcome = await governanceService.terminate(caller, parsed.data.id);
      if (!outcome.ok) return sendFailure(reply, outcome.failure);
      return { initiativeId: parsed.data.id, active: false };
    } catch (error) {
      sendDomainError(reply, error);
    }
  });

  app.get('/initiatives/:id/participants', async (request, reply) => {
    const parsed = initiativeParamsSchema.safeParse(request.params);
    if (!parsed.success) return invalidPayload(reply, parsed.error.issues);

    return { participants: governanceService.listParticipants(parsed.data.id) };
  });

  app.get('/initiatives/:id/participants/:participant', async (request, reply) => {
    const parsed = participantParamsSchema.safeParse(request.params);
    if (!parsed.success) return invalidPayload(reply, parsed.error.issues);

    const { id, participant } = parsed.data;
    return {
      initiativeId: id,
      participant,
      hasSignaled: governanceService.hasSignaled(participant, id),
      record: governanceService.getParticipation(participant, id),
    };
  });

  // ─── Configuration ──────────────────────────────────────────────────

  app.get('/config', async () => governanceService.getConfiguration());

  app.put('/config/default-span', async (request, reply) => {
    const parsed = configureSpanSchema.safeParse(request.body);
    if (!parsed.success) return invalidPayload(reply, parsed.error.issues);

    try {
      const caller = requireCaller(request);
      const outcome = await governanceService.configureDefaultSpan(caller, parsed.data.span);
      if (!outcome.ok) return sendFailure(reply, outcome.failure);
      return { standardDeliberationSpan: outcome.value };
    } catch (error) {
      sendDomainError(reply, error);
    }
  });
}
