import fs from 'node:fs/promises';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { DEFAULT_SPAN, MAX_SPAN, MIN_SPAN } from '../src/domain/governance/governanceTypes.js';
import { FailureKind } from '../src/domain/governance/outcome.js';
import { eventBus } from '../src/infra/eventBus.js';
import { EventLogger } from '../src/infra/logger.js';
import { ManualSequenceClock } from '../src/infra/sequenceClock.js';
import { StateStore } from '../src/infra/storage/stateStore.js';
import { GovernanceService } from '../src/services/governanceService.js';

const GUARDIAN = 'guardian-1';
const GENESIS = 1_000;

let dir: string;
let store: StateStore;
let logger: EventLogger;
let clock: ManualSequenceClock;
let service: GovernanceService;

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(process.cwd(), '.test-governance-'));
  store = new StateStore(path.join(dir, 'ledger.json'));
  await store.init();
  logger = new EventLogger(path.join(dir, 'events.ndjson'));
  await logger.init();
  clock = new ManualSequenceClock(GENESIS);
  service = new GovernanceService(store, logger, clock, GUARDIAN);
});

afterEach(async () => {
  vi.restoreAllMocks();
  eventBus.clear();
  await store.flush();
  await fs.rm(dir, { recursive: true, force: true });
});

const upgrade = { title: 'Upgrade', summary: 'Add feature' };

describe('GovernanceService', () => {
  it('opens an initiative and reports it expired once the sequence passes its span', async () => {
    const created = await service.createInitiative(GUARDIAN, { ...upgrade, span: MIN_SPAN });

    expect(created).toEqual({ ok: true, value: 1 });
    expect(service.getTotal()).toBe(1);

    const opened = service.getStatus(1);
    expect(opened?.isActive).toBe(true);
    expect(opened?.remaining).toBe(MIN_SPAN);

    clock.advance(MIN_SPAN + 1);
    const expired = service.getStatus(1);
    expect(expired?.isActive).toBe(false);
    expect(expired?.remaining).toBe(-1);
    expect(expired?.initiative.active).toBe(true);
  });

  it('grows the total by one per creation and returns the new total as id', async () => {
    for (let expected = 1; expected <= 4; expected++) {
      const outcome = await service.createInitiative(GUARDIAN, upgrade);
      expect(outcome).toEqual({ ok: true, value: expected });
      expect(service.getTotal()).toBe(expected);
    }
  });

  it('refuses creation by anyone but the guardian', async () => {
    const outcome = await service.createInitiative('mallory', upgrade);

    expect(outcome).toMatchObject({ ok: false, failure: { kind: FailureKind.UnauthorizedAccess } });
    expect(service.getTotal()).toBe(0);
  });

  it('refuses a span above the maximum and creates nothing', async () => {
    const outcome = await service.createInitiative(GUARDIAN, { ...upgrade, span: MAX_SPAN + 1 });

    expect(outcome).toMatchObject({ ok: false, failure: { kind: FailureKind.MalformedInput } });
    expect(service.getTotal()).toBe(0);
  });

  it('treats signals on unknown ids as invalid', async () => {
    await service.createInitiative(GUARDIAN, upgrade);

    const outcome = await service.signal('alice', 99);

    expect(outcome).toMatchObject({ ok: false, failure: { kind: FailureKind.InvalidInitiative } });
    expect(service.hasSignaled('alice', 99)).toBe(false);
    expect(service.hasSignaled('anyone', 99)).toBe(false);
  });

  it('keeps the prior default span after a rejected reconfiguration', async () => {
    const outcome = await service.configureDefaultSpan(GUARDIAN, MIN_SPAN - 1);

    expect(outcome).toMatchObject({ ok: false, failure: { kind: FailureKind.MalformedInput } });
    expect(service.getConfiguration().standardDeliberationSpan).toBe(DEFAULT_SPAN);

    await service.createInitiative(GUARDIAN, upgrade);
    expect(service.getStatus(1)?.initiative.deliberationSpan).toBe(DEFAULT_SPAN);
  });

  it('uses a reconfigured default for later initiatives only', async () => {
    await service.createInitiative(GUARDIAN, upgrade);
    expect(await service.configureDefaultSpan(GUARDIAN, MAX_SPAN)).toEqual({ ok: true, value: MAX_SPAN });
    await service.createInitiative(GUARDIAN, upgrade);

    expect(service.getStatus(1)?.initiative.deliberationSpan).toBe(DEFAULT_SPAN);
    expect(service.getStatus(2)?.initiative.deliberationSpan).toBe(MAX_SPAN);
  });

  it('refuses reconfiguration by anyone but the guardian', async () => {
    const outcome = await service.configureDefaultSpan('mallory', MAX_SPAN);

    expect(outcome).toMatchObject({ ok: false, failure: { kind: FailureKind.UnauthorizedAccess } });
  });

  it('returns a receipt with the new tally and refuses repeat signals', async () => {
    await service.createInitiative(GUARDIAN, upgrade);
    clock.advance(30);

    const first = await service.signal('alice', 1);
    expect(first).toEqual({
      ok: true,
      value: {
        participant: 'alice',
        initiativeId: 1,
        participated: true,
        participationSequence: GENESIS + 30,
        consensusTally: 1,
      },
    });

    const repeat = await service.signal('alice', 1);
    expect(repeat).toMatchObject({ ok: false, failure: { kind: FailureKind.DuplicateParticipation } });
    expect(service.getStatus(1)?.initiative.consensusTally).toBe(1);
  });

  it('refuses signals once the window has closed', async () => {
    await service.createInitiative(GUARDIAN, { ...upgrade, span: MIN_SPAN });
    clock.advance(MIN_SPAN);

    const outcome = await service.signal('alice', 1);

    expect(outcome).toMatchObject({ ok: false, failure: { kind: FailureKind.DeliberationExpired } });
  });

  it('terminates idempotently and keeps the initiative inactive afterwards', async () => {
    await service.createInitiative(GUARDIAN, upgrade);

    expect((await service.terminate(GUARDIAN, 1)).ok).toBe(true);
    expect((await service.terminate(GUARDIAN, 1)).ok).toBe(true);

    expect(service.getStatus(1)?.isActive).toBe(false);
    clock.advance(10);
    expect(service.getStatus(1)?.isActive).toBe(false);
  });

  it('distinguishes unknown ids from unauthorized callers on terminate', async () => {
    await service.createInitiative(GUARDIAN, upgrade);

    expect(await service.terminate(GUARDIAN, 3)).toMatchObject({
      ok: false,
      failure: { kind: FailureKind.InitiativeNotFound },
    });
    expect(await service.terminate('mallory', 1)).toMatchObject({
      ok: false,
      failure: { kind: FailureKind.UnauthorizedAccess },
    });
    expect(service.getStatus(1)?.isActive).toBe(true);
  });

  it('counts concurrent signals from distinct participants exactly once each', async () => {
    await service.createInitiative(GUARDIAN, upgrade);
    const participants = Array.from({ length: 20 }, (_, i) => `participant-${i}`);

    const outcomes = await Promise.all(participants.map((p) => service.signal(p, 1)));

    expect(outcomes.every((o) => o.ok)).toBe(true);
    expect(service.getStatus(1)?.initiative.consensusTally).toBe(20);
    expect(service.listParticipants(1)).toHaveLength(20);
  });

  it('accepts only one of several concurrent signals from the same participant', async () => {
    await service.createInitiative(GUARDIAN, upgrade);

    const outcomes = await Promise.all(Array.from({ length: 5 }, () => service.signal('alice', 1)));

    expect(outcomes.filter((o) => o.ok)).toHaveLength(1);
    expect(outcomes.filter((o) => !o.ok && o.failure.kind === FailureKind.DuplicateParticipation)).toHaveLength(4);
    expect(service.getStatus(1)?.initiative.consensusTally).toBe(1);
  });

  it('leaves committed state untouched by failed operations', async () => {
    await service.createInitiative(GUARDIAN, upgrade);
    await service.signal('alice', 1);
    const before = store.snapshot();

    await service.signal('alice', 1);
    await service.createInitiative('mallory', upgrade);
    await service.terminate('mallory', 1);
    await service.configureDefaultSpan(GUARDIAN, 0);

    expect(store.snapshot()).toEqual(before);
  });

  it('publishes accepted and rejected operations on the event bus', async () => {
    const received: Array<{ event: string; data: unknown }> = [];
    eventBus.on('*', (event, data) => {
      received.push({ event, data });
    });

    await service.createInitiative(GUARDIAN, upgrade);
    await service.signal('mallory', 7);

    expect(received).toEqual([
      {
        event: 'initiative.created',
        data: { caller: GUARDIAN, initiativeId: 1, title: 'Upgrade', genesisSequence: GENESIS },
      },
      {
        event: 'ledger.operation.rejected',
        data: {
          operation: 'signal',
          caller: 'mallory',
          kind: FailureKind.InvalidInitiative,
          message: 'Initiative 7 does not exist.',
        },
      },
    ]);
  });

  it('logs every operation with its outcome', async () => {
    await service.createInitiative(GUARDIAN, upgrade);
    await service.createInitiative('mallory', upgrade);
    await service.terminate(GUARDIAN, 1);

    const entries = await logger.readAll();
    expect(entries.map((e) => [e.level, e.event])).toEqual([
      ['info', 'ledger.create.accepted'],
      ['warn', 'ledger.create.rejected'],
      ['info', 'ledger.terminate.accepted'],
    ]);
    expect(entries[1].data).toMatchObject({ caller: 'mallory', kind: FailureKind.UnauthorizedAccess });
  });

  it('reports a committed operation as accepted even when its log write fails', async () => {
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logPath = path.join(dir, 'events.ndjson');
    await fs.rm(logPath, { force: true });
    await fs.mkdir(logPath);

    const created = await service.createInitiative(GUARDIAN, upgrade);

    expect(created).toEqual({ ok: true, value: 1 });
    expect(service.getTotal()).toBe(1);
    expect(stderr).toHaveBeenCalledTimes(1);
    expect(stderr.mock.calls[0][0]).toBe('event log write failed for ledger.create.accepted');
  });

  it('commits nothing when the state file cannot be written', async () => {
    const statePath = path.join(dir, 'ledger.json');
    await fs.rm(statePath);
    await fs.mkdir(statePath);

    await expect(service.createInitiative(GUARDIAN, upgrade)).rejects.toMatchObject({ code: 'EISDIR' });
    expect(service.getTotal()).toBe(0);
    expect(service.getStatus(1)).toBeNull();

    await fs.rm(statePath, { recursive: true });
  });
});
