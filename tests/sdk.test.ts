import { describe, expect, it, vi } from 'vitest';
import { LedgerAPIClient, LedgerAPIError } from '../src/sdk/index.js';

// ─── Mock fetch helper ─────────────────────────────────────────────────────

function mockFetch(status: number, body: unknown): typeof globalThis.fetch {
  return vi.fn().mockResolvedValue({
    ok: status >= 200 && status < 300,
    status,
    json: async () => body,
  }) as unknown as typeof globalThis.fetch;
}

const BASE = 'http://localhost:8787';

describe('LedgerAPIClient', () => {
  it('strips trailing slashes from baseUrl', async () => {
    const fetch = mockFetch(200, { status: 'ok' });
    const client = new LedgerAPIClient({ baseUrl: 'http://localhost:8787///', fetch });

    await client.health();

    expect(fetch).toHaveBeenCalledWith('http://localhost:8787/health', expect.anything());
  });

  it('sends the caller identity and JSON body when creating', async () => {
    const fetch = mockFetch(201, { id: 3 });
    const client = new LedgerAPIClient({ baseUrl: BASE, callerId: 'guardian', fetch });

    const id = await client.createInitiative({ title: 'Upgrade', summary: 'Add feature' });

    expect(id).toBe(3);
    expect(fetch).toHaveBeenCalledWith(`${BASE}/initiatives`, {
      method: 'POST',
      headers: { 'content-type': 'application/json', 'x-caller-id': 'guardian' },
      body: JSON.stringify({ title: 'Upgrade', summary: 'Add feature' }),
    });
  });

  it('posts signals without a body', async () => {
    const receipt = {
      participant: 'alice',
      initiativeId: 1,
      participated: true,
      participationSequence: 10,
      consensusTally: 1,
    };
    const fetch = mockFetch(200, receipt);
    const client = new LedgerAPIClient({ baseUrl: BASE, fetch }).as('alice');

    expect(await client.signal(1)).toEqual(receipt);
    expect(fetch).toHaveBeenCalledWith(`${BASE}/initiatives/1/signal`, {
      method: 'POST',
      headers: { 'x-caller-id': 'alice' },
      body: undefined,
    });
  });

  it('raises LedgerAPIError with the failure kind', async () => {
    const fetch = mockFetch(409, {
      error: { code: 'DUPLICATE_PARTICIPATION', message: 'alice has already signaled on initiative 1.' },
    });
    const client = new LedgerAPIClient({ baseUrl: BASE, callerId: 'alice', fetch });

    const error = await client.signal(1).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(LedgerAPIError);
    expect(error).toMatchObject({ status: 409, code: 'DUPLICATE_PARTICIPATION' });
  });

  it('falls back to an HTTP code when the body is not an envelope', async () => {
    const fetch = vi.fn().mockResolvedValue({
      ok: false,
      status: 502,
      json: async () => {
        throw new SyntaxError('Unexpected token');
      },
    }) as unknown as typeof globalThis.fetch;
    const client = new LedgerAPIClient({ baseUrl: BASE, fetch });

    await expect(client.getTotal()).rejects.toMatchObject({ status: 502, code: 'HTTP_502' });
  });

  it('returns null status for unknown initiatives', async () => {
    const fetch = mockFetch(404, { error: { code: 'INITIATIVE_NOT_FOUND', message: 'Initiative 9 not found.' } });
    const client = new LedgerAPIClient({ baseUrl: BASE, fetch });

    expect(await client.getStatus(9)).toBeNull();
  });

  it('encodes participant identities in the path', async () => {
    const fetch = mockFetch(200, { initiativeId: 2, participant: 'a b', hasSignaled: false, record: null });
    const client = new LedgerAPIClient({ baseUrl: BASE, fetch });

    expect(await client.hasSignaled('a b', 2)).toBe(false);
    expect(fetch).toHaveBeenCalledWith(`${BASE}/initiatives/2/participants/a%20b`, expect.anything());
  });

  it('filters listings by status', async () => {
    const fetch = mockFetch(200, { initiatives: [] });
    const client = new LedgerAPIClient({ baseUrl: BASE, fetch });

    await client.listInitiatives('closed');

    expect(fetch).toHaveBeenCalledWith(`${BASE}/initiatives?status=closed`, expect.anything());
  });

  it('updates the default span with PUT', async () => {
    const fetch = mockFetch(200, { standardDeliberationSpan: 86_400 });
    const client = new LedgerAPIClient({ baseUrl: BASE, callerId: 'guardian', fetch });

    expect(await client.configureDefaultSpan(86_400)).toBe(86_400);
    expect(fetch).toHaveBeenCalledWith(`${BASE}/config/default-span`, expect.objectContaining({ method: 'PUT' }));
  });
});
