// ─── LedgerAPIClient ───────────────────────────────────────────────────────
// Lightweight, zero-dependency SDK client for the initiative ledger API.
// Uses native fetch; the caller identity travels in the x-caller-id header.
// ────────────────────────────────────────────────────────────────────────────

import type {
  APIErrorEnvelope,
  CreateInitiativeOpts,
  HealthResponse,
  InitiativeFilter,
  InitiativeStatus,
  LedgerConfiguration,
  ParticipationRecord,
  SignalCheck,
  SignalReceipt,
} from './types.js';

export class LedgerAPIError extends Error {
  constructor(
    public readonly status: number,
    public readonly code: string,
    message: string,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = 'LedgerAPIError';
  }
}

export interface LedgerAPIClientOptions {
  /** Base URL of the API server (e.g. "http://localhost:8787"). */
  baseUrl: string;
  /** Identity sent as x-caller-id; required for create, signal, terminate and configuration. */
  callerId?: string;
  /** Optional custom fetch implementation (defaults to globalThis.fetch). */
  fetch?: typeof globalThis.fetch;
}

const isErrorEnvelope = (body: unknown): body is APIErrorEnvelope => (
  typeof body === 'object'
  && body !== null
  && 'error' in body
  && typeof body.error === 'object'
  && body.error !== null
);

export class LedgerAPIClient {
  private readonly baseUrl: string;
  private readonly callerId?: string;
  private readonly _fetch: typeof globalThis.fetch;

  constructor(baseUrl: string, callerId?: string);
  constructor(opts: LedgerAPIClientOptions);
  constructor(baseUrlOrOpts: string | LedgerAPIClientOptions, callerId?: string) {
    if (typeof baseUrlOrOpts === 'string') {
      this.baseUrl = baseUrlOrOpts.replace(/\/+$/, '');
      this.callerId = callerId;
      this._fetch = globalThis.fetch;
    } else {
      this.baseUrl = baseUrlOrOpts.baseUrl.replace(/\/+$/, '');
      this.callerId = baseUrlOrOpts.callerId;
      this._fetch = baseUrlOrOpts.fetch ?? globalThis.fetch;
    }
  }

  /** A client for the same server acting as another identity. */
  as(callerId: string): LedgerAPIClient {
    return new LedgerAPIClient({ baseUrl: this.baseUrl, callerId, fetch: this._fetch });
  }

  // ─── Internal helpers ──────────────────────────────────────────────────

  private headers(withBody: boolean): Record<string, string> {
    const h: Record<string, string> = {};
    // Fastify rejects an empty body declared as JSON.
    if (withBody) h['content-type'] = 'application/json';
    if (this.callerId) h['x-caller-id'] = this.callerId;
    return h;
  }

  private async request<T>(method: string, path: string, body?: unknown): Promise<T> {
    const url = `${this.baseUrl}${path}`;
    const res = await this._fetch(url, {
      method,
      headers: this.headers(body !== undefined),
      body: body !== undefined ? JSON.stringify(body) : undefined,
    });

    if (!res.ok) {
      let errorBody: unknown;
      try {
        errorBody = await res.json();
      } catch {
        errorBody = undefined;
      }
      const envelope = isErrorEnvelope(errorBody) ? errorBody.error : undefined;
      throw new LedgerAPIError(
        res.status,
        envelope?.code ?? `HTTP_${res.status}`,
        envelope?.message ?? `Request failed: ${method} ${path} → ${res.status}`,
        envelope?.details,
      );
    }

    return (await res.json()) as T;
  }

  private get<T>(path: string): Promise<T> {
    return this.request<T>('GET', path);
  }

  private post<T>(path: string, body?: unknown): Promise<T> {
    return this.request<T>('POST', path, body);
  }

  // ─── System ────────────────────────────────────────────────────────────

  async health(): Promise<HealthResponse> {
    return this.get<HealthResponse>('/health');
  }

  // ─── Initiatives ───────────────────────────────────────────────────────

  /** Register an initiative. Only the guardian identity succeeds. Returns the new id. */
  async createInitiative(opts: CreateInitiativeOpts): Promise<number> {
    const result = await this.post<{ id: number }>('/initiatives', opts);
    return result.id;
  }

  /** Status of one initiative, or null when the id is unknown. */
  async getStatus(id: number): Promise<InitiativeStatus | null> {
    try {
      return await this.get<InitiativeStatus>(`/initiatives/${id}`);
    } catch (error) {
      if (error instanceof LedgerAPIError && error.status === 404) return null;
      throw error;
    }
  }

  async listInitiatives(status?: InitiativeFilter): Promise<InitiativeStatus[]> {
    const qs = status ? `?status=${status}` : '';
    const result = await this.get<{ initiatives: InitiativeStatus[] }>(`/initiatives${qs}`);
    return result.initiatives;
  }

  async getTotal(): Promise<number> {
    const result = await this.get<{ total: number }>('/initiatives/total');
    return result.total;
  }

  async terminate(id: number): Promise<void> {
    await this.post(`/initiatives/${id}/terminate`);
  }

  // ─── Participation ─────────────────────────────────────────────────────

  /** Cast this client's one signal on an initiative. */
  async signal(id: number): Promise<SignalReceipt> {
    return this.post<SignalReceipt>(`/initiatives/${id}/signal`);
  }

  async hasSignaled(participant: string, id: number): Promise<boolean> {
    const result = await this.get<SignalCheck>(
      `/initiatives/${id}/participants/${encodeURIComponent(participant)}`,
    );
    return result.hasSignaled;
  }

  async listParticipants(id: number): Promise<ParticipationRecord[]> {
    const result = await this.get<{ participants: ParticipationRecord[] }>(`/initiatives/${id}/participants`);
    return result.participants;
  }

  // ─── Configuration ─────────────────────────────────────────────────────

  async getConfiguration(): Promise<LedgerConfiguration> {
    return this.get<LedgerConfiguration>('/config');
  }

  async configureDefaultSpan(span: number): Promise<number> {
    const result = await this.request<{ standardDeliberationSpan: number }>(
      'PUT',
      '/config/default-span',
      { span },
    );
    return result.standardDeliberationSpan;
  }
}
