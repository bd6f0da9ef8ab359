import type { z } from 'zod';
import {
  ChildrenResponseSchema,
  CountedBalanceSchema,
  ErrorBodySchema,
  EventResponseSchema,
  FungibleBalanceSchema,
  HealthSchema,
  OwnerResponseSchema,
  RootResponseSchema,
  TargetResponseSchema,
  type AssetJson,
  type NodeJson,
  type WireEvent,
} from './wire.js';

export type Family = 'non-fungible' | 'fungible' | 'counted';
export type Action = 'link' | 'update-target' | 'unlink';

/** A non-2xx answer from the server, carrying its error kind when the server named one. */
export class GraphClientError extends Error {
  readonly status: number;
  readonly kind?: string;
  readonly errors: string[];

  constructor(status: number, detail: string, kind?: string, errors: string[] = []) {
    super(detail);
    this.name = 'GraphClientError';
    this.status = status;
    this.kind = kind;
    this.errors = errors;
  }
}

export class GraphClient {
  private baseUrl: string;
  private token: string;

  constructor(baseUrl: string, token: string) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
    this.token = token;
  }

  /** WebSocket URL of the notification stream. */
  get eventsUrl(): string {
    return `${this.baseUrl.replace(/^http/, 'ws')}/ws/events?token=${encodeURIComponent(this.token)}`;
  }

  private headers(): Record<string, string> {
    return {
      'Content-Type': 'application/json',
      Authorization: `Bearer ${this.token}`,
    };
  }

  private async request<S extends z.ZodTypeAny>(path: string, schema: S, body?: unknown): Promise<z.output<S>> {
    const res = await fetch(`${this.baseUrl}${path}`, {
      method: body === undefined ? 'GET' : 'POST',
      headers: this.headers(),
      ...(body === undefined ? {} : { body: JSON.stringify(body) }),
    });
    const payload: unknown = await res.json().catch(() => null);
    if (!res.ok) {
      const error = ErrorBodySchema.safeParse(payload);
      if (error.success) {
        throw new GraphClientError(res.status, error.data.detail, error.data.kind, error.data.errors);
      }
      throw new GraphClientError(res.status, `Request failed: ${res.status}`);
    }
    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      throw new Error(`Unexpected response from ${path}: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  private nodePath(node: NodeJson): string {
    return `/api/nodes/${encodeURIComponent(node.collection)}/${encodeURIComponent(node.token_id)}`;
  }

  health(): Promise<z.output<typeof HealthSchema>> {
    return this.request('/api/health', HealthSchema);
  }

  async root(node: NodeJson): Promise<NodeJson> {
    return (await this.request(`${this.nodePath(node)}/root`, RootResponseSchema)).root;
  }

  async target(node: NodeJson): Promise<NodeJson | null> {
    return (await this.request(`${this.nodePath(node)}/target`, TargetResponseSchema)).target;
  }

  async children(node: NodeJson): Promise<NodeJson[]> {
    return (await this.request(`${this.nodePath(node)}/children`, ChildrenResponseSchema)).children;
  }

  owner(node: NodeJson): Promise<z.output<typeof OwnerResponseSchema>> {
    return this.request(`${this.nodePath(node)}/owner`, OwnerResponseSchema);
  }

  async fungibleBalance(node: NodeJson, currency: string): Promise<string> {
    const path = `${this.nodePath(node)}/balances/fungible/${encodeURIComponent(currency)}`;
    return (await this.request(path, FungibleBalanceSchema)).amount;
  }

  async countedBalance(node: NodeJson, asset: AssetJson): Promise<string> {
    const path = `${this.nodePath(node)}/balances/counted/${encodeURIComponent(asset.collection)}/${encodeURIComponent(asset.asset_id)}`;
    return (await this.request(path, CountedBalanceSchema)).amount;
  }

  /** Run one composition operation and return the notification it produced. */
  async compose(family: Family, action: Action, body: Record<string, unknown>): Promise<WireEvent> {
    return (await this.request(`/api/compose/${family}/${action}`, EventResponseSchema, body)).event;
  }
}
