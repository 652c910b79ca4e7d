import fetch from "node-fetch";
import { HttpFetch } from "../shared/types/http.types";

export interface SupabaseRestClientConfig {
  url: string;
  serviceRoleKey: string;
}

export type SupabaseFilterValue = string | number | { in: ReadonlyArray<string | number> };

export class SupabaseRestClient {
  private readonly baseUrl: string;

  constructor(
    private readonly config: SupabaseRestClientConfig,
    private readonly fetchImpl: HttpFetch = fetch,
  ) {
    this.baseUrl = config.url.replace(/\/+$/, "");
  }

  async selectOne<T>(table: string, filters: Record<string, SupabaseFilterValue>, columns = "*"): Promise<T | null> {
    const rows = await this.selectMany<T>(table, filters, columns, { limit: 1 });
    if (!rows.length) {
      return null;
    }
    return rows[0];
  }

  async selectMany<T>(
    table: string,
    filters: Record<string, SupabaseFilterValue>,
    columns = "*",
    options?: { limit?: number; order?: string },
  ): Promise<T[]> {
    const query = new URLSearchParams();
    query.set("select", columns);
    for (const [key, value] of Object.entries(filters)) {
      query.set(key, formatFilter(value));
    }
    if (options?.order) {
      query.set("order", options.order);
    }
    if (typeof options?.limit === "number" && options.limit > 0) {
      query.set("limit", String(Math.floor(options.limit)));
    }

    const response = await this.fetchImpl(`${this.baseUrl}/rest/v1/${table}?${query.toString()}`, {
      method: "GET",
      headers: this.baseHeaders({
        accept: "application/json",
      }),
    });

    if (!response.ok) {
      const body = await response.text();
      throw new Error(`Supabase select failed: HTTP ${response.status} - ${body}`);
    }

    const rows = await response.json();
    return Array.isArray(rows) ? (rows as T[]) : [];
  }

  async rpc<TResult>(fnName: string, payload: Record<string, unknown>): Promise<TResult[]> {
    const response = await this.fetchImpl(`${this.baseUrl}/rest/v1/rpc/${fnName}`, {
      method: "POST",
      headers: this.baseHeaders({
        accept: "application/json",
      }),
      body: JSON.stringify(payload),
    });

    if (!response.ok) {
      const body = await response.text();
      throw new Error(`Supabase RPC failed (${fnName}): HTTP ${response.status} - ${body}`);
    }

    const rows = await response.json();
    return Array.isArray(rows) ? (rows as TResult[]) : [];
  }

  private baseHeaders(extraHeaders?: Record<string, string>): Record<string, string> {
    return {
      apikey: this.config.serviceRoleKey,
      authorization: `Bearer ${this.config.serviceRoleKey}`,
      "content-type": "application/json",
      ...(extraHeaders ?? {}),
    };
  }
}

function formatFilter(value: SupabaseFilterValue): string {
  if (typeof value === "object") {
    const items = value.in.map((item) => `"${String(item).replace(/"/g, '\\"')}"`);
    return `in.(${items.join(",")})`;
  }
  return `eq.${value}`;
}
