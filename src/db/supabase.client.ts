import fetch from "node-fetch";
import { SupabaseRequestError } from "../shared/errors";

export interface SupabaseRestClientConfig {
  url: string;
  apiKey: string;
}

export type FilterOperator = "eq" | "neq" | "gt" | "gte" | "lt" | "lte";

export interface ColumnFilter {
  column: string;
  operator: FilterOperator;
  value: string | number;
}

export interface SelectOptions {
  columns?: string;
  filters?: ColumnFilter[];
  orderBy?: { column: string; ascending?: boolean };
  limit?: number;
}

/** Narrow read surface the repositories depend on. Rows come back unvalidated. */
export interface SupabaseReader {
  selectMany(table: string, options?: SelectOptions): Promise<unknown[]>;
}

export interface SupabaseWriter {
  insert(table: string, payload: Record<string, unknown>): Promise<unknown[]>;
  deleteWhere(table: string, filter: ColumnFilter): Promise<void>;
}

export class SupabaseRestClient implements SupabaseReader, SupabaseWriter {
  constructor(private readonly config: SupabaseRestClientConfig) {}

  async selectMany(table: string, options: SelectOptions = {}): Promise<unknown[]> {
    const query = new URLSearchParams();
    query.set("select", options.columns ?? "*");
    appendFilters(query, options.filters);
    if (options.orderBy) {
      const direction = options.orderBy.ascending === false ? "desc" : "asc";
      query.set("order", `${options.orderBy.column}.${direction}`);
    }
    if (typeof options.limit === "number") {
      query.set("limit", String(options.limit));
    }

    const response = await fetch(`${this.config.url}/rest/v1/${table}?${query.toString()}`, {
      method: "GET",
      headers: this.baseHeaders({
        accept: "application/json",
      }),
    });

    if (!response.ok) {
      throw new SupabaseRequestError(`select on ${table}`, response.status, await response.text());
    }

    return toRows(await response.json());
  }

  async insert(table: string, payload: Record<string, unknown>): Promise<unknown[]> {
    const response = await fetch(`${this.config.url}/rest/v1/${table}`, {
      method: "POST",
      headers: this.baseHeaders({
        accept: "application/json",
        prefer: "return=representation",
      }),
      body: JSON.stringify(payload),
    });

    if (!response.ok) {
      throw new SupabaseRequestError(`insert into ${table}`, response.status, await response.text());
    }

    return toRows(await response.json());
  }

  async deleteWhere(table: string, filter: ColumnFilter): Promise<void> {
    const query = new URLSearchParams();
    appendFilters(query, [filter]);

    const response = await fetch(`${this.config.url}/rest/v1/${table}?${query.toString()}`, {
      method: "DELETE",
      headers: this.baseHeaders({
        prefer: "return=minimal",
      }),
    });

    if (!response.ok) {
      throw new SupabaseRequestError(`delete from ${table}`, response.status, await response.text());
    }
  }

  private baseHeaders(extraHeaders?: Record<string, string>): Record<string, string> {
    return {
      apikey: this.config.apiKey,
      authorization: `Bearer ${this.config.apiKey}`,
      "content-type": "application/json",
      ...(extraHeaders ?? {}),
    };
  }
}

function appendFilters(query: URLSearchParams, filters?: ColumnFilter[]): void {
  for (const filter of filters ?? []) {
    query.append(filter.column, `${filter.operator}.${filter.value}`);
  }
}

function toRows(payload: unknown): unknown[] {
  return Array.isArray(payload) ? payload : [];
}
