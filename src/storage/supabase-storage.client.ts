import fetch from "node-fetch";
import { SupabaseRequestError } from "../shared/errors";

export interface SupabaseStorageClientConfig {
  url: string;
  apiKey: string;
  bucket: string;
}

export interface StorageObject {
  name: string;
  /** `null` for folder placeholders. */
  id: string | null;
}

export class SupabaseStorageClient {
  constructor(private readonly config: SupabaseStorageClientConfig) {}

  get bucket(): string {
    return this.config.bucket;
  }

  getPublicUrl(path: string): string {
    return `${this.config.url}/storage/v1/object/public/${this.config.bucket}/${encodeObjectPath(path)}`;
  }

  async list(prefix = ""): Promise<StorageObject[]> {
    const response = await fetch(`${this.config.url}/storage/v1/object/list/${this.config.bucket}`, {
      method: "POST",
      headers: this.baseHeaders({ "content-type": "application/json" }),
      body: JSON.stringify({ prefix, limit: 1000, offset: 0 }),
    });
    if (!response.ok) {
      throw new SupabaseRequestError("storage list", response.status, await response.text());
    }

    const rows: unknown = await response.json();
    if (!Array.isArray(rows)) {
      return [];
    }
    return rows.flatMap((row: unknown): StorageObject[] => {
      if (typeof row !== "object" || row === null || !("name" in row) || typeof row.name !== "string") {
        return [];
      }
      const id = "id" in row && typeof row.id === "string" ? row.id : null;
      return [{ name: row.name, id }];
    });
  }

  async remove(paths: string[]): Promise<void> {
    if (paths.length === 0) {
      return;
    }
    const response = await fetch(`${this.config.url}/storage/v1/object/${this.config.bucket}`, {
      method: "DELETE",
      headers: this.baseHeaders({ "content-type": "application/json" }),
      body: JSON.stringify({ prefixes: paths }),
    });
    if (!response.ok) {
      throw new SupabaseRequestError("storage remove", response.status, await response.text());
    }
  }

  async upload(
    path: string,
    body: Buffer,
    contentType: string,
    options: { upsert: boolean } = { upsert: false },
  ): Promise<void> {
    const response = await fetch(
      `${this.config.url}/storage/v1/object/${this.config.bucket}/${encodeObjectPath(path)}`,
      {
        method: "POST",
        headers: this.baseHeaders({
          "content-type": contentType,
          "x-upsert": options.upsert ? "true" : "false",
        }),
        body,
      },
    );
    if (!response.ok) {
      throw new SupabaseRequestError(`storage upload of ${path}`, response.status, await response.text());
    }
  }

  private baseHeaders(extraHeaders: Record<string, string>): Record<string, string> {
    return {
      apikey: this.config.apiKey,
      authorization: `Bearer ${this.config.apiKey}`,
      ...extraHeaders,
    };
  }
}

function encodeObjectPath(path: string): string {
  return path
    .split("/")
    .filter((segment) => segment.length > 0)
    .map((segment) => encodeURIComponent(segment))
    .join("/");
}
