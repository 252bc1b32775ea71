import { HttpError } from "./errors.ts";
import { debug } from "./output.ts";

export interface HttpOptions {
  baseUrl: string;
  headers?: Record<string, string>;
}

export type QueryParams = Record<string, string | undefined>;

export interface RequestOptions {
  method?: string;
  params?: QueryParams;
  body?: unknown;
}

export interface RawResponse {
  status: number;
  ok: boolean;
}

export function buildUrl(baseUrl: string, path: string, params?: QueryParams): string {
  let url = `${baseUrl}${path}`;
  if (params) {
    const searchParams = new URLSearchParams();
    for (const [key, value] of Object.entries(params)) {
      if (value !== undefined && value !== "") {
        searchParams.set(key, value);
      }
    }
    const qs = searchParams.toString();
    if (qs) url += `?${qs}`;
  }
  return url;
}

export class HttpClient {
  constructor(private opts: HttpOptions) {}

  async send(path: string, options: RequestOptions = {}): Promise<Response> {
    const { method = "GET", params, body } = options;
    const url = buildUrl(this.opts.baseUrl, path, params);

    const headers: Record<string, string> = { ...this.opts.headers };
    const init: RequestInit = { method, headers };

    if (body !== undefined) {
      headers["Content-Type"] = "application/json";
      init.body = JSON.stringify(body);
    }

    debug(`${method} ${url}`);
    const res = await fetch(url, init);
    debug(`${method} ${path} -> ${res.status}`);
    return res;
  }

  /** Parsed JSON body; undefined for 204. Throws HttpError on non-2xx. */
  async request(path: string, options: RequestOptions = {}): Promise<unknown> {
    const res = await this.send(path, options);

    if (res.status === 204) {
      return undefined;
    }

    if (!res.ok) {
      const text = await res.text().catch(() => "");
      throw new HttpError(res.status, options.method ?? "GET", path, text);
    }

    const text = await res.text();
    return text ? (JSON.parse(text) as unknown) : undefined;
  }

  async get(path: string, params?: QueryParams): Promise<unknown> {
    return this.request(path, { params });
  }

  async post(path: string, body?: unknown): Promise<unknown> {
    return this.request(path, { method: "POST", body });
  }

  async delete(path: string): Promise<boolean> {
    const res = await this.send(path, { method: "DELETE" });
    return res.ok;
  }

  async raw(path: string, options: RequestOptions = {}): Promise<RawResponse> {
    const res = await this.send(path, options);
    return { status: res.status, ok: res.ok };
  }
}

/** `["date=2026-10-01", "limit=5"]` → query params; entries without `=` are ignored. */
export function parseQueryArgs(args: readonly string[]): Record<string, string> | undefined {
  const map: Record<string, string> = {};
  for (const arg of args) {
    const idx = arg.indexOf("=");
    if (idx > 0) map[arg.slice(0, idx)] = arg.slice(idx + 1);
  }
  return Object.keys(map).length ? map : undefined;
}
