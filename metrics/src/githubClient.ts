import type { z } from 'zod';

export const GITHUB_API_URL = 'https://api.github.com';
export const PAGE_SIZE = 100;
export const MAX_PAGES = 10;

const REQUEST_TIMEOUT_MS = 30_000;
const USER_AGENT = 'delivery-metrics/1.0';

export type QueryParams = Record<string, string | number>;

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export class GitHubApiError extends Error {
  constructor(
    public readonly status: number,
    public readonly url: string,
    responseBody: string,
  ) {
    super(`GitHub API request failed with status ${status} for ${url}${responseBody ? `: ${responseBody.slice(0, 200)}` : ''}`);
    this.name = 'GitHubApiError';
  }
}

export interface GitHubClientOptions {
  token: string;
  baseUrl?: string;
  timeoutMs?: number;
  fetch?: FetchLike;
}

export class GitHubClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly headers: Record<string, string>;

  constructor(opts: GitHubClientOptions) {
    this.baseUrl = opts.baseUrl ?? GITHUB_API_URL;
    this.timeoutMs = opts.timeoutMs ?? REQUEST_TIMEOUT_MS;
    this.fetchImpl = opts.fetch ?? ((url, init) => fetch(url, init));
    this.headers = {
      Accept: 'application/vnd.github+json',
      'X-GitHub-Api-Version': '2022-11-28',
      'User-Agent': USER_AGENT,
    };
    if (opts.token) {
      this.headers.Authorization = `Bearer ${opts.token}`;
    }
  }

  /** Single GET; any non-2xx status throws {@link GitHubApiError}. */
  async get<T>(endpoint: string, params: QueryParams, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    const url = new URL(`${this.baseUrl}${endpoint}`);
    Object.entries(params).forEach(([k, v]) => url.searchParams.set(k, String(v)));

    console.debug(`[github] GET ${url.pathname}${url.search}`);
    const res = await this.fetchImpl(url.toString(), {
      headers: this.headers,
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    if (!res.ok) {
      throw new GitHubApiError(res.status, url.toString(), await res.text());
    }
    return schema.parse(await res.json());
  }

  /**
   * Walks `page=1..MAX_PAGES` with `per_page=PAGE_SIZE`, stopping at the first
   * short (or empty) page. Collections longer than MAX_PAGES * PAGE_SIZE are
   * truncated.
   */
  async getPaginated<T>(
    endpoint: string,
    params: QueryParams,
    pageSchema: z.ZodType<T[], z.ZodTypeDef, unknown>,
  ): Promise<T[]> {
    const items: T[] = [];
    for (let page = 1; page <= MAX_PAGES; page++) {
      const pageItems = await this.get(endpoint, { ...params, per_page: PAGE_SIZE, page }, pageSchema);
      items.push(...pageItems);
      if (pageItems.length < PAGE_SIZE) break;
    }
    return items;
  }
}
