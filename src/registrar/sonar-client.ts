/**
 * Analysis-server HTTP client
 *
 * One client per worker. Requests authenticate with the token as basic-auth
 * user, time out after a fixed delay, and are retried a bounded number of
 * times on network errors and 5xx responses.
 */

import { z } from 'zod';
import type { HttpSettings, ServerSettings } from '../config/schema.js';

/**
 * Operations the registrar needs from the analysis server
 */
export interface AnalysisServerApi {
  projectExists(key: string): Promise<boolean>;
  createProject(key: string, name: string): Promise<void>;
  renameMainBranch(key: string, branch: string): Promise<void>;
  setProjectSetting(key: string, setting: string, value: string): Promise<void>;
}

/**
 * Non-2xx response from the analysis server
 */
export class SonarApiError extends Error {
  constructor(
    readonly method: string,
    readonly path: string,
    readonly status: number,
    readonly body: string
  ) {
    super(`${method} ${path} failed with HTTP ${status}${body ? `: ${body.slice(0, 300)}` : ''}`);
    this.name = 'SonarApiError';
  }
}

const ProjectSearchResponseSchema = z.object({
  paging: z.object({ total: z.number() }).optional(),
  components: z.array(z.object({ key: z.string() })).optional(),
});

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface SonarClientOptions {
  retries: number;
  retryDelayMs: number;
  timeoutMs: number;
  fetch?: FetchLike;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * HTTP client for the analysis server's web API
 */
export class SonarClient implements AnalysisServerApi {
  private readonly authHeader: string;
  private readonly fetchImpl: FetchLike;

  constructor(
    private readonly server: ServerSettings,
    private readonly options: SonarClientOptions
  ) {
    this.authHeader = `Basic ${Buffer.from(`${server.token}:`).toString('base64')}`;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  async projectExists(key: string): Promise<boolean> {
    const body = await this.request('GET', '/api/projects/search', { projects: key });
    const parsed = ProjectSearchResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new Error(`Unexpected response from /api/projects/search for ${key}`);
    }
    const total = parsed.data.paging?.total ?? parsed.data.components?.length ?? 0;
    return total > 0;
  }

  async createProject(key: string, name: string): Promise<void> {
    await this.request('POST', '/api/projects/create', { project: key, name });
  }

  async renameMainBranch(key: string, branch: string): Promise<void> {
    await this.request('POST', '/api/project_branches/rename', { project: key, name: branch });
  }

  async setProjectSetting(key: string, setting: string, value: string): Promise<void> {
    await this.request('POST', '/api/settings/set', { component: key, key: setting, value });
  }

  /**
   * Send one request with retries. GET parameters go in the query string,
   * POST parameters as a form body.
   *
   * @returns Parsed JSON body, or null for an empty body
   */
  private async request(
    method: 'GET' | 'POST',
    apiPath: string,
    params: Record<string, string>
  ): Promise<unknown> {
    const form = new URLSearchParams(params);
    const url = method === 'GET' ? `${this.server.host}${apiPath}?${form}` : `${this.server.host}${apiPath}`;

    let lastError: unknown;
    for (let attempt = 0; attempt <= this.options.retries; attempt++) {
      if (attempt > 0) {
        await sleep(this.options.retryDelayMs * attempt);
      }

      let response: Response;
      try {
        response = await this.fetchImpl(url, {
          method,
          headers: {
            Authorization: this.authHeader,
            Accept: 'application/json',
            ...(method === 'POST' ? { 'Content-Type': 'application/x-www-form-urlencoded' } : {}),
          },
          body: method === 'POST' ? form.toString() : undefined,
          signal: AbortSignal.timeout(this.options.timeoutMs),
        });
      } catch (error) {
        lastError = error;
        continue;
      }

      const text = await response.text();
      if (response.ok) {
        return text.length > 0 ? JSON.parse(text) : null;
      }

      lastError = new SonarApiError(method, apiPath, response.status, text);
      if (response.status < 500) {
        break;
      }
    }

    throw lastError instanceof Error ? lastError : new Error(`${method} ${apiPath} failed`);
  }
}

/**
 * Build a client for one worker
 */
export function createSonarClient(server: ServerSettings, http: HttpSettings, fetchImpl?: FetchLike): SonarClient {
  return new SonarClient(server, {
    retries: http.retries,
    retryDelayMs: http.retry_delay_ms,
    timeoutMs: http.timeout_ms,
    fetch: fetchImpl,
  });
}
