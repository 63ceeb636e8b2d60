/**
 * Registry client for querying the versions a package has published.
 *
 * Injectable for testability: the orchestrator only sees the interface, and
 * the PyPI implementation accepts an undici dispatcher so tests can answer
 * requests with a MockAgent.
 */

import { Agent, fetch, type Dispatcher } from 'undici';
import { RegistryReleasesResponse } from '../schemas/registry.schema.js';
import { FetchFailedError } from '../utils/errors.js';

// ---------------------------------------------------------------------------
// Client interface
// ---------------------------------------------------------------------------

export interface RegistryClient {
  /**
   * Fetch every raw version string the registry knows for a package.
   * A single attempt: no caching, no retry.
   */
  fetchReleases(packageName: string): Promise<Set<string>>;

  /** Release pooled connections. */
  close(): Promise<void>;
}

// ---------------------------------------------------------------------------
// PyPI JSON API implementation
// ---------------------------------------------------------------------------

export interface PypiClientOptions {
  /** e.g. "https://pypi.io/pypi" */
  indexUrl: string;
  /** Applied to both the response headers and the body */
  timeoutMs: number;
  /** Custom dispatcher; by default the client creates and owns an Agent */
  dispatcher?: Dispatcher;
}

/**
 * URL of the JSON document describing `packageName`.
 */
export function releasesUrl(indexUrl: string, packageName: string): string {
  return `${indexUrl.replace(/\/+$/, '')}/${encodeURIComponent(packageName)}/json`;
}

export function createPypiClient(options: PypiClientOptions): RegistryClient {
  const ownsDispatcher = options.dispatcher === undefined;
  const dispatcher =
    options.dispatcher ??
    new Agent({
      headersTimeout: options.timeoutMs,
      bodyTimeout: options.timeoutMs,
      connect: { timeout: options.timeoutMs },
    });

  return {
    async fetchReleases(packageName: string): Promise<Set<string>> {
      const url = releasesUrl(options.indexUrl, packageName);

      let body: unknown;
      try {
        const response = await fetch(url, {
          dispatcher,
          headers: { accept: 'application/json' },
        });
        if (!response.ok) {
          await response.body?.cancel();
          throw new FetchFailedError(url, { status: response.status });
        }
        body = await response.json();
      } catch (err) {
        if (err instanceof FetchFailedError) throw err;
        throw new FetchFailedError(url, {
          reason: err instanceof Error ? err.message : String(err),
          cause: err,
        });
      }

      const parsed = RegistryReleasesResponse.safeParse(body);
      if (!parsed.success) {
        throw new FetchFailedError(url, { reason: 'response has no releases mapping' });
      }
      return new Set(Object.keys(parsed.data.releases));
    },

    async close(): Promise<void> {
      if (ownsDispatcher) await dispatcher.close();
    },
  };
}
