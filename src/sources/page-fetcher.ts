import fetch from 'node-fetch';
import type { PageSource } from './base';
import type { Result } from '../types/listing';
import type { Config } from '../config';
import { logger } from '../utils/logger';

/**
 * Subset of the node-fetch response the fetcher reads
 */
export interface FetchResponse {
  ok: boolean;
  status: number;
  statusText: string;
  text(): Promise<string>;
}

export type FetchFn = (
  url: string,
  init: { headers: Record<string, string>; timeout: number }
) => Promise<FetchResponse>;

/**
 * Plain HTTP adapter for the floorplans page
 * One GET per call, no retries; the external scheduler re-runs the cycle
 */
export class HttpPageFetcher implements PageSource {
  readonly name = 'http';

  constructor(
    private config: Config['monitor'],
    private fetchFn: FetchFn = fetch
  ) {}

  async fetchPage(url: string): Promise<Result<string>> {
    try {
      logger.info(`Fetching floorplans from ${url}`);

      const response = await this.fetchFn(url, {
        headers: { 'User-Agent': this.config.userAgent },
        timeout: this.config.fetchTimeoutMs,
      });

      if (!response.ok) {
        const reason = `HTTP ${response.status} ${response.statusText}`.trim();
        logger.error(`Error fetching floorplans: ${reason}`, undefined, { url });
        return { ok: false, reason };
      }

      const html = await response.text();
      logger.debug(`Fetched ${html.length} characters`, { url, status: response.status });
      return { ok: true, value: html };
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      logger.error(`Error fetching floorplans: ${reason}`, error, { url });
      return { ok: false, reason, error };
    }
  }
}
