import type { Result } from '../types/listing';

/**
 * Base interface for anything that can supply listing page HTML
 */
export interface PageSource {
  /**
   * Identifier used in log lines
   */
  readonly name: string;

  /**
   * Fetches the raw HTML of a page
   * @returns The page body, or a failure reason when nothing could be fetched
   */
  fetchPage(url: string): Promise<Result<string>>;
}
