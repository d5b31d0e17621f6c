import * as cheerio from 'cheerio';
import type { ListingMatch } from '../types/listing';
import { logger } from '../utils/logger';
import { truncateChars } from '../utils/text';

/**
 * Keyword heuristics used to pick listing elements out of a floorplans page.
 * The target site's real markup is unknown, so these are deliberately broad.
 */
export interface ScanCriteria {
  category: string;
  containerTags: string[];
  classKeywords: string[];
  categoryKeyword: string;
  bedroomKeywords: string[];
  availabilityKeywords: string[];
  excerptLength: number;
}

export const DEFAULT_SCAN_CRITERIA: ScanCriteria = {
  category: 'ARO One-Bedroom',
  containerTags: ['div', 'article', 'section'],
  classKeywords: ['apartment', 'unit', 'floorplan', 'listing'],
  categoryKeyword: 'aro',
  bedroomKeywords: ['1 bed', 'one bed'],
  availabilityKeywords: ['available', 'now'],
  excerptLength: 200,
};

/**
 * Scans page HTML for elements describing the watched unit category
 */
export class ListingScanner {
  constructor(
    private criteria: ScanCriteria = DEFAULT_SCAN_CRITERIA,
    private clock: () => Date = () => new Date()
  ) {}

  /**
   * Checks whether any token of a class attribute contains a listing keyword
   */
  isCandidateClass(classAttr: string | undefined): boolean {
    if (!classAttr) return false;
    return classAttr
      .split(/\s+/)
      .filter(token => token.length > 0)
      .some(token => {
        const lowerToken = token.toLowerCase();
        return this.criteria.classKeywords.some(keyword => lowerToken.includes(keyword));
      });
  }

  /**
   * Returns every matching element in document order.
   * Never throws: a parsing anomaly is logged and yields no matches.
   */
  scan(html: string): ListingMatch[] {
    try {
      const $ = cheerio.load(html);
      const matches: ListingMatch[] = [];

      const candidates = $(this.criteria.containerTags.join(', ')).filter((_, el) =>
        this.isCandidateClass($(el).attr('class'))
      );

      candidates.each((_, el) => {
        const text = $(el).text();
        const lowerText = text.toLowerCase();

        if (!lowerText.includes(this.criteria.categoryKeyword)) return;
        if (!this.criteria.bedroomKeywords.some(keyword => lowerText.includes(keyword))) return;

        matches.push({
          category: this.criteria.category,
          isAvailable: this.criteria.availabilityKeywords.some(keyword => lowerText.includes(keyword)),
          excerpt: truncateChars(text.trim(), this.criteria.excerptLength),
          observedAt: this.clock(),
        });
      });

      logger.info(`Found ${matches.length} ARO one-bedroom units`, {
        candidates: candidates.length,
      });
      return matches;
    } catch (error) {
      logger.error('Error parsing ARO units', error);
      return [];
    }
  }
}
