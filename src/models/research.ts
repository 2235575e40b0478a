import type { SearchResult } from '../integrations/web-search.js';

/**
 * Destination research gathered before planning, stored under
 * `{correlationId}:research`
 */
export interface ResearchResult {
  destination: string;
  dateRange: { startDate: string; endDate: string };
  interests: string[];
  weatherSummary: string;
  accommodationSuggestions: string;
  topAttractions: string;
  estimatedDailyCost?: number;
  currency: string;
  travelTips: string;
  bestTimeToVisit: string;
  webResults: SearchResult[];
  sourceTools: string[];
}
