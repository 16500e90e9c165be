/**
 * Search Module
 *
 * Tavily news search and digest formatting
 */

export { TavilySearchClient } from './tavily-client.js';
export {
  formatResearchDigest,
  formatNewsDigest,
  RESEARCH_REQUEST,
  FALLBACK_REQUEST,
} from './digest.js';
export { findMarketCharts, type MarketChart } from './charts.js';
