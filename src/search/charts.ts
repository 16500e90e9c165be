/**
 * Financial chart finder
 */

import type { NewsImage, SearchClient } from '../types/index.js';

const CHART_KEYWORDS = ['chart', 'graph', 'market', 'stock', 'trading', 'financial'];

export interface MarketChart extends NewsImage {
  context: string;
}

export function chartQuery(context: string): string {
  return `financial charts stock market ${context} S&P 500 Nasdaq Dow Jones`;
}

export function isChartImage(image: NewsImage): boolean {
  const description = image.description.toLowerCase();
  return image.url !== '' && CHART_KEYWORDS.some((keyword) => description.includes(keyword));
}

/**
 * Look up market charts related to `context`. Only the first two images
 * returned are considered.
 */
export async function findMarketCharts(
  client: SearchClient,
  context: string
): Promise<MarketChart[]> {
  const response = await client.search({
    query: chartQuery(context),
    maxResults: 3,
    depth: 'basic',
    includeImages: true,
  });

  return response.images
    .slice(0, 2)
    .filter(isChartImage)
    .map((image) => ({ ...image, context: 'Market visualization' }));
}
