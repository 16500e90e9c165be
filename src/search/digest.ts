/**
 * Turns search responses into the text digests handed to the summarizer
 */

import type { NewsDigest, SearchRequest, SearchResponse } from '../types/index.js';

export const MAX_DIGEST_ARTICLES = 3;
export const MAX_DIGEST_IMAGES = 2;

export const RESEARCH_QUERY =
  "today's US financial market news: S&P 500, Nasdaq, Dow Jones, key developments and major movers";

export const FALLBACK_QUERY =
  'today US stock market summary, S&P 500, Nasdaq, Dow Jones, major movers';

export const RESEARCH_REQUEST: SearchRequest = {
  query: RESEARCH_QUERY,
  maxResults: 5,
  depth: 'advanced',
  includeImages: true,
  includeAnswer: true,
};

export const FALLBACK_REQUEST: SearchRequest = {
  query: FALLBACK_QUERY,
  maxResults: 3,
  depth: 'advanced',
};

export const NO_NEWS_MESSAGE = 'No fresh market news found.';

/**
 * Research digest for the primary pipeline: the search service's own answer
 * (when it gave one), top articles and images as JSON
 */
export function formatResearchDigest(response: SearchResponse): NewsDigest {
  const digest = {
    ...(response.answer ? { answer: response.answer } : {}),
    news_articles: response.articles.slice(0, MAX_DIGEST_ARTICLES).map((a) => ({
      title: a.title,
      content: a.content,
      url: a.url,
      published_date: a.publishedDate,
    })),
    images: response.images.slice(0, MAX_DIGEST_IMAGES).map((img) => ({
      url: img.url,
      description: img.description,
    })),
  };
  return JSON.stringify(digest, null, 2);
}

/**
 * Compact `- title: url` digest used by the fallback path
 */
export function formatNewsDigest(response: SearchResponse): NewsDigest {
  const articles = response.articles.slice(0, MAX_DIGEST_ARTICLES);
  if (articles.length === 0) {
    return NO_NEWS_MESSAGE;
  }
  return articles.map((a) => `- ${a.title}: ${a.url}`).join('\n');
}
