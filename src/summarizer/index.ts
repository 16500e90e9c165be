/**
 * Summarizer Module
 *
 * Groq-powered market wrap generation
 */

export { requestMarketWrap, generateMarketWrap, clampWords } from './summarizer.js';
export { GroqCompletionClient } from './groq-client.js';
