#!/usr/bin/env node
/**
 * Market Wrap Bot
 *
 * One run per invocation:
 * 1. Searches today's US market news (Tavily)
 * 2. Summarizes it in under 300 words (Groq)
 * 3. Formats it as Markdown
 * 4. Sends it to a Telegram channel
 *
 * If any of these fails, a simpler fallback path searches, summarizes and
 * sends a plain-text "Fallback" wrap instead.
 *
 * Usage:
 *   node dist/index.js
 *
 * Exit code is 0 when a message was delivered, 1 otherwise.
 */

import { main } from './cli.js';

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('Application failed', error);
    process.exitCode = 1;
  });
