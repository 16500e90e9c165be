/**
 * Telegram message composition
 */

import { formatTimestamp } from '../utils/date.js';
import type { MarketChart } from '../search/charts.js';
import type { DeliveryMessage, MarketSummary } from '../types/index.js';

/** Characters that open or close an entity in legacy Markdown */
const MARKDOWN_ENTITY_CHARS = /[[\]_*`]/g;

export interface FormatOptions {
  now: Date;
  timeZone: string;
  charts?: MarketChart[];
}

/**
 * Primary-path message, sent with Telegram's legacy Markdown parse mode
 */
export function formatMarketWrap(summary: MarketSummary, options: FormatOptions): DeliveryMessage {
  const { now, timeZone, charts = [] } = options;
  const stamp = formatTimestamp(now, timeZone);

  const lines = [`📊 *US Market Wrap, ${stamp.date}*`, '', summary.trim()];

  // A ")" or whitespace would end the link target early
  const linkable = charts.filter((chart) => !/[)\s]/.test(chart.url));

  if (linkable.length > 0) {
    lines.push('', '📈 *Charts*');
    for (const chart of linkable) {
      const label = chart.description.replace(MARKDOWN_ENTITY_CHARS, '').trim() || chart.context;
      lines.push(`• [${label}](${chart.url})`);
    }
  }

  lines.push('', `🕐 Generated: ${stamp.dateTime} ${stamp.zone}`);
  return lines.join('\n');
}

/**
 * Fallback-labelled message, sent as plain text
 */
export function composeFallbackMessage(
  summary: string,
  now: Date,
  timeZone: string
): DeliveryMessage {
  const stamp = formatTimestamp(now, timeZone);
  return `📊 **US Market Wrap - Fallback (${stamp.date})** 📊

${summary}

🕐 Generated: ${stamp.dateTime} ${stamp.zone}
`;
}
