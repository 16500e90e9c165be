import { describe, it, expect } from 'vitest';
import {
  createPrimaryStages,
  runPrimaryPipeline,
  PRIMARY_STAGE_ORDER,
  type PrimaryStages,
} from '../pipeline.js';
import { RESEARCH_REQUEST } from '../search/index.js';
import { StageError } from '../utils/errors.js';
import { silentLogger } from '../utils/logger.js';
import { FakeSearchClient, makeDeps, searchResponse } from './fakes.js';

function recordingStages(journal: string[], failAt?: string): PrimaryStages {
  const stage = <I>(name: (typeof PRIMARY_STAGE_ORDER)[number]) => ({
    name,
    run: async (input: I) => {
      journal.push(`${name}(${String(input)})`);
      if (name === failAt) throw new Error(`${name} exploded`);
      return `${name}-out`;
    },
  });
  return {
    research: stage<void>('research'),
    summarize: stage<string>('summarize'),
    format: stage<string>('format'),
    deliver: stage<string>('deliver'),
  };
}

describe('runPrimaryPipeline', () => {
  it('runs the four stages in order, each fed the previous output', async () => {
    const journal: string[] = [];

    const confirmation = await runPrimaryPipeline(recordingStages(journal), silentLogger);

    expect(confirmation).toBe('deliver-out');
    expect(journal).toEqual([
      'research(undefined)',
      'summarize(research-out)',
      'format(summarize-out)',
      'deliver(format-out)',
    ]);
  });

  it('aborts at the first failing stage and names it', async () => {
    const journal: string[] = [];

    const error = await runPrimaryPipeline(recordingStages(journal, 'summarize'), silentLogger).catch(
      (e: unknown) => e
    );

    expect(error).toBeInstanceOf(StageError);
    expect(error).toMatchObject({
      stage: 'summarize',
      message: 'Stage "summarize" failed: summarize exploded',
    });
    expect(journal).toEqual(['research(undefined)', 'summarize(research-out)']);
  });
});

describe('createPrimaryStages', () => {
  it('delivers the formatted summary exactly once with Markdown', async () => {
    const journal: string[] = [];
    const deps = makeDeps({
      search: [searchResponse(['Markets rally'])],
      completion: ['Stocks rose today.'],
      messaging: ['confirmed'],
      journal,
    });

    const confirmation = await runPrimaryPipeline(createPrimaryStages(deps), silentLogger);

    expect(confirmation).toBe('confirmed');
    expect(journal).toEqual(['search', 'complete', 'send']);
    expect(deps.search.requests).toEqual([RESEARCH_REQUEST]);
    expect(deps.completion.prompts[0]).toContain('"title": "Markets rally"');
    expect(deps.messaging.sent).toEqual([
      {
        text: '📊 *US Market Wrap, 2025-03-14*\n\nStocks rose today.\n\n🕐 Generated: 2025-03-14 21:30:00 UTC',
        options: { parseMode: 'Markdown' },
      },
    ]);
  });

  it('passes at most three of five search results to the summarizer', async () => {
    const deps = makeDeps({
      search: [searchResponse(['One', 'Two', 'Three', 'Four', 'Five'])],
    });

    const digest = await createPrimaryStages(deps).research.run();

    expect(JSON.parse(digest).news_articles).toHaveLength(3);
    expect(digest).toContain('"title": "Three"');
    expect(digest).not.toContain('"title": "Four"');
  });

  it('fails the summarize stage when the model errors permanently', async () => {
    const deps = makeDeps({
      search: [searchResponse(['Markets rally'])],
      completion: [new Error('Invalid API Key')],
    });

    await expect(runPrimaryPipeline(createPrimaryStages(deps), silentLogger)).rejects.toThrow(
      'Stage "summarize" failed: Language model error: Invalid API Key'
    );
    expect(deps.messaging.sent).toEqual([]);
  });

  it('clamps the summary to the word budget', async () => {
    const deps = makeDeps({ completion: ['alpha beta gamma'] });
    deps.report.wordBudget = 2;

    const summary = await createPrimaryStages(deps).summarize.run('digest');

    expect(summary).toBe('alpha beta…');
  });

  it('formats without charts when the chart lookup fails', async () => {
    const deps = makeDeps({ search: [new Error('search down')], includeCharts: true });

    const message = await createPrimaryStages(deps).format.run('Stocks rose.');

    expect(deps.search.requests).toHaveLength(1);
    expect(message).not.toContain('📈 *Charts*');
    expect(message.split('\n')[2]).toBe('Stocks rose.');
  });

  it('adds found charts to the message', async () => {
    const deps = makeDeps({
      search: [
        { articles: [], images: [{ url: 'https://img.example/spx.png', description: 'S&P 500 chart' }] },
      ],
      includeCharts: true,
    });

    const message = await createPrimaryStages(deps).format.run('Stocks rose.');

    expect(message).toContain('• [S&P 500 chart](https://img.example/spx.png)');
  });

  it('looks up charts through the dedicated chart client when one is given', async () => {
    const deps = makeDeps({ includeCharts: true });
    const chartSearch = new FakeSearchClient([
      { articles: [], images: [{ url: 'https://img.example/dow.png', description: 'Dow Jones graph' }] },
    ]);

    const message = await createPrimaryStages({ ...deps, chartSearch }).format.run('Stocks rose.');

    expect(deps.search.requests).toEqual([]);
    expect(chartSearch.requests).toHaveLength(1);
    expect(chartSearch.requests[0]).toMatchObject({ depth: 'basic', maxResults: 3, includeImages: true });
    expect(message).toContain('• [Dow Jones graph](https://img.example/dow.png)');
  });
});
