/**
 * Proposal agent unit tests
 *
 * Each agent runs against in-process search and generator fakes.
 */

import { describe, it, expect } from 'vitest';
import type { EntityProfile, UseCase } from '@usecase-studio/shared-types';
import { GenerationError, SearchError } from '../../errors.js';
import { FakeSearchClient, FakeTextGenerator, result } from '../__tests__/fakes.js';
import { PARSE_FAILURE_MARKER } from '../research-gate.js';
import { ResearchAgent, researchQueries } from './research-agent.js';
import { PROMPT_TEXT_LIMIT, truncateForPrompt } from './shared.js';
import { ResourceAgent } from './resource-agent.js';
import { FALLBACK_SUGGESTION, SuggestionAgent } from './suggestion-agent.js';
import { buildSupplementaryTrendContext, trendQueries, UseCaseAgent } from './use-case-agent.js';

const financeProfile: EntityProfile = {
  inputName: 'Acme Bank',
  industry: 'Finance',
  segment: 'Retail Banking',
  offerings: ['Loans', 'Cards'],
  strategicFocus: ['Digital channels'],
  searchResults: [],
};

function useCase(title: string): UseCase {
  return {
    title,
    description: 'd',
    aiApplication: 'a',
    potentialBenefit: 'b',
    relevance: 'r',
  };
}

describe('truncateForPrompt', () => {
  it('leaves text within the limit untouched', () => {
    const text = 'a'.repeat(PROMPT_TEXT_LIMIT);

    expect(truncateForPrompt(text)).toBe(text);
  });

  it('counts code points so a surrogate pair is never split', () => {
    const text = `${'a'.repeat(PROMPT_TEXT_LIMIT - 1)}\u{1F600}b`;

    expect(truncateForPrompt(text)).toBe(`${'a'.repeat(PROMPT_TEXT_LIMIT - 1)}\u{1F600}`);
  });

  it('keeps the limit in code points for astral-only text', () => {
    const text = '\u{1F600}'.repeat(PROMPT_TEXT_LIMIT + 1);

    expect(truncateForPrompt(text)).toBe('\u{1F600}'.repeat(PROMPT_TEXT_LIMIT));
  });
});

// ---------------------------------------------------------------------------
// ResearchAgent
// ---------------------------------------------------------------------------

describe('ResearchAgent', () => {
  const profileJson = JSON.stringify({
    industry: 'Finance',
    segment: 'Retail Banking',
    offerings: ['Loans', 'Cards', 3],
    strategic_focus: ['Digital channels'],
  });

  it('runs four queries and merges the extracted fields', async () => {
    const search = new FakeSearchClient(() => [
      result('Acme Bank', 'https://acme.example/about', 'Retail banking'),
    ]);
    const generator = new FakeTextGenerator([profileJson]);
    const agent = new ResearchAgent({ searchClient: search, textGenerator: generator });

    const profile = await agent.run('Acme Bank');

    expect(search.calls).toEqual(
      researchQueries('Acme Bank').map(query => ({ query, maxResults: 5 })),
    );
    expect(profile).toEqual({
      inputName: 'Acme Bank',
      industry: 'Finance',
      segment: 'Retail Banking',
      offerings: ['Loans', 'Cards'],
      strategicFocus: ['Digital channels'],
      searchResults: Array.from({ length: 4 }, () =>
        result('Acme Bank', 'https://acme.example/about', 'Retail banking'),
      ),
    });
    expect(generator.prompts[0]).toContain(
      'Title: Acme Bank\nSnippet: Retail banking\nURL: https://acme.example/about\n\n',
    );
  });

  it('returns null without calling the model when every search is empty', async () => {
    const generator = new FakeTextGenerator([profileJson]);
    const agent = new ResearchAgent({
      searchClient: new FakeSearchClient(),
      textGenerator: generator,
    });

    expect(await agent.run('Nobody Inc')).toBeNull();
    expect(generator.prompts).toHaveLength(0);
  });

  it('treats failed searches as empty results', async () => {
    const search = new FakeSearchClient((query, index) => {
      if (index === 0) {
        throw new SearchError('quota exceeded', { query, statusCode: 429 });
      }
      return [result('Profile', `https://acme.example/${index}`)];
    });
    const agent = new ResearchAgent({
      searchClient: search,
      textGenerator: new FakeTextGenerator([profileJson]),
    });

    const profile = await agent.run('Acme Bank');

    expect(search.calls).toHaveLength(4);
    expect(profile?.searchResults.map(item => item.link)).toEqual([
      'https://acme.example/1',
      'https://acme.example/2',
      'https://acme.example/3',
    ]);
    expect(profile?.industry).toBe('Finance');
  });

  it('writes the parse-failure marker into every field on unparseable output', async () => {
    const agent = new ResearchAgent({
      searchClient: new FakeSearchClient(() => [result('t', 'https://x.example')]),
      textGenerator: new FakeTextGenerator(['I could not find anything useful.']),
    });

    const profile = await agent.run('Acme Bank');

    expect(profile).toMatchObject({
      industry: PARSE_FAILURE_MARKER,
      segment: PARSE_FAILURE_MARKER,
      offerings: [PARSE_FAILURE_MARKER],
      strategicFocus: [PARSE_FAILURE_MARKER],
    });
  });

  it('writes the generation error message into every field', async () => {
    const agent = new ResearchAgent({
      searchClient: new FakeSearchClient(() => [result('t', 'https://x.example')]),
      textGenerator: new FakeTextGenerator([new GenerationError('timeout', { provider: 'google' })]),
    });

    const profile = await agent.run('Acme Bank');

    expect(profile).toMatchObject({
      industry: 'Error: timeout',
      segment: 'Error: timeout',
      offerings: ['Error: timeout'],
      strategicFocus: ['Error: timeout'],
    });
  });

  it('parses fenced output and defaults the missing fields', () => {
    const agent = new ResearchAgent({
      searchClient: new FakeSearchClient(),
      textGenerator: new FakeTextGenerator(),
    });

    expect(agent.parseOutput('```json\n{"segment":"Retail","industry":null}\n```')).toEqual({
      industry: 'N/A',
      segment: 'Retail',
      offerings: [],
      strategicFocus: [],
    });
  });

  it('treats an array answer as a parse failure', () => {
    const agent = new ResearchAgent({
      searchClient: new FakeSearchClient(),
      textGenerator: new FakeTextGenerator(),
    });

    expect(agent.parseOutput('[{"industry":"Finance"}]').industry).toBe(PARSE_FAILURE_MARKER);
  });

  it('truncates the search text in the prompt', () => {
    const agent = new ResearchAgent({
      searchClient: new FakeSearchClient(),
      textGenerator: new FakeTextGenerator(),
    });

    const prompt = agent.buildPrompt('Acme Bank', 'a'.repeat(8000));

    expect(prompt).toContain('a'.repeat(7000));
    expect(prompt).not.toContain('a'.repeat(7001));
  });
});

// ---------------------------------------------------------------------------
// UseCaseAgent
// ---------------------------------------------------------------------------

describe('UseCaseAgent', () => {
  const gatedProfiles: Array<[string, EntityProfile | null]> = [
    ['a missing profile', null],
    ['an unavailable industry', { ...financeProfile, industry: 'N/A' }],
    ['a generation error marker', { ...financeProfile, industry: 'Error: timeout' }],
  ];

  it.each(gatedProfiles)('skips %s without external calls', async (_label, profile) => {
    const search = new FakeSearchClient();
    const generator = new FakeTextGenerator(['[]']);
    const agent = new UseCaseAgent({ searchClient: search, textGenerator: generator });

    expect(await agent.run(profile)).toEqual([]);
    expect(search.calls).toHaveLength(0);
    expect(generator.prompts).toHaveLength(0);
  });

  it('searches trends and always appends the supplementary context', async () => {
    const search = new FakeSearchClient();
    const generator = new FakeTextGenerator(['[]']);
    const agent = new UseCaseAgent({ searchClient: search, textGenerator: generator });

    await agent.run(financeProfile);

    expect(search.calls).toEqual(
      trendQueries('Finance', 'Retail Banking').map(query => ({ query, maxResults: 3 })),
    );
    expect(search.queries()[1]).toBe('Generative AI applications Retail Banking');
    expect(generator.prompts[0]).toContain(buildSupplementaryTrendContext('Finance'));
    expect(generator.prompts[0]).toContain('offering products/services like "Loans, Cards"');
  });

  it('maps wire records, defaults missing fields and drops non-objects', async () => {
    const raw = [
      '```json',
      JSON.stringify([
        {
          title: 'Fraud Detection',
          description: 'Spot fraudulent card activity',
          ai_application: 'Anomaly detection',
          potential_benefit: 'Lower losses',
          relevance: 'Cards are a key offering',
        },
        { title: 'Loan Assistant' },
        42,
      ]),
      '```',
    ].join('\n');
    const agent = new UseCaseAgent({
      searchClient: new FakeSearchClient(),
      textGenerator: new FakeTextGenerator([raw]),
    });

    expect(await agent.run(financeProfile)).toEqual([
      {
        title: 'Fraud Detection',
        description: 'Spot fraudulent card activity',
        aiApplication: 'Anomaly detection',
        potentialBenefit: 'Lower losses',
        relevance: 'Cards are a key offering',
      },
      {
        title: 'Loan Assistant',
        description: 'N/A',
        aiApplication: 'N/A',
        potentialBenefit: 'N/A',
        relevance: 'N/A',
      },
    ]);
  });

  it('defaults an untitled record', () => {
    const agent = new UseCaseAgent({
      searchClient: new FakeSearchClient(),
      textGenerator: new FakeTextGenerator(),
    });

    expect(agent.parseOutput('[{"description":"x"}]')[0]?.title).toBe('Untitled Use Case');
  });

  it('returns an empty list on generation failure or a non-array answer', async () => {
    const failing = new UseCaseAgent({
      searchClient: new FakeSearchClient(),
      textGenerator: new FakeTextGenerator([new GenerationError('quota', { provider: 'google' })]),
    });
    const objectAnswer = new UseCaseAgent({
      searchClient: new FakeSearchClient(),
      textGenerator: new FakeTextGenerator(['{"use_cases": []}']),
    });

    expect(await failing.run(financeProfile)).toEqual([]);
    expect(await objectAnswer.run(financeProfile)).toEqual([]);
  });
});

// ---------------------------------------------------------------------------
// ResourceAgent
// ---------------------------------------------------------------------------

describe('ResourceAgent', () => {
  it('returns an empty map for no use cases', async () => {
    const search = new FakeSearchClient();
    const agent = new ResourceAgent({ searchClient: search });

    expect(await agent.run([])).toEqual({});
    expect(search.calls).toHaveLength(0);
  });

  it('runs two queries per use case and keeps the first occurrence of each link', async () => {
    const search = new FakeSearchClient(query =>
      query.includes('dataset')
        ? [
            result('Dataset A', 'https://kaggle.example/a', 's1'),
            { title: '', link: 'https://github.example/b', snippet: '' },
          ]
        : [
            result('Repo B again', 'https://github.example/b', 'dup'),
            { title: 'No link', link: '', snippet: 'x' },
          ],
    );
    const agent = new ResourceAgent({ searchClient: search });

    const links = await agent.run([useCase('Fraud Detection')]);

    expect(search.calls).toEqual([
      {
        query:
          'Fraud Detection dataset site:kaggle.com OR site:huggingface.co/datasets OR site:github.com',
        maxResults: 2,
      },
      { query: 'Fraud Detection github code OR example site:github.com', maxResults: 2 },
    ]);
    expect(links).toEqual({
      'Fraud Detection': [
        { title: 'Dataset A', link: 'https://kaggle.example/a', snippet: 's1' },
        { title: 'No Title', link: 'https://github.example/b', snippet: 'N/A' },
      ],
    });
  });

  it('lets a repeated title replace the earlier list', async () => {
    const search = new FakeSearchClient((_query, index) => [
      result(`Result ${index}`, `https://r.example/${index}`),
    ]);
    const agent = new ResourceAgent({ searchClient: search });

    const links = await agent.run([useCase('Chatbot'), useCase('Chatbot')]);

    expect(Object.keys(links)).toEqual(['Chatbot']);
    expect(links['Chatbot']?.map(link => link.link)).toEqual([
      'https://r.example/2',
      'https://r.example/3',
    ]);
  });

  it('keeps an empty list when searches fail', async () => {
    const agent = new ResourceAgent({
      searchClient: new FakeSearchClient(query => {
        throw new SearchError('offline', { query });
      }),
    });

    expect(await agent.run([useCase('Forecasting')])).toEqual({ Forecasting: [] });
  });
});

// ---------------------------------------------------------------------------
// SuggestionAgent
// ---------------------------------------------------------------------------

describe('SuggestionAgent', () => {
  it('skips a failed profile without the fallback', async () => {
    const generator = new FakeTextGenerator(['[]']);
    const agent = new SuggestionAgent({ textGenerator: generator });

    expect(await agent.run(null)).toEqual({ kind: 'skipped', reason: 'no_results' });
    expect(await agent.run({ ...financeProfile, industry: PARSE_FAILURE_MARKER })).toEqual({
      kind: 'skipped',
      reason: 'extraction_error',
    });
    expect(generator.prompts).toHaveLength(0);
  });

  it('returns the parsed suggestions', async () => {
    const raw = JSON.stringify([
      {
        title: 'Knowledge Base Chatbot',
        application: 'Answer staff questions from policy documents',
        potential_benefit: 'Faster onboarding',
        fit_area: 'Operations',
      },
    ]);
    const agent = new SuggestionAgent({ textGenerator: new FakeTextGenerator([raw]) });

    expect(await agent.run(financeProfile)).toEqual({
      kind: 'generated',
      usedFallback: false,
      suggestions: [
        {
          title: 'Knowledge Base Chatbot',
          application: 'Answer staff questions from policy documents',
          potentialBenefit: 'Faster onboarding',
          fitArea: 'Operations',
        },
      ],
    });
  });

  const emptyReplies: Array<[string, string | Error]> = [
    ['an empty array', '[]'],
    ['unparseable text', 'Sorry, no ideas.'],
    ['a generation failure', new GenerationError('quota', { provider: 'google' })],
  ];

  it.each(emptyReplies)('substitutes the fallback for %s', async (_label, reply) => {
    const agent = new SuggestionAgent({ textGenerator: new FakeTextGenerator([reply]) });

    expect(await agent.run(financeProfile)).toEqual({
      kind: 'generated',
      usedFallback: true,
      suggestions: [FALLBACK_SUGGESTION],
    });
  });

  it('lists the four solution categories in the prompt', async () => {
    const generator = new FakeTextGenerator(['[]']);
    await new SuggestionAgent({ textGenerator: generator }).run(financeProfile);

    const prompt = generator.prompts[0] ?? '';
    expect(prompt).toContain('knowledge base chatbots');
    expect(prompt).toContain('Automated report generation or summarization');
    expect(prompt).toContain('customer support chatbots or virtual assistants');
    expect(prompt).toContain('Automated content creation');
  });
});
