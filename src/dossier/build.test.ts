/**
 * Dossier build tests
 */

import { describe, it, expect } from 'vitest';
import { ConfigError, renderControlLayer } from '../config/index.js';
import { buildDossier, selectConversationIds, selectConversations, type BuildRequest } from './build.js';
import { APPENDIX_HEADER, countOccurrences } from './cleaning/appendix.js';
import { EmptyResultError, InputError } from './errors.js';
import type { ConversationRecord } from './types.js';

const now = new Date(Date.UTC(2024, 0, 10));

const records: ConversationRecord[] = [
  {
    id: 'r2',
    title: 'Lisbon budget',
    createTime: 2000,
    messages: [
      { role: 'user', text: 'What will it cost?', timestamp: 2001 },
      {
        role: 'assistant',
        text: 'About 900 euros.\n=== Appendix - Research Log / Tool Artifacts ===\nold stuff',
        timestamp: 2002,
      },
    ],
  },
  {
    id: 'r1',
    title: 'Lisbon trip',
    createTime: 1000,
    messages: [
      { role: 'user', text: 'Plan the Lisbon trip', timestamp: 1001 },
      {
        role: 'assistant',
        text:
          'Stay in Alfama, see https://example.com/research/lisbon for details.\n' +
          '[Image: tram at dusk near the castle]\n' +
          '[GPT Model: example-model-v1 large]',
        timestamp: 1002,
      },
    ],
  },
  { id: 'p1', title: 'Porto notes', createTime: 500, messages: [] },
];

function request(overrides: Partial<BuildRequest> = {}): BuildRequest {
  return {
    topics: ['Lisbon'],
    sourceLabel: 'conversations.jsonl',
    ids: ['r1', 'r2'],
    context: { timeZone: 'UTC', now },
    ...overrides,
  };
}

describe('selectConversationIds', () => {
  it('should pick matching titles oldest first', () => {
    expect(selectConversationIds(records, ['lisbon'])).toEqual(['r1', 'r2']);
  });

  it('should pick nothing without topics', () => {
    expect(selectConversationIds(records, [])).toEqual([]);
  });
});

describe('selectConversations', () => {
  it('should keep request order and drop repeated ids', () => {
    const selected = selectConversations(records, ['p1', ' r1 ', 'p1']);

    expect(selected.map((r) => r.id)).toEqual(['p1', 'r1']);
  });

  it('should reject duplicate ids in the input', () => {
    expect(() => selectConversations([...records, records[2]], ['p1'])).toThrow(
      'Duplicate conversation ids in input: p1'
    );
  });

  it('should reject an empty selection', () => {
    expect(() => selectConversations(records, ['  '])).toThrow(InputError);
  });

  it('should name unknown ids', () => {
    expect(() => selectConversations(records, ['r1', 'x9', 'y8'])).toThrow(
      'Conversation ids not found in input: x9, y8'
    );
  });
});

describe('buildDossier', () => {
  it('should render raw and markdown without a working document', () => {
    const build = buildDossier(records, request());

    expect(build.raw.startsWith('DOSSIER: Lisbon\nGenerated: 2024-01-10T00:00:00+00:00\n')).toBe(true);
    expect(build.markdown.startsWith('# Dossier: Lisbon\n\n')).toBe(true);
    expect(build.working).toBeUndefined();
    expect(build.context).toEqual({ timeZone: 'UTC', now });
    expect(build.warnings).toEqual([]);
  });

  it('should reject invalid options', () => {
    expect(() => buildDossier(records, request({ options: { context: 500 } }))).toThrow(ConfigError);
  });

  it('should build a working document with one appendix', () => {
    const { working, warnings } = buildDossier(records, request({ options: { split: true } }));

    expect(working).toBeDefined();
    if (!working) return;
    expect(working.text.startsWith('## WORKING INDEX\n\n')).toBe(true);
    expect(working.artifacts).toEqual([
      { label: 'Image Reference', snippet: '[Image: tram at dusk near the castle]' },
      { label: 'Model Info', snippet: '[GPT Model: example-model-v1 large]' },
    ]);
    expect(working.artifactsFound).toBe(true);
    expect(countOccurrences(working.text, APPENDIX_HEADER)).toBe(1);
    expect(working.body).not.toContain('old stuff');
    expect(working.body).toContain('**Candidates for Next Column**:');
    expect(warnings).toEqual([]);
  });

  it('should require a topic in excerpts mode', () => {
    const cases: string[][] = [[], ['  ']];
    for (const topics of cases) {
      expect(() =>
        buildDossier(records, request({ topics, options: { mode: 'excerpts', split: true } }))
      ).toThrow('Provide at least one topic when using excerpts mode');
    }
  });

  it('should build full dossiers without topics', () => {
    expect(buildDossier(records, request({ topics: [] })).raw.startsWith('DOSSIER: Dossier\n')).toBe(true);
  });

  it('should fail when deliverable extraction leaves nothing', () => {
    expect(() =>
      buildDossier(records, request({ options: { split: true, patterns: ['zzz-none'] } }))
    ).toThrow(EmptyResultError);
  });

  it('should add the control layer and coverage audit with a column config', () => {
    const config = {
      column_name: 'Lisbon desk',
      thread_filters: { include: { lisbon_trip: ['lisbon'] } },
    };
    const { working } = buildDossier(records, request({ options: { split: true, config } }));

    expect(working?.body.startsWith(renderControlLayer(config))).toBe(true);
    expect(working?.body).toContain('COMPLETENESS CHECK');
    expect(working?.text).toContain('COVERAGE AUDIT');
    expect(working?.text).toContain('[LISBON] Lisbon trip\n  ID: r1');
  });
});
