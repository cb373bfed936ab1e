/**
 * Cleaning pipeline tests
 */

import { describe, it, expect } from 'vitest';
import { renderSourcesRegistry } from '../sources.js';
import {
  bodyOnly,
  cleanDossierText,
  createCleaningStages,
  runCleaningStages,
  type CleaningProgress,
} from './pipeline.js';

const RULE = '='.repeat(70);
const registry = renderSourcesRegistry([{ url: 'https://a.org/research', label: 'a.org/research' }]);
const reorganized =
  `${RULE}\nSOURCES REGISTRY\n${RULE}\n\n` +
  '**Candidates for Next Column**:\n\n' +
  '[1] a.org/research\n    https://a.org/research\n\n\n';

const raw =
  '<hr> Intro [1] text\n' +
  'Successfully created file x\n' +
  'Second line\n' +
  '[Image: tram at dusk near the castle]\n' +
  registry;

describe('bodyOnly', () => {
  it('should leave the registry untouched', () => {
    const upper = bodyOnly((text) => text.toUpperCase());

    expect(upper(`body\n${registry}`)).toBe(`BODY\n\n${registry.slice(1)}`);
  });

  it('should keep only the registry when the body empties', () => {
    expect(bodyOnly(() => '')(`body\n${registry}`)).toBe(registry.slice(1));
  });

  it('should transform text without a registry directly', () => {
    expect(bodyOnly((text) => text.trim())(' plain ')).toBe('plain');
  });
});

describe('createCleaningStages', () => {
  it('should list stages in order with dedup on', () => {
    const names = createCleaningStages({ dedup: true, minBlockSize: 200 }).map((s) => s.name);

    expect(names).toEqual([
      'strip-tool-noise',
      'strip-citation-markers',
      'sanitize-ui-markup',
      'strip-existing-appendix',
      'remove-appendix-headers',
      'deduplicate-blocks',
      'reorganize-sources',
    ]);
  });

  it('should add deliverable extraction only with patterns', () => {
    const names = createCleaningStages({ dedup: false, minBlockSize: 200, patterns: ['x'] }).map(
      (s) => s.name
    );

    expect(names.slice(-2)).toEqual(['extract-deliverables', 'reorganize-sources']);
    expect(names).not.toContain('deduplicate-blocks');
  });
});

describe('runCleaningStages', () => {
  it('should report progress for every stage', () => {
    const seen: CleaningProgress[] = [];
    const out = runCleaningStages(
      'ab',
      [
        { name: 'strip-tool-noise', apply: (t) => `${t}c` },
        { name: 'strip-citation-markers', apply: (t) => t.slice(1) },
      ],
      (p) => seen.push(p)
    );

    expect(out).toBe('bc');
    expect(seen).toEqual([
      { stage: 'strip-tool-noise', current: 1, total: 3, before: 2, after: 3 },
      { stage: 'strip-citation-markers', current: 2, total: 3, before: 3, after: 2 },
    ]);
  });
});

describe('cleanDossierText', () => {
  const settings = { dedup: true, minBlockSize: 200 };

  it('should clean the body, reorganize sources and quarantine artifacts', () => {
    const result = cleanDossierText(raw, settings);

    expect(result.text).toBe(`Intro text\nSecond line\n\n${reorganized}`);
    expect(result.artifacts).toEqual([
      { label: 'Image Reference', snippet: '[Image: tram at dusk near the castle]' },
    ]);
  });

  it('should report the quarantine step last', () => {
    const stages: string[] = [];
    cleanDossierText(raw, settings, (p) => stages.push(`${p.stage} ${p.current}/${p.total}`));

    expect(stages).toHaveLength(8);
    expect(stages[7]).toBe('quarantine-artifacts 8/8');
  });

  it('should be idempotent', () => {
    const once = cleanDossierText(raw, settings).text;

    expect(cleanDossierText(once, settings)).toEqual({ text: once, artifacts: [] });
  });
});
