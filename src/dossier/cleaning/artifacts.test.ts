/**
 * Artifact quarantine tests
 */

import { describe, it, expect } from 'vitest';
import { quarantineArtifacts } from './artifacts.js';

describe('quarantineArtifacts', () => {
  it('should move artifacts out and drop tool calls silently', () => {
    const text = [
      'Keep this line',
      '[Search Query] lisbon tram routes and fares',
      '{"q": "x"}',
      '[Image: tram at dusk, 1024x768]',
      '[Image]',
      '[JSON/Tool Call] {"open": 1}',
      'APPENDIX: RESEARCH LOG & TOOL ARTIFACTS',
      '[GPT Model: example-model-v1 large]',
      '[Citation Widget: APPENDIX: RESEARCH LOG notes]',
    ].join('\n');

    const result = quarantineArtifacts(text);

    expect(result.text).toBe('Keep this line\n[Image]');
    expect(result.artifacts).toEqual([
      { label: 'Search Fragment', snippet: '[Search Query] lisbon tram routes and fares' },
      { label: 'Image Reference', snippet: '[Image: tram at dusk, 1024x768]' },
      { label: 'Model Info', snippet: '[GPT Model: example-model-v1 large]' },
    ]);
  });

  it('should cut snippets to 200 characters', () => {
    const { artifacts } = quarantineArtifacts(`[Search Query] ${'x'.repeat(300)}`);

    expect(artifacts).toHaveLength(1);
    expect(artifacts[0].snippet).toHaveLength(200);
  });

  it('should be idempotent', () => {
    const once = quarantineArtifacts('a\n[Image: a long image description]\nb').text;

    expect(once).toBe('a\nb');
    expect(quarantineArtifacts(once)).toEqual({ text: once, artifacts: [] });
  });
});
