/**
 * Appendix helper tests
 */

import { describe, it, expect } from 'vitest';
import {
  APPENDIX_HEADER,
  countOccurrences,
  dedupeAppendixHeader,
  isAppendixHeaderLine,
  removeAppendixHeaderLines,
  renderAppendix,
  stripExistingAppendix,
} from './appendix.js';

const RULE = '='.repeat(70);

describe('isAppendixHeaderLine', () => {
  it('should ignore punctuation, case and spacing', () => {
    expect(isAppendixHeaderLine(APPENDIX_HEADER)).toBe(true);
    expect(isAppendixHeaderLine('== Appendix: Research-Log & Tool Artifacts ==')).toBe(true);
  });

  it('should need both parts of the header', () => {
    expect(isAppendixHeaderLine('Appendix A')).toBe(false);
    expect(isAppendixHeaderLine('Research log and tool artifacts')).toBe(false);
  });
});

describe('stripExistingAppendix', () => {
  it('should cut at the first header line', () => {
    const text = `Body\n\n${RULE}\n${APPENDIX_HEADER}\n${RULE}\n[Image x]`;

    expect(stripExistingAppendix(text)).toBe(`Body\n\n${RULE}`);
  });

  it('should be idempotent', () => {
    const once = stripExistingAppendix(`a\n${APPENDIX_HEADER}\nb`);

    expect(once).toBe('a');
    expect(stripExistingAppendix(once)).toBe(once);
  });
});

describe('removeAppendixHeaderLines', () => {
  it('should drop header lines only', () => {
    expect(removeAppendixHeaderLines('a\n** APPENDIX: research log / tool artifacts **\nb')).toBe('a\nb');
  });
});

describe('dedupeAppendixHeader', () => {
  it('should keep the first header and the surrounding text', () => {
    const h = APPENDIX_HEADER;

    expect(dedupeAppendixHeader(`x ${h} y ${h} z ${h} w`)).toBe(`x ${h} y  z  w`);
  });

  it('should leave a single header alone', () => {
    expect(dedupeAppendixHeader(`x ${APPENDIX_HEADER} y`)).toBe(`x ${APPENDIX_HEADER} y`);
  });
});

describe('countOccurrences', () => {
  it('should count literal markers', () => {
    expect(countOccurrences('a.b.c', '.')).toBe(2);
    expect(countOccurrences('abc', '')).toBe(0);
  });
});

describe('renderAppendix', () => {
  it('should render nothing without artifacts', () => {
    expect(renderAppendix([])).toBe('');
  });

  it('should frame the artifacts under one header', () => {
    const text = renderAppendix([
      { label: 'Image Reference', snippet: '[Image: tram at dusk]' },
      { label: 'Model Info', snippet: '[GPT Model: example]' },
    ]);

    expect(text).toBe(
      `\n\n${RULE}\n${APPENDIX_HEADER}\n${RULE}\n\n` +
        'This section contains metadata, tool-call fragments, and provenance\n' +
        'information from the research extraction process.\n\n' +
        '[Image Reference] [Image: tram at dusk]...\n\n' +
        '[Model Info] [GPT Model: example]...'
    );
  });
});
