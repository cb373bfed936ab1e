/**
 * Cleaning pipeline
 * Ordered text transforms that turn the raw dossier into the working body
 */

import { reorganizeSourcesSection, splitRegistry } from '../sources.js';
import type { Artifact } from '../types.js';
import { removeAppendixHeaderLines, stripExistingAppendix } from './appendix.js';
import { quarantineArtifacts } from './artifacts.js';
import { deduplicateBlocks } from './dedup.js';
import { extractDeliverables } from './deliverables.js';
import { sanitizeUiMarkup, stripCitationMarkers, stripToolNoise } from './noise.js';

export type TextTransform = (text: string) => string;

export type CleaningStageName =
  | 'strip-tool-noise'
  | 'strip-citation-markers'
  | 'sanitize-ui-markup'
  | 'strip-existing-appendix'
  | 'remove-appendix-headers'
  | 'deduplicate-blocks'
  | 'extract-deliverables'
  | 'reorganize-sources';

export interface CleaningStage {
  readonly name: CleaningStageName;
  readonly apply: TextTransform;
}

/**
 * Which optional stages run and how
 */
export interface CleaningSettings {
  dedup: boolean;
  minBlockSize: number;
  /** Deliverable extraction runs only when patterns are given */
  patterns?: readonly string[];
  usedLinks?: ReadonlySet<string>;
}

/**
 * Stage progress, reported after each stage
 */
export interface CleaningProgress {
  stage: CleaningStageName | 'quarantine-artifacts';
  current: number;
  total: number;
  /** Text length before and after the stage */
  before: number;
  after: number;
}

export interface CleaningResult {
  text: string;
  artifacts: Artifact[];
}

/**
 * Apply a transform to the body only, leaving the trailing sources
 * registry untouched
 */
export function bodyOnly(transform: TextTransform): TextTransform {
  return (text) => {
    const { body, registry } = splitRegistry(text);
    if (!registry) return transform(body);
    const cleaned = transform(body);
    return cleaned ? `${cleaned.trimEnd()}\n\n${registry}` : registry;
  };
}

/**
 * Build the ordered stage list for the given settings
 */
export function createCleaningStages(settings: CleaningSettings): CleaningStage[] {
  const stages: CleaningStage[] = [
    { name: 'strip-tool-noise', apply: bodyOnly(stripToolNoise) },
    { name: 'strip-citation-markers', apply: bodyOnly(stripCitationMarkers) },
    { name: 'sanitize-ui-markup', apply: bodyOnly(sanitizeUiMarkup) },
    { name: 'strip-existing-appendix', apply: bodyOnly(stripExistingAppendix) },
    { name: 'remove-appendix-headers', apply: bodyOnly(removeAppendixHeaderLines) },
  ];

  if (settings.dedup) {
    const { minBlockSize } = settings;
    stages.push({
      name: 'deduplicate-blocks',
      apply: bodyOnly((text) => deduplicateBlocks(text, minBlockSize)),
    });
  }

  const { patterns, usedLinks } = settings;
  if (patterns) {
    stages.push({
      name: 'extract-deliverables',
      apply: bodyOnly((text) => extractDeliverables(text, patterns)),
    });
  }

  stages.push({
    name: 'reorganize-sources',
    apply: (text) => reorganizeSourcesSection(text, usedLinks),
  });

  return stages;
}

/**
 * Run stages in order
 */
export function runCleaningStages(
  text: string,
  stages: readonly CleaningStage[],
  onProgress?: (progress: CleaningProgress) => void
): string {
  return stages.reduce((current, stage, index) => {
    const next = stage.apply(current);
    onProgress?.({
      stage: stage.name,
      current: index + 1,
      total: stages.length + 1,
      before: current.length,
      after: next.length,
    });
    return next;
  }, text);
}

/**
 * Run the full cleaning pipeline, then quarantine artifacts out of the body
 */
export function cleanDossierText(
  raw: string,
  settings: CleaningSettings,
  onProgress?: (progress: CleaningProgress) => void
): CleaningResult {
  const stages = createCleaningStages(settings);
  const cleaned = runCleaningStages(raw, stages, onProgress);

  const { body, registry } = splitRegistry(cleaned);
  const quarantined = quarantineArtifacts(body);
  const text = registry
    ? `${quarantined.text.trimEnd()}${quarantined.text.trim() ? '\n\n' : ''}${registry}`
    : quarantined.text;

  onProgress?.({
    stage: 'quarantine-artifacts',
    current: stages.length + 1,
    total: stages.length + 1,
    before: cleaned.length,
    after: text.length,
  });

  return { text, artifacts: quarantined.artifacts };
}
