/**
 * Dossier types
 */

import type { ConversationRecord, Message } from '../conversation/types.js';

export type { ConversationRecord, Message };

/**
 * A conversation record with its branch-marker-free title
 */
export interface ConversationItem extends ConversationRecord {
  readonly baseTitle: string;
}

/**
 * A root conversation and the branches forked from it.
 * Branches are sorted by createTime; the root is the earliest item.
 */
export interface Group {
  readonly key: string;
  readonly root: ConversationItem;
  readonly branches: readonly ConversationItem[];
}

/**
 * A referenced URL and its display label
 */
export interface Source {
  readonly url: string;
  readonly label: string;
}

export type ArtifactLabel =
  | 'Search Fragment'
  | 'JSON/Tool Call'
  | 'Image Reference'
  | 'Model Info'
  | 'Citation Widget';

/**
 * A fragment moved out of the working body into the appendix
 */
export interface Artifact {
  readonly label: ArtifactLabel;
  /** At most 200 characters */
  readonly snippet: string;
}

export type DossierMode = 'full' | 'excerpts';

/**
 * Values every renderer that prints times needs
 */
export interface RenderContext {
  readonly timeZone: string;
  readonly now: Date;
}
