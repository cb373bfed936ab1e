/**
 * Dossier renderers
 * Raw narrative text and the markdown variant
 */

import { capitalize, formatLocalDate, formatLocalTimestamp } from '../utils/index.js';
import { compileTopicPattern, excerptMessages } from './excerpt.js';
import { reconcileBranch } from './reconcile.js';
import { extractSources, renderSourcesRegistry } from './sources.js';
import type {
  ConversationItem,
  DossierMode,
  Group,
  Message,
  RenderContext,
  Source,
} from './types.js';

const RULE = '='.repeat(70);

/**
 * What to render and how to narrow it
 */
export interface RenderSettings {
  topics: readonly string[];
  /** Where the conversations came from, printed in the header */
  sourceLabel: string;
  mode: DossierMode;
  context: number;
}

export interface BranchSection {
  item: ConversationItem;
  messages: Message[];
}

/**
 * A group with the messages that will actually be printed
 */
export interface GroupSection {
  group: Group;
  rootMessages: Message[];
  branches: BranchSection[];
}

/**
 * Reconcile each branch against its root, then narrow to excerpts in
 * excerpt mode
 */
export function prepareSections(
  groups: readonly Group[],
  settings: Pick<RenderSettings, 'topics' | 'mode' | 'context'>
): GroupSection[] {
  const pattern = compileTopicPattern(settings.topics);
  const narrow = (messages: readonly Message[]): Message[] =>
    settings.mode === 'excerpts'
      ? excerptMessages(messages, pattern, settings.context)
      : [...messages];

  return groups.map((group) => ({
    group,
    rootMessages: narrow(group.root.messages),
    branches: group.branches.map((item) => ({
      item,
      messages: narrow(reconcileBranch(group.root.messages, item.messages)),
    })),
  }));
}

function topicLabel(topics: readonly string[]): string {
  return topics.length > 0 ? topics.join(', ') : 'Dossier';
}

/**
 * Table of contents with estimated line offsets.
 * The offsets are rough guides, not exact positions.
 */
export function generateToc(groups: readonly Group[], ctx: RenderContext): string[] {
  const toc = ['## TABLE OF CONTENTS\n'];
  let lineNum = 10; // header and metadata

  for (const { root, branches } of groups) {
    const count = branches.length;
    let label = `Line ~${lineNum}: ${root.title || 'Untitled'}`;
    if (count > 0) {
      label += ` (+${count} branch${count !== 1 ? 'es' : ''})`;
    }
    label += ` - ${formatLocalDate(root.createTime, ctx.timeZone)}`;
    toc.push(`  ${label}\n`);

    let estimate = Math.max(10, Math.floor(root.messages.length / 3));
    for (const branch of branches) {
      estimate += Math.max(8, Math.floor(branch.messages.length / 5));
    }
    lineNum += estimate + 3;
  }

  toc.push('\n');
  return toc;
}

function renderMessage(message: Message): string {
  return `${capitalize(message.role)}:\n\n${message.text}\n\n`;
}

/**
 * Render the raw narrative: header, table of contents, one numbered
 * section per group (root, then each branch's new messages) and the
 * sources registry
 */
export function renderRaw(
  groups: readonly Group[],
  settings: RenderSettings,
  ctx: RenderContext
): string {
  const out: string[] = [];
  const excerpts = settings.mode === 'excerpts';

  out.push(`DOSSIER: ${topicLabel(settings.topics)}\n`);
  out.push(`Generated: ${formatLocalTimestamp(ctx.now.getTime() / 1000, ctx.timeZone)}\n`);
  out.push(`Source: ${settings.sourceLabel}\n`);
  out.push('\n');
  out.push(...generateToc(groups, ctx));

  const sources: Source[] = [];
  const emit = (messages: readonly Message[]): void => {
    for (const message of messages) {
      out.push(renderMessage(message));
      sources.push(...extractSources(message.text));
    }
  };

  prepareSections(groups, settings).forEach((section, index) => {
    const { root } = section.group;
    out.push(`\n${RULE}\n`);
    out.push(`${index + 1}. ${root.title || 'Untitled'}\n`);
    out.push(`${RULE}\n\n`);

    if (section.rootMessages.length > 0) {
      emit(section.rootMessages);
    } else {
      out.push(
        excerpts
          ? '[No matching excerpts in root conversation.]\n\n'
          : '[No messages in root conversation.]\n\n'
      );
    }

    section.branches.forEach((branch, branchIndex) => {
      out.push(`\n--- Branch ${branchIndex + 1}: ${branch.item.title || 'Untitled'} ---\n\n`);
      if (branch.messages.length > 0) {
        emit(branch.messages);
      } else {
        out.push(
          excerpts
            ? '[No matching excerpts in this branch.]\n\n'
            : '[No new messages in this branch.]\n\n'
        );
      }
    });
  });

  out.push(renderSourcesRegistry(sources));
  return out.join('');
}

/**
 * Render the markdown dossier with ids and per-message times
 */
export function renderMarkdown(
  groups: readonly Group[],
  settings: RenderSettings,
  ctx: RenderContext
): string {
  const ts = (seconds: number): string => formatLocalTimestamp(seconds, ctx.timeZone);
  const excerpts = settings.mode === 'excerpts';
  const doc: string[] = [];

  doc.push(`# Dossier: ${settings.topics.join(', ')}\n\n`);
  doc.push(`- generated_at: ${ts(ctx.now.getTime() / 1000)}\n`);
  doc.push(`- export_root: ${settings.sourceLabel}\n`);
  doc.push(`- mode: ${settings.mode}\n\n`);
  doc.push('---\n\n');

  const emit = (messages: readonly Message[]): void => {
    for (const m of messages) {
      doc.push(`**${m.role}** (${ts(m.timestamp)})\n\n${m.text}\n\n`);
    }
  };

  for (const section of prepareSections(groups, settings)) {
    const { root } = section.group;
    doc.push(`## Thread: ${root.title || 'Untitled'}\n\n`);
    doc.push(`- root_id: ${root.id}\n`);
    doc.push(`- conversation_create_time: ${ts(root.createTime)}\n\n`);

    if (section.rootMessages.length > 0) {
      doc.push('### Root conversation\n\n');
      emit(section.rootMessages);
    } else {
      doc.push(excerpts ? '_No matching excerpts in root conversation._\n\n' : '_No messages found._\n\n');
    }

    for (const branch of section.branches) {
      doc.push(`### Branch: ${branch.item.title || 'Untitled'}\n\n`);
      doc.push(`- branch_id: ${branch.item.id}\n`);
      doc.push(`- branch_conversation_create_time: ${ts(branch.item.createTime)}\n\n`);

      if (branch.messages.length > 0) {
        emit(branch.messages);
      } else {
        doc.push(
          excerpts
            ? '_No matching excerpts in this branch._\n\n'
            : '_No new messages after trimming._\n\n'
        );
      }
    }

    doc.push('---\n\n');
  }

  return doc.join('');
}
