/**
 * Renderer tests
 */

import { describe, it, expect } from 'vitest';
import { buildGroups, toConversationItem } from './groups.js';
import { generateToc, prepareSections, renderMarkdown, renderRaw, type RenderSettings } from './render.js';
import { splitRegistry } from './sources.js';
import type { ConversationRecord, Message, RenderContext } from './types.js';

const RULE = '='.repeat(70);
const ctx: RenderContext = { timeZone: 'UTC', now: new Date(Date.UTC(2024, 0, 1)) };

function msg(role: string, text: string, timestamp: number): Message {
  return { role, text, timestamp };
}

const root: ConversationRecord = {
  id: 'r1',
  title: 'Trip',
  createTime: 100,
  messages: [msg('user', 'hi', 101), msg('assistant', 'hello', 102)],
};

const branch: ConversationRecord = {
  id: 'b1',
  title: 'Branch · Trip',
  createTime: 200,
  messages: [msg('user', 'hi', 101), msg('assistant', 'hello', 102), msg('user', 'more', 201)],
};

function settings(overrides: Partial<RenderSettings> = {}): RenderSettings {
  return { topics: ['Trip'], sourceLabel: 'conversations.jsonl', mode: 'full', context: 2, ...overrides };
}

const groups = buildGroups([root, branch].map(toConversationItem));

describe('prepareSections', () => {
  it('should keep root messages and only new branch messages', () => {
    const [section] = prepareSections(groups, settings());

    expect(section.rootMessages).toEqual(root.messages);
    expect(section.branches).toHaveLength(1);
    expect(section.branches[0].messages).toEqual([msg('user', 'more', 201)]);
  });
});

describe('generateToc', () => {
  it('should estimate line offsets from message counts', () => {
    const many = (n: number): Message[] => Array.from({ length: n }, (_, i) => msg('user', `m${i}`, i));
    const records: ConversationRecord[] = [
      { id: 'a', title: 'Alpha', createTime: 86400, messages: many(30) },
      { id: 'a2', title: 'Branch · Alpha', createTime: 86401, messages: many(50) },
      { id: 'a3', title: 'Branch · Alpha', createTime: 86402, messages: many(50) },
      { id: 'b', title: 'Beta', createTime: 172800, messages: [] },
    ];

    const toc = generateToc(buildGroups(records.map(toConversationItem)), ctx);

    expect(toc).toEqual([
      '## TABLE OF CONTENTS\n',
      '  Line ~10: Alpha (+2 branches) - 1970-01-02\n',
      '  Line ~43: Beta - 1970-01-03\n',
      '\n',
    ]);
  });
});

describe('renderRaw', () => {
  it('should render the root in full and the branch as its new messages', () => {
    expect(renderRaw(groups, settings(), ctx)).toBe(
      'DOSSIER: Trip\n' +
        'Generated: 2024-01-01T00:00:00+00:00\n' +
        'Source: conversations.jsonl\n' +
        '\n' +
        '## TABLE OF CONTENTS\n' +
        '  Line ~10: Trip (+1 branch) - 1970-01-01\n' +
        '\n' +
        `\n${RULE}\n1. Trip\n${RULE}\n\n` +
        'User:\n\nhi\n\n' +
        'Assistant:\n\nhello\n\n' +
        '\n--- Branch 1: Branch · Trip ---\n\n' +
        'User:\n\nmore\n\n'
    );
  });

  it('should print placeholders for empty excerpts', () => {
    const raw = renderRaw(groups, settings({ topics: ['more'], mode: 'excerpts', context: 0 }), ctx);

    expect(raw).toContain(`1. Trip\n${RULE}\n\n[No matching excerpts in root conversation.]\n\n`);
    expect(raw).toContain('--- Branch 1: Branch · Trip ---\n\nUser:\n\nmore\n\n');
  });

  it('should print a placeholder for a branch with nothing new', () => {
    const repeat: ConversationRecord = { ...branch, id: 'b2', messages: root.messages };
    const raw = renderRaw(buildGroups([root, repeat].map(toConversationItem)), settings(), ctx);

    expect(raw.endsWith('--- Branch 1: Branch · Trip ---\n\n[No new messages in this branch.]\n\n')).toBe(true);
  });

  it('should list a URL shared by the root and two branches once', () => {
    const url = 'https://example.com/guide';
    const records: ConversationRecord[] = [
      { id: 'r', title: 'Guide', createTime: 1, messages: [msg('user', `read ${url}`, 1)] },
      { id: 'x', title: 'Branch · Guide', createTime: 2, messages: [msg('user', `see ${url}.`, 2)] },
      { id: 'y', title: 'Branch · Guide', createTime: 3, messages: [msg('user', `(${url})`, 3)] },
    ];

    const raw = renderRaw(buildGroups(records.map(toConversationItem)), settings(), ctx);

    expect(splitRegistry(raw).registry).toBe(
      `${RULE}\nSOURCES REGISTRY\n${RULE}\n\n[1] example.com/guide\n    ${url}\n\n`
    );
  });
});

describe('renderMarkdown', () => {
  it('should include ids, times and branch messages', () => {
    const md = renderMarkdown(groups, settings(), ctx);

    expect(md.startsWith(
      '# Dossier: Trip\n\n' +
        '- generated_at: 2024-01-01T00:00:00+00:00\n' +
        '- export_root: conversations.jsonl\n' +
        '- mode: full\n\n' +
        '---\n\n' +
        '## Thread: Trip\n\n' +
        '- root_id: r1\n' +
        '- conversation_create_time: 1970-01-01T00:01:40+00:00\n\n' +
        '### Root conversation\n\n' +
        '**user** (1970-01-01T00:01:41+00:00)\n\nhi\n\n'
    )).toBe(true);
    expect(md).toContain(
      '### Branch: Branch · Trip\n\n' +
        '- branch_id: b1\n' +
        '- branch_conversation_create_time: 1970-01-01T00:03:20+00:00\n\n' +
        '**user** (1970-01-01T00:03:21+00:00)\n\nmore\n\n---\n\n'
    );
  });
});
