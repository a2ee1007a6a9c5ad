/**
 * Split writer and splitExport tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, rm, readFile, readdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { groupConversations } from './bucket.js';
import { groupByTitle, toJson, writeBuckets } from './writer.js';
import { splitExport } from './index.js';

const NOV_14_2023 = 1700000000;
const JAN_10_2024 = 1704844800;

describe('toJson', () => {
  it('should indent by two spaces and leave non-ASCII as is', () => {
    expect(toJson([{ title: 'Café ☕' }])).toBe('[\n  {\n    "title": "Café ☕"\n  }\n]');
  });
});

describe('groupByTitle', () => {
  it('should regroup conversations by sanitized title', () => {
    const groups = groupByTitle([{ title: 'a b' }, { title: 'c' }, { title: 'a  b' }]);

    expect([...groups.keys()]).toEqual(['a_b', 'c']);
    expect(groups.get('a_b')).toHaveLength(2);
  });
});

describe('writeBuckets', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `chatbook-writer-test-${Date.now()}`);
    await mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('should write one file per bucket in sorted key order', async () => {
    const conversations = [
      { title: 'later', create_time: JAN_10_2024 },
      { title: 'dated', create_time: NOV_14_2023 },
      { title: 'undated' },
    ];
    const outputDir = join(testDir, 'split');

    const result = await writeBuckets(groupConversations(conversations, 'month'), outputDir, {
      prefix: 'conversations',
      mode: 'month',
    });

    expect(result.written.map((w) => w.key)).toEqual(['2023-11', '2024-01', 'unknown']);
    expect((await readdir(outputDir)).sort()).toEqual([
      'conversations_2023-11.json',
      'conversations_2024-01.json',
      'conversations_unknown.json',
    ]);
    expect(await readFile(join(outputDir, 'conversations_2023-11.json'), 'utf-8'))
      .toBe(toJson([conversations[1]]));
    expect(JSON.parse(await readFile(join(outputDir, 'conversations_unknown.json'), 'utf-8')))
      .toEqual([{ title: 'undated' }]);
  });

  it('should skip excluded buckets', async () => {
    const conversations = [
      { title: 'a', create_time: JAN_10_2024 },
      { title: 'b', create_time: NOV_14_2023 },
    ];

    const result = await writeBuckets(groupConversations(conversations, 'month'), testDir, {
      prefix: 'chats',
      mode: 'month',
      exclude: ['2024-01'],
    });

    expect(result.excluded).toEqual([{ key: '2024-01', conversationCount: 1 }]);
    expect((await readdir(testDir)).sort()).toEqual(['chats_2023-11.json']);
  });

  it('should write a folder per date with one file per title in date_title mode', async () => {
    const conversations = [
      { title: 'Plan: trip', create_time: NOV_14_2023 },
      { title: 'Notes', create_time: NOV_14_2023 + 3600 },
      { title: 'Plan: trip', create_time: NOV_14_2023 + 7200 },
    ];

    const result = await writeBuckets(groupConversations(conversations, 'date_title'), testDir, {
      prefix: 'conversations',
      mode: 'date_title',
    });

    expect(result.written).toEqual([
      { key: 'Notes', path: join(testDir, '2023-11', 'conversations_Notes.json'), conversationCount: 1 },
      { key: 'Plan_trip', path: join(testDir, '2023-11', 'conversations_Plan_trip.json'), conversationCount: 2 },
    ]);
    expect((await readdir(join(testDir, '2023-11'))).sort()).toEqual([
      'conversations_Notes.json',
      'conversations_Plan_trip.json',
    ]);
  });

  it('should skip whole date folders when excluding in date_title mode', async () => {
    const conversations = [
      { title: 'Kept', create_time: NOV_14_2023 },
      { title: 'Dropped', create_time: JAN_10_2024 },
      { title: 'Also dropped', create_time: JAN_10_2024 + 60 },
    ];

    const result = await writeBuckets(groupConversations(conversations, 'date_title'), testDir, {
      prefix: 'conversations',
      mode: 'date_title',
      exclude: ['2024-01'],
    });

    expect(result.excluded).toEqual([{ key: '2024-01', conversationCount: 2 }]);
    expect(result.written.map((w) => w.key)).toEqual(['Kept']);
    expect((await readdir(testDir)).sort()).toEqual(['2023-11']);
    await expect(readdir(join(testDir, '2024-01'))).rejects.toThrow();
  });
});

describe('splitExport', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `chatbook-split-test-${Date.now()}`);
    await mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('should split an export by month', async () => {
    const input = join(testDir, 'conversations.json');
    await writeFile(input, JSON.stringify([
      { title: 'x', create_time: NOV_14_2023 },
      { title: 'y' },
    ]));

    const result = await splitExport(input, join(testDir, 'out'), { mode: 'month', prefix: 'conversations' });

    expect(result.conversationCount).toBe(2);
    expect(result.bucketCount).toBe(2);
    expect((await readdir(join(testDir, 'out'))).sort()).toEqual([
      'conversations_2023-11.json',
      'conversations_unknown.json',
    ]);
  });

  it('should split by ISO week', async () => {
    const input = join(testDir, 'conversations.json');
    await writeFile(input, JSON.stringify({ conversations: [{ title: 'w', create_time: 1736899200 }] }));

    const result = await splitExport(input, join(testDir, 'out'), { mode: 'week', prefix: 'p' });

    expect(result.written.map((w) => w.key)).toEqual(['2025-W03']);
    expect((await readdir(join(testDir, 'out'))).sort()).toEqual(['p_2025-W03.json']);
  });

  it('should fail when the export has no conversations list', async () => {
    const input = join(testDir, 'bad.json');
    await writeFile(input, '{"user": {}}');

    await expect(splitExport(input, join(testDir, 'out'))).rejects.toThrow('Could not find conversations list');
  });
});
