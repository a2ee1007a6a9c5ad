/**
 * ChatGPT parser tests
 */

import { describe, it, expect } from 'vitest';
import {
  extractContent,
  getModelInfo,
  findRootId,
  linearizeConversation,
  parseConversationData,
  parseConversationExport,
} from './parser.js';
import { ConversationSchema, MessageSchema, type Conversation } from './types.js';

interface RawNode {
  parent?: string | null;
  children?: unknown[];
  message?: Record<string, unknown> | null;
}

function textMessage(
  role: string,
  text: string,
  metadata: Record<string, unknown> = {}
): Record<string, unknown> {
  return {
    author: { role },
    create_time: 1706745600,
    content: { content_type: 'text', parts: [text] },
    metadata,
  };
}

function conversation(mapping: Record<string, RawNode>): Conversation {
  const raw: Record<string, unknown> = {};
  for (const [id, node] of Object.entries(mapping)) {
    raw[id] = { id, message: null, children: [], ...node };
  }
  return ConversationSchema.parse({
    title: 'Test Conversation',
    create_time: 1706745600,
    update_time: 1706749200,
    mapping: raw,
  });
}

function contents(conv: Conversation): string[] {
  return linearizeConversation(conv).map(extractContent);
}

// Sample ChatGPT export data for testing
const sampleConversation = conversation({
  'root-id': { parent: null, children: ['msg-1'] },
  'msg-1': { parent: 'root-id', children: ['msg-2'], message: textMessage('user', 'Hello, how are you?') },
  'msg-2': {
    parent: 'msg-1',
    children: ['msg-3'],
    message: textMessage('assistant', 'Doing well!', { model_slug: 'gpt-4' }),
  },
  'msg-3': { parent: 'msg-2', children: ['msg-4'], message: textMessage('user', 'Explain recursion') },
  'msg-4': { parent: 'msg-3', children: [], message: textMessage('assistant', 'See recursion.') },
});

describe('extractContent', () => {
  it('should join text parts with newlines', () => {
    const message = MessageSchema.parse({
      author: { role: 'user' },
      content: { content_type: 'text', parts: ['Part 1', 'Part 2', 'Part 3'] },
    });

    expect(extractContent(message)).toBe('Part 1\nPart 2\nPart 3');
  });

  it('should skip empty parts', () => {
    const message = MessageSchema.parse({
      author: { role: 'user' },
      content: { content_type: 'text', parts: ['a', '', null, 'b'] },
    });

    expect(extractContent(message)).toBe('a\nb');
  });

  it('should render non-string parts', () => {
    const message = MessageSchema.parse({
      author: { role: 'user' },
      content: { content_type: 'text', parts: [42, { text: 'inner' }, { asset: 'x' }] },
    });

    expect(extractContent(message)).toBe('42\ninner\n{"asset":"x"}');
  });

  it('should return empty string for non-text content types', () => {
    const message = MessageSchema.parse({
      author: { role: 'assistant' },
      content: { content_type: 'code', parts: ['print(1)'] },
    });

    expect(extractContent(message)).toBe('');
  });

  it('should return empty string when parts are missing or empty', () => {
    const noParts = MessageSchema.parse({ author: { role: 'user' }, content: { content_type: 'text' } });
    const emptyParts = MessageSchema.parse({ author: { role: 'user' }, content: { content_type: 'text', parts: [] } });
    const noContent = MessageSchema.parse({ author: { role: 'user' } });

    expect(extractContent(noParts)).toBe('');
    expect(extractContent(emptyParts)).toBe('');
    expect(extractContent(noContent)).toBe('');
  });
});

describe('getModelInfo', () => {
  it('should leave out an empty model slug', () => {
    const message = MessageSchema.parse({
      author: { role: 'assistant' },
      metadata: { model_slug: '', message_type: 'next' },
    });

    expect(getModelInfo(message)).toBe('Type: next');
  });

  it('should combine model slug and message type', () => {
    const message = MessageSchema.parse({
      author: { role: 'assistant' },
      metadata: { model_slug: 'gpt-4o', message_type: 'next' },
    });

    expect(getModelInfo(message)).toBe('Model: gpt-4o | Type: next');
  });

  it('should include only the fields that are present', () => {
    const slugOnly = MessageSchema.parse({ author: { role: 'assistant' }, metadata: { model_slug: 'gpt-4' } });
    const typeOnly = MessageSchema.parse({ author: { role: 'assistant' }, metadata: { message_type: 'variant' } });
    const neither = MessageSchema.parse({ author: { role: 'assistant' }, metadata: { message_type: null } });

    expect(getModelInfo(slugOnly)).toBe('Model: gpt-4');
    expect(getModelInfo(typeOnly)).toBe('Type: variant');
    expect(getModelInfo(neither)).toBe('');
  });

  it('should default missing metadata to no info', () => {
    const message = MessageSchema.parse({ author: { role: 'assistant' } });

    expect(message.metadata).toEqual({});
    expect(getModelInfo(message)).toBe('');
  });
});

describe('findRootId', () => {
  it('should return the first node without a parent', () => {
    const conv = conversation({
      child: { parent: 'first-root', children: [] },
      'first-root': { parent: null, children: ['child'] },
      'second-root': { children: [] },
    });

    expect(findRootId(conv.mapping)).toBe('first-root');
  });

  it('should return null when every node has a parent', () => {
    const conv = conversation({
      a: { parent: 'b', children: [] },
      b: { parent: 'a', children: [] },
    });

    expect(findRootId(conv.mapping)).toBeNull();
  });
});

describe('linearizeConversation', () => {
  it('should extract messages in order', () => {
    const messages = linearizeConversation(sampleConversation);

    expect(messages.map((m) => m.author.role)).toEqual(['user', 'assistant', 'user', 'assistant']);
    expect(extractContent(messages[0])).toBe('Hello, how are you?');
  });

  it('should follow listed child order rather than timestamps', () => {
    const conv = conversation({
      root: { parent: null, children: ['late', 'early'] },
      late: {
        parent: 'root',
        children: ['late-reply'],
        message: { ...textMessage('user', 'listed first'), create_time: 2000 },
      },
      'late-reply': { parent: 'late', children: [], message: textMessage('assistant', 'reply to first') },
      early: {
        parent: 'root',
        children: [],
        message: { ...textMessage('user', 'listed second'), create_time: 1000 },
      },
    });

    expect(contents(conv)).toEqual(['listed first', 'reply to first', 'listed second']);
  });

  it('should skip hidden messages regardless of role', () => {
    const conv = conversation({
      root: { parent: null, children: ['hidden', 'shown'] },
      hidden: {
        parent: 'root',
        children: ['after-hidden'],
        message: textMessage('user', 'secret', { is_visually_hidden_from_conversation: true }),
      },
      'after-hidden': { parent: 'hidden', children: [], message: textMessage('assistant', 'still visible') },
      shown: { parent: 'root', children: [], message: textMessage('user', 'visible') },
    });

    expect(contents(conv)).toEqual(['still visible', 'visible']);
  });

  it('should drop empty system messages but keep non-empty ones', () => {
    const conv = conversation({
      root: { parent: null, children: ['empty-system'] },
      'empty-system': { parent: 'root', children: ['system'], message: textMessage('system', '   ') },
      system: { parent: 'empty-system', children: ['user'], message: textMessage('system', 'Be brief.') },
      user: { parent: 'system', children: [], message: textMessage('user', 'Hi') },
    });

    const messages = linearizeConversation(conv);

    expect(messages.map((m) => m.author.role)).toEqual(['system', 'user']);
    expect(extractContent(messages[0])).toBe('Be brief.');
  });

  it('should keep non-system messages with non-text content', () => {
    const conv = conversation({
      root: { parent: null, children: ['code'] },
      code: {
        parent: 'root',
        children: [],
        message: {
          author: { role: 'assistant' },
          content: { content_type: 'code', text: 'print(1)' },
        },
      },
    });

    const messages = linearizeConversation(conv);

    expect(messages).toHaveLength(1);
    expect(extractContent(messages[0])).toBe('');
  });

  it('should silently skip dangling child references', () => {
    const conv = conversation({
      root: { parent: null, children: ['missing', 'msg'] },
      msg: { parent: 'root', children: ['constructor'], message: textMessage('user', 'present') },
    });

    expect(contents(conv)).toEqual(['present']);
  });

  it('should return an empty list when there is no root', () => {
    const conv = conversation({
      a: { parent: 'b', children: [], message: textMessage('user', 'orphan') },
    });

    expect(linearizeConversation(conv)).toEqual([]);
  });

  it('should visit each node once even if listed twice', () => {
    const conv = conversation({
      root: { parent: null, children: ['msg', 'msg'] },
      msg: { parent: 'root', children: [], message: textMessage('user', 'once') },
    });

    expect(contents(conv)).toEqual(['once']);
  });

  it('should handle deep trees without recursion limits', () => {
    const mapping: Record<string, RawNode> = { n0: { parent: null, children: ['n1'] } };
    const depth = 20000;
    for (let i = 1; i <= depth; i++) {
      mapping[`n${i}`] = {
        parent: `n${i - 1}`,
        children: i < depth ? [`n${i + 1}`] : [],
        message: textMessage(i % 2 ? 'user' : 'assistant', `m${i}`),
      };
    }

    const messages = linearizeConversation(conversation(mapping));

    expect(messages).toHaveLength(depth);
    expect(extractContent(messages[depth - 1])).toBe(`m${depth}`);
  });
});

describe('parseConversationData', () => {
  it('should recognise a list of conversations', () => {
    const parsed = parseConversationData([{ title: 'One', mapping: {} }, { title: 'Two', mapping: {} }]);

    expect(parsed.kind).toBe('list');
    if (parsed.kind === 'list') {
      expect(parsed.conversations.map((c) => c.title)).toEqual(['One', 'Two']);
    }
  });

  it('should recognise a single conversation', () => {
    const parsed = parseConversationData({ title: 'Solo', create_time: 1706745600, mapping: {} });

    expect(parsed.kind).toBe('single');
    if (parsed.kind === 'single') {
      expect(parsed.conversation.title).toBe('Solo');
      expect(parsed.conversation.create_time).toBe(1706745600);
    }
  });

  it('should fall back to defaults for malformed fields', () => {
    const parsed = parseConversationData({
      title: 7,
      create_time: 'yesterday',
      mapping: { root: 'not a node', other: { parent: null, children: [1, 'x'] } },
    });

    expect(parsed.kind).toBe('single');
    if (parsed.kind === 'single') {
      const conv = parsed.conversation;
      expect(conv.title).toBe('Untitled Conversation');
      expect(conv.create_time).toBeNull();
      expect(conv.mapping.root).toBeNull();
      expect(conv.mapping.other?.children).toEqual(['x']);
      expect(findRootId(conv.mapping)).toBe('other');
    }
  });

  it('should keep unknown fields on the conversation', () => {
    const parsed = parseConversationData({ title: 'Extra', mapping: {}, conversation_id: 'conv-123' });

    expect(parsed.kind === 'single' && parsed.conversation.conversation_id).toBe('conv-123');
  });
});

describe('parseConversationExport', () => {
  it('should throw on invalid JSON', () => {
    expect(() => parseConversationExport('{ invalid json }')).toThrow(SyntaxError);
  });

  it('should throw when a list entry is not an object', () => {
    expect(() => parseConversationExport('[1, 2]')).toThrow();
  });
});
