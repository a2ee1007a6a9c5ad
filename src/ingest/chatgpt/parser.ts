/**
 * ChatGPT JSON export parser
 * Parses conversations.json files and linearizes each conversation tree
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';
import {
  ConversationSchema,
  type Conversation,
  type ConversationExport,
  type Mapping,
  type MappingEntry,
  type Message,
} from './types.js';

/**
 * Render one content part as text
 */
function partToText(part: unknown): string {
  if (typeof part === 'string') return part;
  if (typeof part === 'number' || typeof part === 'boolean') return String(part);
  if (typeof part === 'object' && part !== null && 'text' in part && typeof part.text === 'string') {
    return part.text;
  }
  return JSON.stringify(part);
}

/**
 * Empty strings, zero, false, null and empty containers carry no text
 */
function isBlankPart(part: unknown): boolean {
  if (!part) return true;
  if (Array.isArray(part)) return part.length === 0;
  if (typeof part === 'object') return Object.keys(part).length === 0;
  return false;
}

/**
 * Extract text content from a message
 * Only `text` content is rendered; every other content type yields ''
 */
export function extractContent(message: Message): string {
  const content = message.content;
  if (!content || content.content_type !== 'text') return '';

  const parts = content.parts;
  if (!parts || parts.length === 0) return '';

  return parts
    .filter((part) => !isBlankPart(part))
    .map(partToText)
    .join('\n');
}

/**
 * Extract model information from message metadata
 * e.g. "Model: gpt-4 | Type: next"
 */
export function getModelInfo(message: Message): string {
  const { model_slug, message_type } = message.metadata;
  const info: string[] = [];

  if (model_slug) {
    info.push(`Model: ${model_slug}`);
  }
  if (message_type) {
    info.push(`Type: ${message_type}`);
  }

  return info.join(' | ');
}

/**
 * Find the root node: the first entry, in mapping order, without a parent
 */
export function findRootId(mapping: Mapping): string | null {
  for (const [id, entry] of Object.entries(mapping)) {
    if (entry && (entry.parent === null || entry.parent === undefined)) {
      return id;
    }
  }
  return null;
}

function getEntry(mapping: Mapping, id: string): MappingEntry | null {
  return Object.hasOwn(mapping, id) ? mapping[id] : null;
}

/**
 * Whether a message belongs in the linearized conversation
 */
export function isVisibleMessage(message: Message): boolean {
  if (message.metadata.is_visually_hidden_from_conversation === true) return false;
  if (message.author.role === 'system' && !extractContent(message).trim()) return false;
  return true;
}

/**
 * Build ordered message list from conversation mapping
 *
 * Pre-order depth-first walk from the root, children in the order they
 * are listed. Children that are not in the mapping end their branch.
 */
export function linearizeMapping(mapping: Mapping): Message[] {
  const messages: Message[] = [];
  const rootId = findRootId(mapping);
  if (rootId === null) return messages;

  const visited = new Set<string>();
  const stack: string[] = [rootId];

  for (let nodeId = stack.pop(); nodeId !== undefined; nodeId = stack.pop()) {
    if (visited.has(nodeId)) continue;
    visited.add(nodeId);

    const entry = getEntry(mapping, nodeId);
    if (!entry) continue;

    if (entry.message && isVisibleMessage(entry.message)) {
      messages.push(entry.message);
    }

    // Reversed so the first child is popped first
    for (let i = entry.children.length - 1; i >= 0; i--) {
      stack.push(entry.children[i]);
    }
  }

  return messages;
}

/**
 * Linearize a conversation into its ordered, visible messages
 */
export function linearizeConversation(conversation: Conversation): Message[] {
  return linearizeMapping(conversation.mapping);
}

/**
 * Parse a decoded export value: a list of conversations or a single one
 */
export function parseConversationData(data: unknown): ConversationExport {
  if (Array.isArray(data)) {
    return { kind: 'list', conversations: z.array(ConversationSchema).parse(data) };
  }
  return { kind: 'single', conversation: ConversationSchema.parse(data) };
}

/**
 * Parse ChatGPT export JSON string
 * @throws SyntaxError for invalid JSON, ZodError when a conversation is not an object
 */
export function parseConversationExport(jsonContent: string): ConversationExport {
  return parseConversationData(JSON.parse(jsonContent));
}

/**
 * Parse ChatGPT export from file path
 */
export async function parseConversationExportFile(filePath: string): Promise<ConversationExport> {
  const content = await readFile(filePath, 'utf-8');
  return parseConversationExport(content);
}
