/**
 * Transcript export module
 * Renders linearized conversations as readable Markdown-like text
 */

import {
  extractContent,
  getModelInfo,
  findRootId,
  linearizeMapping,
  parseConversationExportFile,
  type Conversation,
  type ConversationExport,
  type Message,
} from '../ingest/chatgpt/index.js';
import { formatUtcSeconds, rule, writeTextFile } from '../utils/index.js';

export const UNKNOWN_TIME = '[Unknown time]';
export const NO_DATA_PLACEHOLDER = '[No conversation data found]';

/**
 * Block labels per author role; other roles are left out of the transcript
 */
export const ROLE_LABELS: Readonly<Record<string, string>> = {
  user: 'User Prompt',
  assistant: 'Assistant Response',
  system: 'System Message',
  tool: 'Tool Response',
};

/**
 * Format a Unix timestamp (seconds) for a transcript
 */
export function formatTimestamp(timestamp: number | null | undefined): string {
  if (timestamp === null || timestamp === undefined || !(timestamp > 0)) {
    return UNKNOWN_TIME;
  }
  return formatUtcSeconds(timestamp) ?? UNKNOWN_TIME;
}

/**
 * Build the lines of one message block
 */
function formatBlock(message: Message, label: string, content: string): string[] {
  const lines = [`## ${label}`, `**Time:** ${formatTimestamp(message.create_time)}`];

  if (message.author.role === 'assistant') {
    const modelInfo = getModelInfo(message);
    if (modelInfo) {
      lines.push(`**${modelInfo}**`);
    }
  }

  lines.push(`**Content:** ${content}`);
  lines.push('');
  return lines;
}

/**
 * Render a conversation's messages as a transcript
 *
 * Each user message opens an exchange; the replies that follow it belong
 * to that exchange. Exchanges are separated by a dashed line.
 */
export function formatTranscript(
  title: string,
  created: number | null | undefined,
  updated: number | null | undefined,
  messages: Message[]
): string {
  const output: string[] = [
    `# ${title}`,
    `Created: ${formatTimestamp(created)}`,
    `Updated: ${formatTimestamp(updated)}`,
    rule('=', 60),
    '',
  ];

  let exchange: string[] = [];

  for (const message of messages) {
    const content = extractContent(message);
    if (!content.trim()) continue;

    const role = message.author.role;
    const label = Object.hasOwn(ROLE_LABELS, role) ? ROLE_LABELS[role] : null;
    if (label === null) continue;

    if (role === 'user' && exchange.length > 0) {
      output.push(...exchange, '', rule('-', 40), '');
      exchange = [];
    }

    exchange.push(...formatBlock(message, label, content));
  }

  // Final exchange has no trailing separator
  output.push(...exchange);

  return output.join('\n');
}

/**
 * Render one conversation, or a placeholder when it has no root node
 */
export function renderConversation(conversation: Conversation): string {
  const { title, create_time, update_time, mapping } = conversation;

  if (findRootId(mapping) === null) {
    return `# ${title}\n\n${NO_DATA_PLACEHOLDER}\n`;
  }

  return formatTranscript(title, create_time, update_time, linearizeMapping(mapping));
}

/**
 * Render a parsed export file
 * Conversations of a list are each followed by an 80-character rule
 */
export function renderExport(data: ConversationExport): string {
  if (data.kind === 'single') {
    return renderConversation(data.conversation);
  }

  const blocks: string[] = [];
  for (const conversation of data.conversations) {
    blocks.push(renderConversation(conversation));
    blocks.push(`\n${rule('=', 80)}\n`);
  }
  return blocks.join('\n');
}

/**
 * Convert result information
 */
export interface ConvertFileResult {
  inputPath: string;
  outputPath: string;
  conversationCount: number;
  bytesWritten: number;
}

/**
 * Convert a JSON export file into a transcript file
 * Nothing is written when the input cannot be read or parsed
 */
export async function convertTranscriptFile(
  inputPath: string,
  outputPath: string
): Promise<ConvertFileResult> {
  const data = await parseConversationExportFile(inputPath);
  const content = renderExport(data);
  const bytesWritten = await writeTextFile(outputPath, content);

  return {
    inputPath,
    outputPath,
    conversationCount: data.kind === 'list' ? data.conversations.length : 1,
    bytesWritten,
  };
}
