/**
 * ChatGPT export type definitions
 * Based on the conversations.json format from ChatGPT data exports
 *
 * Every field is read best-effort: a value of the wrong type falls back to
 * the default named in its `.catch()` instead of failing the whole export.
 */

import { z } from 'zod';

/**
 * Unix timestamp in seconds; anything that is not a number reads as null
 */
export const TimestampSchema = z.number().nullish().catch(null);

/**
 * Author information
 */
export const AuthorSchema = z.object({
  role: z.string().catch('unknown'),
}).passthrough();
export type Author = z.infer<typeof AuthorSchema>;

/**
 * Message content. Parts stay untyped: text exports hold strings, other
 * content types hold objects
 */
export const ContentSchema = z.object({
  content_type: z.string().catch(''),
  parts: z.array(z.unknown()).nullish().catch(null),
}).passthrough();
export type Content = z.infer<typeof ContentSchema>;

/**
 * Message metadata
 */
export const MessageMetadataSchema = z.object({
  model_slug: z.string().nullish().catch(undefined),
  message_type: z.string().nullish().catch(undefined),
  is_visually_hidden_from_conversation: z.boolean().nullish().catch(undefined),
}).passthrough();
export type MessageMetadata = z.infer<typeof MessageMetadataSchema>;

/**
 * A single message in a conversation
 */
export const MessageSchema = z.object({
  id: z.string().nullish().catch(undefined),
  author: AuthorSchema.catch({ role: 'unknown' }),
  create_time: TimestampSchema,
  content: ContentSchema.nullish().catch(null),
  metadata: MessageMetadataSchema.catch({}),
}).passthrough();
export type Message = z.infer<typeof MessageSchema>;

/**
 * Mapping entry - contains message and children
 * Child IDs that are not strings are dropped
 */
export const MappingEntrySchema = z.object({
  id: z.string().nullish().catch(undefined),
  message: MessageSchema.nullish().catch(null),
  parent: z.string().nullish().catch(null),
  children: z
    .array(z.unknown())
    .catch([])
    .transform((ids) => ids.filter((id): id is string => typeof id === 'string')),
}).passthrough();
export type MappingEntry = z.infer<typeof MappingEntrySchema>;

/**
 * Conversation mapping - ID to entry
 * A value that is not an object reads as null (a missing node)
 */
export const MappingSchema = z.record(z.string(), MappingEntrySchema.nullable().catch(null));
export type Mapping = z.infer<typeof MappingSchema>;

/**
 * A complete ChatGPT conversation
 */
export const ConversationSchema = z.object({
  title: z.string().catch('Untitled Conversation'),
  create_time: TimestampSchema,
  update_time: TimestampSchema,
  mapping: MappingSchema.catch({}),
}).passthrough();
export type Conversation = z.infer<typeof ConversationSchema>;

/**
 * A parsed export file: either a list of conversations or a single one
 */
export type ConversationExport =
  | { kind: 'list'; conversations: Conversation[] }
  | { kind: 'single'; conversation: Conversation };
