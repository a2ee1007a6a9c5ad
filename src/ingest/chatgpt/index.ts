/**
 * ChatGPT ingestion module
 * Parses ChatGPT JSON exports and linearizes their conversation trees
 */

export {
  extractContent,
  getModelInfo,
  findRootId,
  isVisibleMessage,
  linearizeMapping,
  linearizeConversation,
  parseConversationData,
  parseConversationExport,
  parseConversationExportFile,
} from './parser.js';

export {
  AuthorSchema,
  ContentSchema,
  ConversationSchema,
  MappingEntrySchema,
  MappingSchema,
  MessageMetadataSchema,
  MessageSchema,
  TimestampSchema,
  type Author,
  type Content,
  type Conversation,
  type ConversationExport,
  type Mapping,
  type MappingEntry,
  type Message,
  type MessageMetadata,
} from './types.js';

export {
  CONVERSATIONS_FILE,
  isZipFile,
  isConversationsEntry,
  readConversationsJson,
} from './zip.js';
