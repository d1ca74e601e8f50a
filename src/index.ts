/**
 * owui-sdk - TypeScript client for the Open WebUI REST API
 *
 * @example
 * ```typescript
 * import { OpenWebUIClient } from 'owui-sdk';
 *
 * // Option 1: explicit settings
 * const client = new OpenWebUIClient({
 *   baseUrl: 'http://localhost:8080',
 *   apiKey: process.env.OPENWEBUI_API_KEY ?? '',
 * });
 *
 * // Option 2: environment, .env and ~/.owui/config.yaml
 * const configured = OpenWebUIClient.fromConfig();
 *
 * const chat = await client.chats.create('llama3', 'What changed in v2?', {
 *   kbIds: ['release-notes'],
 *   k: 5,
 * });
 * ```
 */

export { OpenWebUIClient } from './client.js';
export { ChatsAPI } from './api/chats.js';
export { FoldersAPI } from './api/folders.js';
export { KnowledgeBaseAPI } from './api/knowledge.js';
export { HttpClient, handleApiResponse, DEFAULT_TIMEOUT_MS } from './http.js';
export { loadConfig, CONFIG_DIRNAME, CONFIG_FILENAME } from './config.js';
export type { Config, LoadConfigOptions } from './config.js';
export { buildAugmentedPrompt, chunkSource } from './rag.js';
export { KbIgnore } from './kbignore.js';
export { createLogger, setLogLevel, getLogLevel, isLogLevel } from './logger.js';
export type { LogLevel, Logger } from './logger.js';
export {
  OpenWebUIError,
  APIError,
  AuthenticationError,
  NotFoundError,
  ResponseFormatError,
  ConnectionError,
  ConfigurationError,
  FileNotFoundError,
  NotADirectoryError,
  errorMessage,
} from './errors.js';
export type {
  ClientOptions,
  Folder,
  FolderItems,
  ChatSummary,
  MessageRole,
  ChatMessage,
  ChatContent,
  Chat,
  KnowledgeBase,
  FileMetadata,
  UploadedFile,
  RetrievalOptions,
  RetrievedChunk,
  RagOptions,
  CreateChatOptions,
  ContinueChatOptions,
  UploadFailure,
  UploadDirectoryOptions,
  UploadDirectoryResult,
  DeletionSummary,
} from './types.js';
