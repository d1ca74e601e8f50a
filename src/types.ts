/**
 * Open WebUI SDK Types
 */

export interface ClientOptions {
  /** Base URL of the Open WebUI server (e.g., http://localhost:8080) */
  baseUrl: string;
  /** API key or JWT used as the bearer token */
  apiKey: string;
  /** Request timeout in milliseconds (default: 30000) */
  timeout?: number;
}

export interface Folder {
  id: string;
  name: string;
  userId?: string;
  parentId?: string | null;
  isExpanded?: boolean;
  /** Folder contents, when the server includes them */
  items?: FolderItems | null;
  /** Unix timestamps (seconds) */
  createdAt?: number;
  updatedAt?: number;
}

export interface FolderItems {
  chats?: ChatSummary[];
  files?: unknown[];
}

export interface ChatSummary {
  id: string;
  title: string;
  createdAt?: number;
  updatedAt?: number;
}

export type MessageRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: MessageRole;
  content: string;
  /** Server-side message fields are carried through untouched */
  [key: string]: unknown;
}

/**
 * The conversation document stored under a chat's `chat` key. Keys the SDK
 * does not know about are preserved on update.
 */
export interface ChatContent {
  models?: string[];
  messages?: ChatMessage[];
  title?: string;
  [key: string]: unknown;
}

export interface Chat {
  id: string;
  userId?: string;
  title: string;
  chat: ChatContent;
  folderId: string | null;
  archived?: boolean;
  createdAt?: number;
  updatedAt?: number;
}

export interface KnowledgeBase {
  id: string;
  name: string;
  description: string | null;
  userId?: string;
  createdAt?: number;
  updatedAt?: number;
}

export interface FileMetadata {
  id: string;
  /** Server metadata: name, content_type, size, collection_name, ... */
  meta: Record<string, unknown>;
  createdAt?: number;
  updatedAt?: number;
}

export interface UploadedFile {
  id: string;
  filename: string;
  meta: Record<string, unknown>;
  createdAt?: number;
}

export interface RetrievalOptions {
  /** Number of chunks to retrieve (top-k) */
  k?: number;
  /** Number of chunks kept after re-ranking */
  kReranker?: number;
  /** Relevance score threshold (0.0 - 1.0) */
  r?: number;
  /** Combine vector and keyword search */
  hybrid?: boolean;
  /** BM25 weight for hybrid search (0.0 - 1.0) */
  hybridBm25Weight?: number;
}

export interface RetrievedChunk {
  /** Chunk text content */
  content: string;
  /** Source metadata reported by the server */
  meta: Record<string, unknown>;
  /** Vector distance, when the server reports one */
  distance?: number;
}

export interface RagOptions extends RetrievalOptions {
  /** Knowledge bases to query before calling the model */
  kbIds?: string[];
}

export interface CreateChatOptions extends RagOptions {
  folderId?: string;
  title?: string;
}

export interface ContinueChatOptions extends RagOptions {
  /** Overrides the model recorded in the chat */
  model?: string;
}

export interface UploadFailure {
  filePath: string;
  error: string;
}

export interface UploadDirectoryOptions {
  /** Explicit .kbignore file; defaults to `<dir>/.kbignore` */
  ignoreFile?: string;
  /** Called after each upload settles */
  onProgress?: (done: number, total: number) => void;
}

export interface UploadDirectoryResult {
  uploaded: UploadedFile[];
  failed: UploadFailure[];
}

export interface DeletionSummary {
  successful: number;
  failed: number;
}
