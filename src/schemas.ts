/**
 * Response schemas
 *
 * The server speaks snake_case JSON; these schemas validate the parts the SDK
 * reads and map them onto the camelCase SDK types.
 */

import { z } from 'zod';
import type {
  Chat,
  ChatSummary,
  FileMetadata,
  Folder,
  KnowledgeBase,
  RetrievedChunk,
  UploadedFile,
} from './types.js';

const timestamp = z.number().nullish();
const metaRecord = z.record(z.unknown()).nullish();

export const chatSummarySchema = z
  .object({
    id: z.string(),
    title: z.string().nullish(),
    created_at: timestamp,
    updated_at: timestamp,
  })
  .transform((c): ChatSummary => ({
    id: c.id,
    title: c.title ?? '',
    createdAt: c.created_at ?? undefined,
    updatedAt: c.updated_at ?? undefined,
  }));

export const folderSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    user_id: z.string().nullish(),
    parent_id: z.string().nullish(),
    is_expanded: z.boolean().nullish(),
    items: z
      .object({
        chats: z.array(chatSummarySchema).nullish(),
        files: z.array(z.unknown()).nullish(),
      })
      .nullish(),
    created_at: timestamp,
    updated_at: timestamp,
  })
  .transform((f): Folder => ({
    id: f.id,
    name: f.name,
    userId: f.user_id ?? undefined,
    parentId: f.parent_id ?? null,
    isExpanded: f.is_expanded ?? undefined,
    items: f.items
      ? { chats: f.items.chats ?? undefined, files: f.items.files ?? undefined }
      : null,
    createdAt: f.created_at ?? undefined,
    updatedAt: f.updated_at ?? undefined,
  }));

export const chatMessageSchema = z
  .object({
    role: z.enum(['system', 'user', 'assistant']),
    content: z.string(),
  })
  .passthrough();

export const chatContentSchema = z
  .object({
    models: z.array(z.string()).optional(),
    messages: z.array(chatMessageSchema).optional(),
    title: z.string().optional(),
  })
  .passthrough();

export const chatSchema = z
  .object({
    id: z.string(),
    user_id: z.string().nullish(),
    title: z.string().nullish(),
    chat: chatContentSchema.nullish(),
    folder_id: z.string().nullish(),
    archived: z.boolean().nullish(),
    created_at: timestamp,
    updated_at: timestamp,
  })
  .transform((c): Chat => ({
    id: c.id,
    userId: c.user_id ?? undefined,
    title: c.title ?? c.chat?.title ?? '',
    chat: c.chat ?? {},
    folderId: c.folder_id ?? null,
    archived: c.archived ?? undefined,
    createdAt: c.created_at ?? undefined,
    updatedAt: c.updated_at ?? undefined,
  }));

export const knowledgeBaseSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    description: z.string().nullish(),
    user_id: z.string().nullish(),
    created_at: timestamp,
    updated_at: timestamp,
  })
  .transform((kb): KnowledgeBase => ({
    id: kb.id,
    name: kb.name,
    description: kb.description ?? null,
    userId: kb.user_id ?? undefined,
    createdAt: kb.created_at ?? undefined,
    updatedAt: kb.updated_at ?? undefined,
  }));

export const fileMetadataSchema = z
  .object({
    id: z.string(),
    meta: metaRecord,
    created_at: timestamp,
    updated_at: timestamp,
  })
  .transform((f): FileMetadata => ({
    id: f.id,
    meta: f.meta ?? {},
    createdAt: f.created_at ?? undefined,
    updatedAt: f.updated_at ?? undefined,
  }));

export const uploadedFileSchema = z
  .object({
    id: z.string(),
    filename: z.string(),
    meta: metaRecord,
    created_at: timestamp,
  })
  .transform((f): UploadedFile => ({
    id: f.id,
    filename: f.filename,
    meta: f.meta ?? {},
    createdAt: f.created_at ?? undefined,
  }));

export const completionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string() }),
      })
    )
    .min(1),
});

/** Retrieval results already shaped as chunks. */
export const chunkListSchema = z.array(
  z
    .object({
      content: z.string(),
      meta: metaRecord,
    })
    .transform((c): RetrievedChunk => ({ content: c.content, meta: c.meta ?? {} }))
);

/** Retrieval results in the vector store's column layout, one group per collection. */
export const collectionResultSchema = z.object({
  documents: z.array(z.array(z.string())),
  metadatas: z.array(z.array(z.record(z.unknown()).nullable())).nullish(),
  distances: z.array(z.array(z.number())).nullish(),
});

export type CollectionResult = z.infer<typeof collectionResultSchema>;
