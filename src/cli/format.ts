/**
 * Text rendering for CLI results
 */

import type { ChalkInstance } from 'chalk';
import { chunkSource } from '../rag.js';
import type {
  Chat,
  ChatMessage,
  ChatSummary,
  FileMetadata,
  Folder,
  KnowledgeBase,
  RetrievedChunk,
  UploadDirectoryResult,
} from '../types.js';

function labelled(paint: ChalkInstance, name: string, id: string): string {
  return `${paint.bold(name)} ${paint.dim(`(${id})`)}`;
}

function roleLabel(paint: ChalkInstance, message: ChatMessage): string {
  switch (message.role) {
    case 'user':
      return paint.cyan('user');
    case 'assistant':
      return paint.green('assistant');
    default:
      return paint.yellow(message.role);
  }
}

export function formatChatReply(paint: ChalkInstance, chat: Chat): string[] {
  const messages = chat.chat.messages ?? [];
  const reply = [...messages].reverse().find((m) => m.role === 'assistant');
  return [reply?.content ?? '', paint.dim(`Chat ID: ${chat.id}`)];
}

export function formatMessages(paint: ChalkInstance, chat: Chat): string[] {
  const messages = chat.chat.messages ?? [];
  if (messages.length === 0) {
    return ['No messages in this chat.'];
  }
  return messages.map((m) => `${roleLabel(paint, m)}: ${m.content}`);
}

export function formatChatSummaries(paint: ChalkInstance, chats: ChatSummary[]): string[] {
  if (chats.length === 0) {
    return ['No chats found.'];
  }
  return chats.map((c) => labelled(paint, c.title || '(untitled)', c.id));
}

export function formatFolders(paint: ChalkInstance, folders: Folder[]): string[] {
  if (folders.length === 0) {
    return ['No folders found.'];
  }
  return folders.map((f) => labelled(paint, f.name, f.id));
}

export function formatKnowledgeBases(paint: ChalkInstance, kbs: KnowledgeBase[]): string[] {
  if (kbs.length === 0) {
    return ['No knowledge bases found.'];
  }
  return kbs.flatMap((kb) =>
    kb.description ? [labelled(paint, kb.name, kb.id), `  ${kb.description}`] : [labelled(paint, kb.name, kb.id)]
  );
}

export function formatFiles(paint: ChalkInstance, files: FileMetadata[]): string[] {
  if (files.length === 0) {
    return ['No files in this knowledge base.'];
  }
  return files.map((f) => {
    const name = typeof f.meta.name === 'string' ? f.meta.name : f.id;
    return labelled(paint, name, f.id);
  });
}

export function formatChunks(paint: ChalkInstance, chunks: RetrievedChunk[]): string[] {
  if (chunks.length === 0) {
    return ['No matching chunks found.'];
  }
  return chunks.flatMap((chunk, i) => {
    const source = chunkSource(chunk.meta);
    const header = source ? `${paint.bold(`[${i + 1}]`)} ${paint.dim(source)}` : paint.bold(`[${i + 1}]`);
    const block = [header, chunk.content.trim()];
    return i < chunks.length - 1 ? [...block, ''] : block;
  });
}

export function formatUploadSummary(paint: ChalkInstance, result: UploadDirectoryResult): string[] {
  const lines = [`Uploaded ${result.uploaded.length} files (${result.failed.length} failed).`];
  for (const failure of result.failed) {
    lines.push(paint.red(`  ${failure.filePath}: ${failure.error}`));
  }
  return lines;
}
