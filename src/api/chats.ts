/**
 * Chats API
 *
 * Chat creation and continuation are multi-step: optional knowledge-base
 * retrieval, a completion call, then persisting the whole conversation.
 */

import { z } from 'zod';
import { OpenWebUIError } from '../errors.js';
import type { HttpClient } from '../http.js';
import { createLogger } from '../logger.js';
import { buildAugmentedPrompt } from '../rag.js';
import { chatSchema, chatSummarySchema, completionSchema, folderSchema } from '../schemas.js';
import type {
  Chat,
  ChatContent,
  ChatMessage,
  ChatSummary,
  ContinueChatOptions,
  CreateChatOptions,
  RagOptions,
} from '../types.js';
import type { KnowledgeBaseAPI } from './knowledge.js';
import { parseBody } from './parse.js';

const log = createLogger('chats');

function chatPath(chatId: string): string {
  return `/api/v1/chats/${encodeURIComponent(chatId)}`;
}

export class ChatsAPI {
  constructor(
    private readonly http: HttpClient,
    private readonly knowledge: KnowledgeBaseAPI
  ) {}

  /**
   * Start a new chat: ask the model, then save prompt and answer as a chat.
   */
  async create(model: string, prompt: string, options: CreateChatOptions = {}): Promise<Chat> {
    log.info(`Creating new chat with model '${model}'.`);

    const content = await this.preparePrompt(prompt, options);
    log.debug('Getting LLM completion.');
    const answer = await this.complete(model, [{ role: 'user', content }]);

    log.debug('Saving conversation to a new chat.');
    const chat: ChatContent = {
      models: [model],
      messages: [
        { role: 'user', content: prompt },
        { role: 'assistant', content: answer },
      ],
    };
    if (options.title !== undefined) {
      chat.title = options.title;
    }

    const body: Record<string, unknown> = { chat };
    if (options.folderId) {
      body.folder_id = options.folderId;
    }

    const data = await this.http.post('/api/v1/chats/new', body, 'chat');
    const created = parseBody(chatSchema, data, 'chat');
    log.info(`Created new chat with ID: ${created.id}`);
    return created;
  }

  /**
   * Add a prompt to an existing chat and store the model's answer.
   */
  async continueChat(chatId: string, prompt: string, options: ContinueChatOptions = {}): Promise<Chat> {
    log.info(`Continuing chat with ID: ${chatId}`);

    const existing = await this.get(chatId);
    const model = options.model ?? existing.chat.models?.[0];
    if (!model) {
      throw new OpenWebUIError(`Chat '${chatId}' has no model recorded; pass one explicitly.`);
    }
    const history: ChatMessage[] = [...(existing.chat.messages ?? [])];

    const content = await this.preparePrompt(prompt, options);
    log.debug(`Sending continued prompt to model '${model}'.`);
    const answer = await this.complete(model, [...history, { role: 'user', content }]);

    log.debug(`Saving updated conversation for chat '${chatId}'.`);
    const chat: ChatContent = {
      ...existing.chat,
      messages: [
        ...history,
        { role: 'user', content: prompt },
        { role: 'assistant', content: answer },
      ],
    };
    const updated = await this.update(chatId, chat);
    log.info(`Updated chat with ID: ${chatId}`);
    return updated;
  }

  /**
   * List titles and IDs of the user's chats
   */
  async list(): Promise<ChatSummary[]> {
    log.info('Listing all chats for the user.');
    const data = await this.http.get('/api/v1/chats/list', 'chats');
    return parseBody(z.array(chatSummarySchema), data, 'chats');
  }

  /**
   * Get a chat with its full message history
   */
  async get(chatId: string): Promise<Chat> {
    log.info(`Getting details for chat: ${chatId}`);
    const data = await this.http.get(chatPath(chatId), `chat ${chatId}`);
    return parseBody(chatSchema, data, `chat ${chatId}`);
  }

  async rename(chatId: string, title: string): Promise<Chat> {
    log.info(`Renaming chat '${chatId}' to '${title}'.`);
    const existing = await this.get(chatId);
    const updated = await this.update(chatId, { ...existing.chat, title });
    log.info(`Renamed chat '${chatId}' to '${updated.title}'.`);
    return updated;
  }

  /**
   * Move a chat into a folder, or out of any folder with `null`
   */
  async moveToFolder(chatId: string, folderId: string | null): Promise<Chat> {
    log.info(`Moving chat '${chatId}' to folder '${folderId ?? '(none)'}'.`);
    const data = await this.http.post(`${chatPath(chatId)}/folder`, { folder_id: folderId }, `chat ${chatId}`);
    return parseBody(chatSchema, data, `chat ${chatId}`);
  }

  async delete(chatId: string): Promise<true> {
    log.info(`Deleting chat with ID: ${chatId}`);
    await this.http.delete(chatPath(chatId), `chat ${chatId}`);
    return true;
  }

  /**
   * List the chats stored in a folder
   */
  async listByFolder(folderId: string): Promise<ChatSummary[]> {
    log.info(`Listing chats for folder: ${folderId}`);
    const resource = `folder ${folderId}`;
    const data = await this.http.get(`/api/v1/folders/${encodeURIComponent(folderId)}`, resource);
    const folder = parseBody(folderSchema, data, resource);
    const chats = folder.items?.chats ?? [];
    log.info(`Found ${chats.length} chats in folder '${folderId}'.`);
    return chats;
  }

  private async update(chatId: string, chat: ChatContent): Promise<Chat> {
    const data = await this.http.post(chatPath(chatId), { chat }, `chat ${chatId}`);
    return parseBody(chatSchema, data, `chat ${chatId}`);
  }

  /**
   * Returns the text to send to the model: the prompt itself, or the prompt
   * wrapped with retrieved context when knowledge bases were given.
   */
  private async preparePrompt(prompt: string, options: RagOptions): Promise<string> {
    const { kbIds, k, kReranker, r, hybrid, hybridBm25Weight } = options;
    if (!kbIds || kbIds.length === 0) {
      return prompt;
    }

    const chunks = await this.knowledge.query(prompt, kbIds, { k, kReranker, r, hybrid, hybridBm25Weight });
    if (chunks.length === 0) {
      log.warn(`No context retrieved from knowledge bases ${kbIds.join(', ')}; sending the prompt as-is.`);
      return prompt;
    }

    log.info(`Augmenting prompt with ${chunks.length} retrieved chunks.`);
    return buildAugmentedPrompt(prompt, chunks);
  }

  private async complete(model: string, messages: ChatMessage[]): Promise<string> {
    const data = await this.http.post(
      '/api/chat/completions',
      { model, messages, stream: false },
      `completion from model ${model}`
    );
    const completion = parseBody(completionSchema, data, `completion from model ${model}`);
    return completion.choices[0]?.message.content ?? '';
  }
}
