import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { OpenWebUIError, ResponseFormatError } from '../errors.js';
import { HttpClient } from '../http.js';
import { BASE_URL, fetchCall, mockJson } from '../test/fetch.js';
import { ChatsAPI } from './chats.js';
import { KnowledgeBaseAPI } from './knowledge.js';

function completion(content: string) {
  return { id: 'cmpl-1', choices: [{ index: 0, message: { role: 'assistant', content } }] };
}

describe('ChatsAPI', () => {
  let chats: ChatsAPI;

  beforeEach(() => {
    vi.stubGlobal('fetch', vi.fn());
    const http = new HttpClient({ baseUrl: BASE_URL, apiKey: 'test-secret' });
    chats = new ChatsAPI(http, new KnowledgeBaseAPI(http));
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe('create', () => {
    it('asks the model and saves prompt and answer', async () => {
      mockJson(200, completion('Hi there'));
      mockJson(200, { id: 'c1', title: 'New Chat', chat: { models: ['llama3'] }, folder_id: null });

      const chat = await chats.create('llama3', 'Hello');

      const ask = fetchCall(0);
      expect(ask.url).toBe('http://owui.test/api/chat/completions');
      expect(ask.body).toEqual({
        model: 'llama3',
        messages: [{ role: 'user', content: 'Hello' }],
        stream: false,
      });

      const save = fetchCall(1);
      expect(save.url).toBe('http://owui.test/api/v1/chats/new');
      expect(save.body).toEqual({
        chat: {
          models: ['llama3'],
          messages: [
            { role: 'user', content: 'Hello' },
            { role: 'assistant', content: 'Hi there' },
          ],
        },
      });

      expect(chat.id).toBe('c1');
      expect(chat.folderId).toBeNull();
    });

    it('passes the title and folder', async () => {
      mockJson(200, completion('Sure'));
      mockJson(200, { id: 'c2', title: 'Trip', chat: {}, folder_id: 'f1' });

      const chat = await chats.create('llama3', 'Plan a trip', { title: 'Trip', folderId: 'f1' });

      expect(fetchCall(1).body).toEqual({
        chat: {
          models: ['llama3'],
          messages: [
            { role: 'user', content: 'Plan a trip' },
            { role: 'assistant', content: 'Sure' },
          ],
          title: 'Trip',
        },
        folder_id: 'f1',
      });
      expect(chat.folderId).toBe('f1');
      expect(chat.title).toBe('Trip');
    });

    it('sends retrieved context to the model but stores the original prompt', async () => {
      mockJson(200, [{ content: 'Paris is the capital.', meta: { name: 'geo.md' } }]);
      mockJson(200, completion('Paris.'));
      mockJson(200, { id: 'c3', chat: {} });

      await chats.create('llama3', 'Capital?', { kbIds: ['kb1'], k: 3 });

      const query = fetchCall(0);
      expect(query.url).toBe('http://owui.test/api/v1/retrieval/query/collection');
      expect(query.body).toEqual({ collection_names: ['kb1'], query: 'Capital?', k: 3 });

      expect(fetchCall(1).body).toEqual({
        model: 'llama3',
        messages: [
          {
            role: 'user',
            content:
              'Use the following context to answer the question.\n\nContext:\n[1] (geo.md) Paris is the capital.\n\nQuestion: Capital?',
          },
        ],
        stream: false,
      });

      expect(fetchCall(2).body).toEqual({
        chat: {
          models: ['llama3'],
          messages: [
            { role: 'user', content: 'Capital?' },
            { role: 'assistant', content: 'Paris.' },
          ],
        },
      });
    });

    it('sends the plain prompt when retrieval finds nothing', async () => {
      mockJson(200, []);
      mockJson(200, completion('No idea.'));
      mockJson(200, { id: 'c4', chat: {} });

      await chats.create('llama3', 'Capital?', { kbIds: ['kb1'] });

      expect(fetchCall(1).body).toEqual({
        model: 'llama3',
        messages: [{ role: 'user', content: 'Capital?' }],
        stream: false,
      });
    });

    it('rejects a completion without choices and saves nothing', async () => {
      mockJson(200, { choices: [] });

      await expect(chats.create('llama3', 'Hello')).rejects.toBeInstanceOf(ResponseFormatError);
      expect(fetch).toHaveBeenCalledTimes(1);
    });
  });

  describe('continueChat', () => {
    const stored = {
      id: 'c1',
      title: 'Notes',
      chat: {
        models: ['llama3'],
        messages: [
          { role: 'user', content: 'First' },
          { role: 'assistant', content: 'One' },
        ],
        tags: ['keep'],
      },
    };

    it('sends the history and stores the new turn', async () => {
      mockJson(200, stored);
      mockJson(200, completion('Two'));
      mockJson(200, { ...stored, chat: { ...stored.chat } });

      await chats.continueChat('c1', 'Second');

      expect(fetchCall(0).url).toBe('http://owui.test/api/v1/chats/c1');
      expect(fetchCall(1).body).toEqual({
        model: 'llama3',
        messages: [
          { role: 'user', content: 'First' },
          { role: 'assistant', content: 'One' },
          { role: 'user', content: 'Second' },
        ],
        stream: false,
      });

      const update = fetchCall(2);
      expect(update.method).toBe('POST');
      expect(update.url).toBe('http://owui.test/api/v1/chats/c1');
      expect(update.body).toEqual({
        chat: {
          models: ['llama3'],
          messages: [
            { role: 'user', content: 'First' },
            { role: 'assistant', content: 'One' },
            { role: 'user', content: 'Second' },
            { role: 'assistant', content: 'Two' },
          ],
          tags: ['keep'],
        },
      });
    });

    it('sends retrieved context with the history but stores the original prompt', async () => {
      mockJson(200, stored);
      mockJson(200, [{ content: 'Refunds take five days.', meta: { source: 'policy.md' } }]);
      mockJson(200, completion('Five days.'));
      mockJson(200, stored);

      await chats.continueChat('c1', 'How long?', { kbIds: ['kb1', 'kb2'], hybrid: true });

      expect(fetchCall(1).body).toEqual({ collection_names: ['kb1', 'kb2'], query: 'How long?', hybrid: true });

      expect(fetchCall(2).body).toEqual({
        model: 'llama3',
        messages: [
          { role: 'user', content: 'First' },
          { role: 'assistant', content: 'One' },
          {
            role: 'user',
            content:
              'Use the following context to answer the question.\n\nContext:\n[1] (policy.md) Refunds take five days.\n\nQuestion: How long?',
          },
        ],
        stream: false,
      });

      expect(fetchCall(3).body).toEqual({
        chat: {
          models: ['llama3'],
          messages: [
            { role: 'user', content: 'First' },
            { role: 'assistant', content: 'One' },
            { role: 'user', content: 'How long?' },
            { role: 'assistant', content: 'Five days.' },
          ],
          tags: ['keep'],
        },
      });
    });

    it('uses an explicit model over the stored one', async () => {
      mockJson(200, stored);
      mockJson(200, completion('Two'));
      mockJson(200, stored);

      await chats.continueChat('c1', 'Second', { model: 'mistral' });

      expect(fetchCall(1).body).toHaveProperty('model', 'mistral');
    });

    it('fails when no model is known', async () => {
      mockJson(200, { id: 'c2', chat: { messages: [] } });

      await expect(chats.continueChat('c2', 'Hello')).rejects.toThrow(
        new OpenWebUIError("Chat 'c2' has no model recorded; pass one explicitly.")
      );
      expect(fetch).toHaveBeenCalledTimes(1);
    });
  });

  it('lists chats', async () => {
    mockJson(200, [
      { id: 'c1', title: 'First', updated_at: 1700000000 },
      { id: 'c2', title: null },
    ]);

    await expect(chats.list()).resolves.toEqual([
      { id: 'c1', title: 'First', updatedAt: 1700000000 },
      { id: 'c2', title: '' },
    ]);
    expect(fetchCall(0).url).toBe('http://owui.test/api/v1/chats/list');
  });

  it('renames a chat by updating its title', async () => {
    mockJson(200, { id: 'c1', title: 'Old', chat: { title: 'Old', models: ['llama3'] } });
    mockJson(200, { id: 'c1', title: 'New', chat: { title: 'New', models: ['llama3'] } });

    const chat = await chats.rename('c1', 'New');

    expect(fetchCall(1).body).toEqual({ chat: { title: 'New', models: ['llama3'] } });
    expect(chat.title).toBe('New');
  });

  it('moves a chat out of its folder', async () => {
    mockJson(200, { id: 'c1', chat: {}, folder_id: null });

    await chats.moveToFolder('c1', null);

    const call = fetchCall(0);
    expect(call.url).toBe('http://owui.test/api/v1/chats/c1/folder');
    expect(call.body).toEqual({ folder_id: null });
  });

  it('deletes a chat', async () => {
    mockJson(200, true);

    await expect(chats.delete('c1')).resolves.toBe(true);
    expect(fetchCall(0).method).toBe('DELETE');
  });

  it('lists the chats of a folder', async () => {
    mockJson(200, { id: 'f1', name: 'Work', items: { chats: [{ id: 'c1', title: 'Plan' }] } });

    await expect(chats.listByFolder('f1')).resolves.toEqual([{ id: 'c1', title: 'Plan' }]);
    expect(fetchCall(0).url).toBe('http://owui.test/api/v1/folders/f1');
  });

  it('returns no chats for a folder without items', async () => {
    mockJson(200, { id: 'f1', name: 'Work' });

    await expect(chats.listByFolder('f1')).resolves.toEqual([]);
  });
});
