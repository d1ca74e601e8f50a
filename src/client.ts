/**
 * Open WebUI Client - TypeScript SDK for the Open WebUI REST API
 */

import { ChatsAPI } from './api/chats.js';
import { FoldersAPI } from './api/folders.js';
import { KnowledgeBaseAPI } from './api/knowledge.js';
import { loadConfig, type Config, type LoadConfigOptions } from './config.js';
import { ConfigurationError, errorMessage } from './errors.js';
import { HttpClient } from './http.js';
import { createLogger } from './logger.js';
import type { ClientOptions } from './types.js';

const log = createLogger('client');

export class OpenWebUIClient {
  readonly folders: FoldersAPI;
  readonly chats: ChatsAPI;
  readonly knowledge: KnowledgeBaseAPI;
  private http: HttpClient;

  constructor(options: ClientOptions) {
    if (!options.baseUrl || !options.apiKey) {
      throw new ConfigurationError('Client must be configured with baseUrl and apiKey.');
    }

    this.http = new HttpClient(options);
    this.folders = new FoldersAPI(this.http);
    this.knowledge = new KnowledgeBaseAPI(this.http);
    this.chats = new ChatsAPI(this.http, this.knowledge);
    log.info(`Client configured for server: ${this.http.baseUrl}`);
  }

  /**
   * Build a client from environment variables and config files, letting
   * explicit options win over anything loaded.
   */
  static fromConfig(overrides: Partial<ClientOptions> = {}, loadOptions?: LoadConfigOptions): OpenWebUIClient {
    if (overrides.baseUrl && overrides.apiKey) {
      return new OpenWebUIClient({ baseUrl: overrides.baseUrl, apiKey: overrides.apiKey, timeout: overrides.timeout });
    }

    let loaded: Config;
    try {
      loaded = loadConfig(loadOptions);
    } catch (error) {
      throw new ConfigurationError(`Configuration failed: ${errorMessage(error)}`, { cause: error });
    }

    return new OpenWebUIClient({
      baseUrl: overrides.baseUrl || loaded.serverUrl,
      apiKey: overrides.apiKey || loaded.apiKey,
      timeout: overrides.timeout ?? loaded.timeout,
    });
  }

  get baseUrl(): string {
    return this.http.baseUrl;
  }
}
