/**
 * Folders API
 */

import { z } from 'zod';
import type { HttpClient } from '../http.js';
import { createLogger } from '../logger.js';
import { folderSchema } from '../schemas.js';
import type { Folder } from '../types.js';
import { parseBody } from './parse.js';

const log = createLogger('folders');

export class FoldersAPI {
  constructor(private readonly http: HttpClient) {}

  /**
   * List all folders of the authenticated user
   */
  async list(): Promise<Folder[]> {
    log.info('Listing all folders.');
    const data = await this.http.get('/api/v1/folders/', 'folders');
    return parseBody(z.array(folderSchema), data, 'folders');
  }

  /**
   * Create a new folder
   */
  async create(name: string): Promise<Folder> {
    log.info(`Creating new folder with name: '${name}'`);
    const data = await this.http.post('/api/v1/folders/', { name }, 'folder');
    return parseBody(folderSchema, data, 'folder');
  }

  /**
   * Get a folder by ID, including its items
   */
  async get(folderId: string): Promise<Folder> {
    log.info(`Getting folder: ${folderId}`);
    const data = await this.http.get(`/api/v1/folders/${encodeURIComponent(folderId)}`, `folder ${folderId}`);
    return parseBody(folderSchema, data, `folder ${folderId}`);
  }

  /**
   * Rename a folder
   */
  async rename(folderId: string, name: string): Promise<Folder> {
    log.info(`Renaming folder '${folderId}' to '${name}'`);
    const data = await this.http.post(
      `/api/v1/folders/${encodeURIComponent(folderId)}/update`,
      { name },
      `folder ${folderId}`
    );
    return parseBody(folderSchema, data, `folder ${folderId}`);
  }

  /**
   * Delete a folder
   */
  async delete(folderId: string): Promise<true> {
    log.info(`Deleting folder with ID: ${folderId}`);
    await this.http.delete(`/api/v1/folders/${encodeURIComponent(folderId)}`, `folder ${folderId}`);
    return true;
  }
}
