/**
 * Knowledge Base API
 *
 * Knowledge-base CRUD, file management and retrieval queries. Batch
 * operations (directory upload, delete-all) tolerate individual failures
 * and report a tally instead of stopping at the first error.
 */

import { readFile, readdir, stat } from 'node:fs/promises';
import { basename, join, relative, resolve, sep } from 'node:path';
import { lookup } from 'mime-types';
import { z } from 'zod';
import {
  FileNotFoundError,
  NotADirectoryError,
  NotFoundError,
  OpenWebUIError,
  ResponseFormatError,
  errorMessage,
} from '../errors.js';
import type { HttpClient } from '../http.js';
import { KbIgnore } from '../kbignore.js';
import { createLogger } from '../logger.js';
import {
  chunkListSchema,
  collectionResultSchema,
  fileMetadataSchema,
  knowledgeBaseSchema,
  uploadedFileSchema,
  type CollectionResult,
} from '../schemas.js';
import type {
  DeletionSummary,
  FileMetadata,
  KnowledgeBase,
  RetrievalOptions,
  RetrievedChunk,
  UploadDirectoryOptions,
  UploadDirectoryResult,
  UploadedFile,
} from '../types.js';
import { parseBody } from './parse.js';

const log = createLogger('knowledge');

const KBIGNORE_FILENAME = '.kbignore';

async function isFile(path: string): Promise<boolean> {
  const info = await stat(path).catch(() => undefined);
  return info?.isFile() ?? false;
}

async function isDirectory(path: string): Promise<boolean> {
  const info = await stat(path).catch(() => undefined);
  return info?.isDirectory() ?? false;
}

async function walkFiles(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  entries.sort((a, b) => a.name.localeCompare(b.name));

  const files: string[] = [];
  for (const entry of entries) {
    const fullPath = join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await walkFiles(fullPath)));
    } else if (entry.isFile()) {
      files.push(fullPath);
    }
  }
  return files;
}

function flattenCollectionResult(result: CollectionResult): RetrievedChunk[] {
  const chunks: RetrievedChunk[] = [];
  result.documents.forEach((documents, group) => {
    const metadatas = result.metadatas?.[group];
    const distances = result.distances?.[group];
    const count = result.metadatas ? Math.min(documents.length, metadatas?.length ?? 0) : documents.length;

    for (let i = 0; i < count; i++) {
      const chunk: RetrievedChunk = {
        content: documents[i] ?? '',
        meta: metadatas?.[i] ?? {},
      };
      const distance = distances?.[i];
      if (distance !== undefined) {
        chunk.distance = distance;
      }
      chunks.push(chunk);
    }
  });
  return chunks;
}

export class KnowledgeBaseAPI {
  constructor(private readonly http: HttpClient) {}

  /**
   * Create a knowledge base
   */
  async create(name: string, description?: string): Promise<KnowledgeBase> {
    log.info(`Creating knowledge base: '${name}'`);
    const data = await this.http.post(
      '/api/v1/knowledge/create',
      { name, description: description ?? '' },
      'knowledge base'
    );
    return parseBody(knowledgeBaseSchema, data, 'knowledge base');
  }

  /**
   * Delete a knowledge base by ID
   */
  async delete(kbId: string): Promise<true> {
    log.info(`Deleting knowledge base with ID: '${kbId}'`);
    await this.http.delete(`/api/v1/knowledge/${encodeURIComponent(kbId)}/delete`, `knowledge base ${kbId}`);
    return true;
  }

  /**
   * List all knowledge bases visible to the user.
   *
   * Entries that are not objects are skipped; object entries that cannot be
   * read as a knowledge base fail the whole call.
   */
  async listAll(): Promise<KnowledgeBase[]> {
    log.info('Listing all knowledge bases.');
    const data = await this.http.get('/api/v1/knowledge/list', 'knowledge bases');
    if (!Array.isArray(data)) {
      throw new ResponseFormatError('knowledge bases', `expected a list, received ${typeof data}`);
    }

    const kbs: KnowledgeBase[] = [];
    for (const entry of data) {
      if (typeof entry !== 'object' || entry === null || Array.isArray(entry)) {
        log.warn(`Expected an object for knowledge base entry, got ${typeof entry}. Skipping.`);
        continue;
      }
      const parsed = knowledgeBaseSchema.safeParse(entry);
      if (!parsed.success) {
        const id: unknown = Reflect.get(entry, 'id');
        throw new ResponseFormatError(
          'knowledge bases',
          `malformed knowledge base data for ${typeof id === 'string' ? id : 'unknown id'}`
        );
      }
      kbs.push(parsed.data);
    }
    return kbs;
  }

  /**
   * Query one or more knowledge bases for the chunks most relevant to `queryText`
   */
  async query(queryText: string, kbIds: string[], options: RetrievalOptions = {}): Promise<RetrievedChunk[]> {
    log.info(`Querying KBs ${kbIds.join(', ')} with text: '${queryText.slice(0, 50)}'`);

    const body: Record<string, unknown> = {
      collection_names: kbIds,
      query: queryText,
    };
    if (options.k !== undefined) body.k = options.k;
    if (options.kReranker !== undefined) body.k_reranker = options.kReranker;
    if (options.r !== undefined) body.r = options.r;
    if (options.hybrid !== undefined) body.hybrid = options.hybrid;
    if (options.hybridBm25Weight !== undefined) body.hybrid_bm25_weight = options.hybridBm25Weight;

    const resource = `query on KBs ${kbIds.join(', ')}`;
    const data = await this.http.post('/api/v1/retrieval/query/collection', body, resource);

    const asList = chunkListSchema.safeParse(data);
    if (asList.success) {
      log.info(`Retrieved ${asList.data.length} chunks.`);
      return asList.data;
    }

    const asCollection = collectionResultSchema.safeParse(data);
    if (asCollection.success) {
      const chunks = flattenCollectionResult(asCollection.data);
      log.info(`Retrieved ${chunks.length} chunks.`);
      return chunks;
    }

    throw new ResponseFormatError(resource, 'expected a chunk list or a documents/metadatas result');
  }

  /**
   * List the files attached to a knowledge base
   */
  async listFiles(kbId: string): Promise<FileMetadata[]> {
    log.info(`Listing files for KB ID: '${kbId}'`);
    const resource = `files for KB ${kbId}`;
    const data = await this.http.get(`/api/v1/knowledge/${encodeURIComponent(kbId)}`, resource);

    const files: unknown = typeof data === 'object' && data !== null ? Reflect.get(data, 'files') : undefined;
    if (!Array.isArray(files)) {
      log.warn(`No 'files' list in knowledge base '${kbId}' response. Assuming empty list.`);
      return [];
    }
    return parseBody(z.array(fileMetadataSchema), files, resource);
  }

  /**
   * Upload a single file and attach it to a knowledge base
   */
  async uploadFile(filePath: string, kbId: string): Promise<UploadedFile> {
    if (!(await isFile(filePath))) {
      log.error(`File not found: ${filePath}`);
      throw new FileNotFoundError(filePath);
    }

    log.info(`Uploading file '${basename(filePath)}' to knowledge base '${kbId}'.`);
    const uploaded = await this.uploadOne(filePath);
    await this.attachFiles(kbId, [uploaded.id]);
    log.info(`Uploaded and attached '${uploaded.filename}' (ID: ${uploaded.id}) to KB '${kbId}'.`);
    return uploaded;
  }

  /**
   * Upload every file of a directory tree, honouring .kbignore rules, and
   * attach the successful uploads to a knowledge base in one batch.
   */
  async uploadDirectory(
    directoryPath: string,
    kbId: string,
    options: UploadDirectoryOptions = {}
  ): Promise<UploadDirectoryResult> {
    if (!(await isDirectory(directoryPath))) {
      log.error(`Directory not found: ${directoryPath}`);
      throw new NotADirectoryError(directoryPath);
    }

    const root = resolve(directoryPath);
    let ignoreFile: string | undefined;
    if (options.ignoreFile && (await isFile(options.ignoreFile))) {
      ignoreFile = resolve(options.ignoreFile);
    } else if (await isFile(join(root, KBIGNORE_FILENAME))) {
      ignoreFile = join(root, KBIGNORE_FILENAME);
    }

    const rules = ignoreFile ? await KbIgnore.fromFile(ignoreFile) : new KbIgnore();
    if (ignoreFile) {
      log.info(`Loaded ${rules.size} ignore patterns from '${ignoreFile}'.`);
    }

    const files = (await walkFiles(root)).filter((file) => {
      if (file === ignoreFile) {
        return false;
      }
      const relativePath = relative(root, file).split(sep).join('/');
      if (rules.isIgnored(relativePath)) {
        log.debug(`Skipping ignored file: '${relativePath}'`);
        return false;
      }
      return true;
    });

    if (files.length === 0) {
      log.info(`No files to upload in '${directoryPath}' after applying ignore rules.`);
      return { uploaded: [], failed: [] };
    }

    log.info(`Uploading ${files.length} files from '${directoryPath}'.`);
    let done = 0;
    const results = await Promise.allSettled(
      files.map(async (file) => {
        try {
          return await this.uploadOne(file);
        } finally {
          done += 1;
          options.onProgress?.(done, files.length);
        }
      })
    );

    const uploaded: UploadedFile[] = [];
    const failed: UploadDirectoryResult['failed'] = [];
    results.forEach((result, i) => {
      const filePath = files[i] ?? '';
      if (result.status === 'fulfilled') {
        uploaded.push(result.value);
      } else {
        log.error(`Failed to upload '${filePath}': ${errorMessage(result.reason)}`);
        failed.push({ filePath, error: errorMessage(result.reason) });
      }
    });

    if (uploaded.length === 0) {
      throw new OpenWebUIError(`All ${failed.length} files failed to upload.`);
    }

    await this.attachFiles(
      kbId,
      uploaded.map((file) => file.id)
    );
    log.info(`Attached ${uploaded.length} files to KB '${kbId}' (${failed.length} failed).`);
    return { uploaded, failed };
  }

  /**
   * Replace the text content of an existing file.
   *
   * When `kbId` is given, the knowledge base re-indexes the file afterwards.
   */
  async updateFile(fileId: string, filePath: string, kbId?: string): Promise<UploadedFile> {
    if (!(await isFile(filePath))) {
      throw new FileNotFoundError(filePath);
    }

    log.info(`Updating content of file '${fileId}' from '${filePath}'.`);
    const content = await readFile(filePath, 'utf8');
    const resource = `file ${fileId}`;
    const path = `/api/v1/files/${encodeURIComponent(fileId)}`;

    await this.http.post(`${path}/data/content/update`, { content }, resource);
    if (kbId) {
      await this.http.post(
        `/api/v1/knowledge/${encodeURIComponent(kbId)}/file/update`,
        { file_id: fileId },
        `file ${fileId} in KB ${kbId}`
      );
    }
    const data = await this.http.get(path, resource);
    return parseBody(uploadedFileSchema, data, resource);
  }

  /**
   * Delete a single file by ID
   */
  async deleteFile(fileId: string): Promise<true> {
    log.info(`Deleting file with ID: '${fileId}'`);
    await this.http.delete(`/api/v1/files/${encodeURIComponent(fileId)}`, `file ${fileId}`);
    return true;
  }

  /**
   * Delete every file attached to a knowledge base, tallying the outcome
   */
  async deleteAllFiles(kbId: string): Promise<DeletionSummary> {
    log.info(`Deleting all files from knowledge base '${kbId}'.`);

    let files: FileMetadata[];
    try {
      files = await this.listFiles(kbId);
    } catch (error) {
      if (error instanceof NotFoundError) {
        throw new NotFoundError(`Knowledge Base ${kbId}`);
      }
      throw error;
    }

    if (files.length === 0) {
      log.info(`No files found in knowledge base '${kbId}'. Nothing to delete.`);
      return { successful: 0, failed: 0 };
    }

    const results = await Promise.allSettled(files.map((file) => this.deleteFile(file.id)));
    const summary: DeletionSummary = { successful: 0, failed: 0 };
    results.forEach((result, i) => {
      if (result.status === 'fulfilled') {
        summary.successful += 1;
      } else {
        log.warn(`Failed to delete file '${files[i]?.id ?? '?'}': ${errorMessage(result.reason)}`);
        summary.failed += 1;
      }
    });

    log.info(`Deleted files from KB '${kbId}'. Successful: ${summary.successful}, Failed: ${summary.failed}.`);
    return summary;
  }

  private async uploadOne(filePath: string): Promise<UploadedFile> {
    const filename = basename(filePath);
    const bytes = await readFile(filePath);
    const mimeType = lookup(filePath) || 'application/octet-stream';

    const form = new FormData();
    form.append('file', new Blob([bytes], { type: mimeType }), filename);

    const resource = `file upload: ${filename}`;
    const data = await this.http.postForm('/api/v1/files/', form, resource);
    return parseBody(uploadedFileSchema, data, resource);
  }

  private async attachFiles(kbId: string, fileIds: string[]): Promise<void> {
    await this.http.post(
      `/api/v1/knowledge/${encodeURIComponent(kbId)}/files/batch/add`,
      fileIds.map((fileId) => ({ file_id: fileId })),
      `file association with KB ${kbId}`
    );
  }
}
