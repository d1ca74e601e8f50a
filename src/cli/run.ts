/**
 * `owui` command dispatch
 *
 * runCli never throws: every failure is reported on stderr and turned into
 * exit code 1.
 */

import { createInterface } from 'node:readline/promises';
import chalk, { Chalk, type ChalkInstance } from 'chalk';
import { OpenWebUIClient } from '../client.js';
import { loadConfig } from '../config.js';
import { errorMessage } from '../errors.js';
import { setLogLevel } from '../logger.js';
import type { RagOptions } from '../types.js';
import { USAGE, UsageError, parseCommandLine, type CliFlags } from './args.js';
import {
  formatChatReply,
  formatChatSummaries,
  formatChunks,
  formatFiles,
  formatFolders,
  formatKnowledgeBases,
  formatMessages,
  formatUploadSummary,
} from './format.js';

export interface CliIO {
  stdout(line: string): void;
  stderr(line: string): void;
  confirm(question: string): Promise<boolean>;
  /** Colour text output */
  color: boolean;
}

export interface CliSession {
  client: OpenWebUIClient;
  defaultModel?: string;
}

export interface CliDeps {
  io?: Partial<CliIO>;
  /** Builds the client on first use; defaults to loading the user's configuration */
  connect?: () => CliSession;
}

interface CommandContext {
  args: string[];
  flags: CliFlags;
  io: CliIO;
  paint: ChalkInstance;
  session(): CliSession;
  /** Print `result` as JSON, or the lines of `text` in text mode */
  print(result: unknown, text: () => string[]): void;
}

type Handler = (ctx: CommandContext) => Promise<number | void>;

async function askOnTerminal(question: string): Promise<boolean> {
  const rl = createInterface({ input: process.stdin, output: process.stderr });
  try {
    const answer = await rl.question(`${question} [y/N] `);
    return /^y(es)?$/i.test(answer.trim());
  } finally {
    rl.close();
  }
}

const defaultIO: CliIO = {
  stdout: (line) => {
    process.stdout.write(`${line}\n`);
  },
  stderr: (line) => {
    process.stderr.write(`${line}\n`);
  },
  confirm: askOnTerminal,
  color: chalk.level > 0,
};

function connectFromConfig(): CliSession {
  const config = loadConfig();
  return {
    client: new OpenWebUIClient({ baseUrl: config.serverUrl, apiKey: config.apiKey, timeout: config.timeout }),
    defaultModel: config.defaultModel,
  };
}

function arg(ctx: CommandContext, index: number, name: string): string {
  const value = ctx.args[index];
  if (value === undefined) {
    throw new UsageError(`Missing argument <${name}>.`);
  }
  return value;
}

function noMoreArgs(ctx: CommandContext, count: number): void {
  const extra = ctx.args[count];
  if (extra !== undefined) {
    throw new UsageError(`Unexpected argument '${extra}'.`);
  }
}

function requireKbId(ctx: CommandContext): string {
  const [kbId, ...rest] = ctx.flags.kbIds;
  if (kbId === undefined) {
    throw new UsageError('--kb-id is required.');
  }
  if (rest.length > 0) {
    throw new UsageError('Only one --kb-id may be given for this command.');
  }
  return kbId;
}

function ragOptions(flags: CliFlags): RagOptions {
  return { ...flags.retrieval, kbIds: flags.kbIds.length > 0 ? flags.kbIds : undefined };
}

/**
 * Destructive commands ask first in text mode unless --yes was given.
 */
async function confirmed(ctx: CommandContext, question: string): Promise<boolean> {
  if (ctx.flags.yes || ctx.flags.output === 'json') {
    return true;
  }
  if (await ctx.io.confirm(question)) {
    return true;
  }
  ctx.io.stderr('Aborted.');
  return false;
}

const chatCommands: Record<string, Handler> = {
  async create(ctx) {
    const prompt = arg(ctx, 0, 'prompt');
    noMoreArgs(ctx, 1);
    const { client, defaultModel } = ctx.session();
    const model = ctx.flags.model ?? defaultModel;
    if (!model) {
      throw new UsageError("No model given. Pass --model or set OPENWEBUI_MODEL or 'defaults.model'.");
    }
    const chat = await client.chats.create(model, prompt, {
      ...ragOptions(ctx.flags),
      folderId: ctx.flags.folderId,
      title: ctx.flags.title,
    });
    ctx.print(chat, () => formatChatReply(ctx.paint, chat));
  },

  async continue(ctx) {
    const chatId = arg(ctx, 0, 'chatId');
    const prompt = arg(ctx, 1, 'prompt');
    noMoreArgs(ctx, 2);
    const chat = await ctx.session().client.chats.continueChat(chatId, prompt, {
      ...ragOptions(ctx.flags),
      model: ctx.flags.model,
    });
    ctx.print(chat, () => formatChatReply(ctx.paint, chat));
  },

  async list(ctx) {
    noMoreArgs(ctx, 1);
    const chatId = ctx.args[0];
    const { client } = ctx.session();
    if (chatId === undefined) {
      const chats = await client.chats.list();
      ctx.print(chats, () => formatChatSummaries(ctx.paint, chats));
      return;
    }
    const chat = await client.chats.get(chatId);
    ctx.print(chat.chat.messages ?? [], () => formatMessages(ctx.paint, chat));
  },

  async rename(ctx) {
    const chatId = arg(ctx, 0, 'chatId');
    const title = arg(ctx, 1, 'title');
    noMoreArgs(ctx, 2);
    const chat = await ctx.session().client.chats.rename(chatId, title);
    ctx.print(chat, () => [`Renamed chat ${chat.id} to '${chat.title}'.`]);
  },

  async move(ctx) {
    const chatId = arg(ctx, 0, 'chatId');
    const folderId = arg(ctx, 1, 'folderId');
    noMoreArgs(ctx, 2);
    const chat = await ctx.session().client.chats.moveToFolder(chatId, folderId);
    ctx.print(chat, () => [`Moved chat ${chat.id} to folder ${folderId}.`]);
  },

  async delete(ctx) {
    const chatId = arg(ctx, 0, 'chatId');
    noMoreArgs(ctx, 1);
    if (!(await confirmed(ctx, `Delete chat ${chatId}?`))) {
      return;
    }
    const result = await ctx.session().client.chats.delete(chatId);
    ctx.print(result, () => [`Deleted chat ${chatId}.`]);
  },
};

const folderCommands: Record<string, Handler> = {
  async create(ctx) {
    const name = arg(ctx, 0, 'name');
    noMoreArgs(ctx, 1);
    const folder = await ctx.session().client.folders.create(name);
    ctx.print(folder, () => [`Created folder '${folder.name}' (${folder.id}).`]);
  },

  async list(ctx) {
    noMoreArgs(ctx, 0);
    const folders = await ctx.session().client.folders.list();
    ctx.print(folders, () => formatFolders(ctx.paint, folders));
  },

  async 'list-chats'(ctx) {
    const folderId = arg(ctx, 0, 'folderId');
    noMoreArgs(ctx, 1);
    const chats = await ctx.session().client.chats.listByFolder(folderId);
    ctx.print(chats, () => formatChatSummaries(ctx.paint, chats));
  },

  async rename(ctx) {
    const folderId = arg(ctx, 0, 'folderId');
    const name = arg(ctx, 1, 'name');
    noMoreArgs(ctx, 2);
    const folder = await ctx.session().client.folders.rename(folderId, name);
    ctx.print(folder, () => [`Renamed folder ${folder.id} to '${folder.name}'.`]);
  },

  async delete(ctx) {
    const folderId = arg(ctx, 0, 'folderId');
    noMoreArgs(ctx, 1);
    if (!(await confirmed(ctx, `Delete folder ${folderId}?`))) {
      return;
    }
    const result = await ctx.session().client.folders.delete(folderId);
    ctx.print(result, () => [`Deleted folder ${folderId}.`]);
  },
};

const kbCommands: Record<string, Handler> = {
  async create(ctx) {
    const name = arg(ctx, 0, 'name');
    noMoreArgs(ctx, 1);
    const kb = await ctx.session().client.knowledge.create(name, ctx.flags.description);
    ctx.print(kb, () => [`Created knowledge base '${kb.name}' (${kb.id}).`]);
  },

  async list(ctx) {
    noMoreArgs(ctx, 0);
    const kbs = await ctx.session().client.knowledge.listAll();
    ctx.print(kbs, () => formatKnowledgeBases(ctx.paint, kbs));
  },

  async 'list-files'(ctx) {
    const kbId = arg(ctx, 0, 'kbId');
    noMoreArgs(ctx, 1);
    const files = await ctx.session().client.knowledge.listFiles(kbId);
    ctx.print(files, () => formatFiles(ctx.paint, files));
  },

  async delete(ctx) {
    const kbId = arg(ctx, 0, 'kbId');
    noMoreArgs(ctx, 1);
    if (!(await confirmed(ctx, `Delete knowledge base ${kbId}?`))) {
      return;
    }
    const result = await ctx.session().client.knowledge.delete(kbId);
    ctx.print(result, () => [`Deleted knowledge base ${kbId}.`]);
  },

  async query(ctx) {
    const text = arg(ctx, 0, 'text');
    noMoreArgs(ctx, 1);
    if (ctx.flags.kbIds.length === 0) {
      throw new UsageError('--kb-id is required.');
    }
    const chunks = await ctx.session().client.knowledge.query(text, ctx.flags.kbIds, ctx.flags.retrieval);
    ctx.print(chunks, () => formatChunks(ctx.paint, chunks));
  },

  async 'upload-file'(ctx) {
    const filePath = arg(ctx, 0, 'path');
    noMoreArgs(ctx, 1);
    const kbId = requireKbId(ctx);
    const file = await ctx.session().client.knowledge.uploadFile(filePath, kbId);
    ctx.print(file, () => [`Uploaded '${file.filename}' (${file.id}).`]);
  },

  async 'upload-dir'(ctx) {
    const dir = arg(ctx, 0, 'dir');
    noMoreArgs(ctx, 1);
    const kbId = requireKbId(ctx);
    const result = await ctx.session().client.knowledge.uploadDirectory(dir, kbId, {
      ignoreFile: ctx.flags.ignoreFile,
      onProgress:
        ctx.flags.output === 'text'
          ? (done, total) => ctx.io.stderr(ctx.paint.dim(`  ${done}/${total} uploaded`))
          : undefined,
    });
    ctx.print(result, () => formatUploadSummary(ctx.paint, result));
  },

  async 'update-file'(ctx) {
    const fileId = arg(ctx, 0, 'fileId');
    const filePath = arg(ctx, 1, 'path');
    noMoreArgs(ctx, 2);
    const kbId = ctx.flags.kbIds.length > 0 ? requireKbId(ctx) : undefined;
    const file = await ctx.session().client.knowledge.updateFile(fileId, filePath, kbId);
    ctx.print(file, () => [`Updated file ${file.id}.`]);
  },

  async 'delete-file'(ctx) {
    const fileId = arg(ctx, 0, 'fileId');
    noMoreArgs(ctx, 1);
    if (!(await confirmed(ctx, `Delete file ${fileId}?`))) {
      return;
    }
    const result = await ctx.session().client.knowledge.deleteFile(fileId);
    ctx.print(result, () => [`Deleted file ${fileId}.`]);
  },

  async 'delete-all-files'(ctx) {
    const kbId = arg(ctx, 0, 'kbId');
    noMoreArgs(ctx, 1);
    if (!(await confirmed(ctx, `Delete every file in knowledge base ${kbId}?`))) {
      return;
    }
    const summary = await ctx.session().client.knowledge.deleteAllFiles(kbId);
    ctx.print(summary, () => [`Deleted ${summary.successful} files (${summary.failed} failed).`]);
    return summary.failed > 0 ? 1 : 0;
  },
};

const COMMANDS: Record<string, Record<string, Handler>> = {
  chat: chatCommands,
  folder: folderCommands,
  kb: kbCommands,
};

function findHandler(group: string, action: string | undefined): Handler {
  const handlers = COMMANDS[group];
  if (!handlers) {
    throw new UsageError(`Unknown command '${group}'. Run 'owui --help' for usage.`);
  }
  const handler = action === undefined ? undefined : handlers[action];
  if (!handler) {
    const known = Object.keys(handlers).join(', ');
    throw new UsageError(
      action === undefined
        ? `Missing action for '${group}'. Expected one of: ${known}.`
        : `Unknown action '${group} ${action}'. Expected one of: ${known}.`
    );
  }
  return handler;
}

/**
 * Runs one `owui` invocation and resolves to its exit code.
 */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const io: CliIO = { ...defaultIO, ...deps.io };
  const paint = new Chalk({ level: io.color ? chalk.level || 1 : 0 });

  try {
    const { group, action, args, flags } = parseCommandLine(argv);

    if (flags.debug) {
      setLogLevel('debug');
    } else if (flags.verbose) {
      setLogLevel('info');
    }

    if (flags.help) {
      io.stdout(USAGE);
      return 0;
    }
    if (group === undefined) {
      io.stderr(USAGE);
      return 1;
    }

    const handler = findHandler(group, action);
    const connect = deps.connect ?? connectFromConfig;
    let session: CliSession | undefined;

    const ctx: CommandContext = {
      args,
      flags,
      io,
      paint,
      session: () => (session ??= connect()),
      print: (result, text) => {
        if (flags.output === 'json') {
          io.stdout(JSON.stringify(result, null, 2));
        } else {
          text().forEach((line) => io.stdout(line));
        }
      },
    };

    const code = await handler(ctx);
    return typeof code === 'number' ? code : 0;
  } catch (error) {
    io.stderr(`${paint.red('Error:')} ${errorMessage(error)}`);
    return 1;
  }
}
