/**
 * Command-line parsing for `owui`
 */

import { parseArgs } from 'node:util';
import type { RetrievalOptions } from '../types.js';

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export type OutputMode = 'text' | 'json';

export interface CliFlags {
  verbose: boolean;
  debug: boolean;
  help: boolean;
  yes: boolean;
  output: OutputMode;
  model?: string;
  folderId?: string;
  title?: string;
  description?: string;
  ignoreFile?: string;
  kbIds: string[];
  retrieval: RetrievalOptions;
}

export interface ParsedCommand {
  group?: string;
  action?: string;
  args: string[];
  flags: CliFlags;
}

const OPTIONS = {
  verbose: { type: 'boolean', short: 'v' },
  debug: { type: 'boolean' },
  help: { type: 'boolean', short: 'h' },
  yes: { type: 'boolean', short: 'y' },
  output: { type: 'string', short: 'o' },
  model: { type: 'string', short: 'm' },
  'folder-id': { type: 'string' },
  title: { type: 'string' },
  description: { type: 'string' },
  'ignore-file': { type: 'string' },
  'kb-id': { type: 'string', multiple: true },
  k: { type: 'string' },
  'k-reranker': { type: 'string' },
  r: { type: 'string' },
  hybrid: { type: 'boolean' },
  'no-hybrid': { type: 'boolean' },
  'hybrid-bm25-weight': { type: 'string' },
} as const;

function parseCount(flag: string, value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const count = Number(value);
  if (!Number.isInteger(count) || count <= 0) {
    throw new UsageError(`--${flag} must be a positive integer, got '${value}'.`);
  }
  return count;
}

function parseFraction(flag: string, value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const fraction = Number(value);
  if (value.trim() === '' || !Number.isFinite(fraction) || fraction < 0 || fraction > 1) {
    throw new UsageError(`--${flag} must be a number between 0 and 1, got '${value}'.`);
  }
  return fraction;
}

function parseOutput(value: string | undefined): OutputMode {
  if (value === undefined || value === 'text' || value === 'json') {
    return value ?? 'text';
  }
  throw new UsageError(`--output must be 'text' or 'json', got '${value}'.`);
}

function parseRaw(argv: string[]) {
  try {
    return parseArgs({ args: argv, options: OPTIONS, allowPositionals: true, strict: true });
  } catch (error) {
    // parseArgs reports unknown options and missing values as TypeErrors
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }
}

export function parseCommandLine(argv: string[]): ParsedCommand {
  const { values, positionals } = parseRaw(argv);

  if (values.hybrid && values['no-hybrid']) {
    throw new UsageError('--hybrid and --no-hybrid cannot be used together.');
  }

  const [group, action, ...args] = positionals;
  return {
    group,
    action,
    args,
    flags: {
      verbose: values.verbose ?? false,
      debug: values.debug ?? false,
      help: values.help ?? false,
      yes: values.yes ?? false,
      output: parseOutput(values.output),
      model: values.model,
      folderId: values['folder-id'],
      title: values.title,
      description: values.description,
      ignoreFile: values['ignore-file'],
      kbIds: values['kb-id'] ?? [],
      retrieval: {
        k: parseCount('k', values.k),
        kReranker: parseCount('k-reranker', values['k-reranker']),
        r: parseFraction('r', values.r),
        hybrid: values.hybrid ? true : values['no-hybrid'] ? false : undefined,
        hybridBm25Weight: parseFraction('hybrid-bm25-weight', values['hybrid-bm25-weight']),
      },
    },
  };
}

export const USAGE = `Usage: owui [options] <command> <action> [arguments]

Chats:
  chat create <prompt>            [--model m] [--folder-id f] [--title t] [rag flags]
  chat continue <chatId> <prompt> [--model m] [rag flags]
  chat list [chatId]              list chats, or the messages of one chat
  chat rename <chatId> <title>
  chat move <chatId> <folderId>
  chat delete <chatId>            [--yes]

Folders:
  folder create <name>
  folder list
  folder list-chats <folderId>
  folder rename <folderId> <name>
  folder delete <folderId>        [--yes]

Knowledge bases:
  kb create <name>                [--description d]
  kb list
  kb list-files <kbId>
  kb delete <kbId>                [--yes]
  kb query <text> --kb-id id      [rag flags]
  kb upload-file <path> --kb-id id
  kb upload-dir <dir> --kb-id id  [--ignore-file f]
  kb update-file <fileId> <path>  [--kb-id id]
  kb delete-file <fileId>         [--yes]
  kb delete-all-files <kbId>      [--yes]

RAG flags:
  --kb-id <id>                    knowledge base to search (repeatable)
  --k <n>                         chunks to retrieve
  --k-reranker <n>                chunks kept after re-ranking
  --r <0-1>                       relevance threshold
  --hybrid, --no-hybrid           toggle hybrid search
  --hybrid-bm25-weight <0-1>      BM25 weight for hybrid search

Options:
  -o, --output <text|json>        output format (default: text)
  -y, --yes                       skip confirmation prompts
  -v, --verbose                   log progress to stderr
      --debug                     log requests to stderr
  -h, --help                      show this help

Configuration comes from OPENWEBUI_URL, OPENWEBUI_API_KEY, OPENWEBUI_TIMEOUT and
OPENWEBUI_MODEL, a .env file, ./.owui/config.yaml or ~/.owui/config.yaml.`;
