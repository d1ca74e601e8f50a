import type { RetrievedChunk } from './types.js';

const SOURCE_KEYS = ['name', 'source', 'file'] as const;

/**
 * The first non-empty `name`, `source` or `file` entry of a chunk's metadata.
 */
export function chunkSource(meta: Record<string, unknown>): string | undefined {
  for (const key of SOURCE_KEYS) {
    const value = meta[key];
    if (typeof value === 'string' && value.length > 0) {
      return value;
    }
  }
  return undefined;
}

/**
 * Wraps a prompt with retrieved knowledge-base text.
 *
 * Returns the prompt unchanged when no chunk carries any text.
 */
export function buildAugmentedPrompt(prompt: string, chunks: RetrievedChunk[]): string {
  const blocks = chunks
    .map((chunk) => ({ text: chunk.content.trim(), source: chunkSource(chunk.meta) }))
    .filter((block) => block.text.length > 0)
    .map((block, i) => (block.source ? `[${i + 1}] (${block.source}) ${block.text}` : `[${i + 1}] ${block.text}`));

  if (blocks.length === 0) {
    return prompt;
  }

  return [
    'Use the following context to answer the question.',
    '',
    'Context:',
    blocks.join('\n\n'),
    '',
    `Question: ${prompt}`,
  ].join('\n');
}
