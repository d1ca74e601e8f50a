/**
 * .kbignore rules
 *
 * gitignore-style patterns: `#` comments, `!` negation, trailing `/` for
 * directories only, and patterns containing `/` anchored at the upload root.
 * The last matching rule decides. As with git, a file inside an excluded
 * directory stays excluded; `!` cannot re-include it.
 */

import { readFile } from 'node:fs/promises';
import { minimatch } from 'minimatch';

interface IgnoreRule {
  pattern: string;
  negate: boolean;
  dirOnly: boolean;
  anchored: boolean;
}

function parseRule(line: string): IgnoreRule | undefined {
  let pattern = line.trimEnd();
  if (pattern.length === 0 || pattern.startsWith('#')) {
    return undefined;
  }

  const negate = pattern.startsWith('!');
  if (negate) {
    pattern = pattern.slice(1);
  }

  const dirOnly = pattern.endsWith('/');
  if (dirOnly) {
    pattern = pattern.replace(/\/+$/, '');
  }

  const anchored = pattern.includes('/');
  pattern = pattern.replace(/^\/+/, '');

  return pattern.length > 0 ? { pattern, negate, dirOnly, anchored } : undefined;
}

function ruleMatches(rule: IgnoreRule, segments: string[], isDirectory: boolean): boolean {
  if (rule.dirOnly && !isDirectory) {
    return false;
  }
  const target = rule.anchored ? segments.join('/') : segments[segments.length - 1];
  return target !== undefined && minimatch(target, rule.pattern, { dot: true });
}

export class KbIgnore {
  private rules: IgnoreRule[] = [];

  static async fromFile(path: string): Promise<KbIgnore> {
    const parser = new KbIgnore();
    parser.add(await readFile(path, 'utf8'));
    return parser;
  }

  add(patterns: string): this {
    for (const line of patterns.split(/\r?\n/)) {
      const rule = parseRule(line);
      if (rule) {
        this.rules.push(rule);
      }
    }
    return this;
  }

  get size(): number {
    return this.rules.length;
  }

  /**
   * @param relativePath - POSIX path relative to the upload root
   */
  isIgnored(relativePath: string): boolean {
    const segments = relativePath.split('/').filter((s) => s.length > 0);
    for (let depth = 1; depth < segments.length; depth++) {
      if (this.decide(segments.slice(0, depth), true)) {
        return true;
      }
    }
    return this.decide(segments, false);
  }

  private decide(segments: string[], isDirectory: boolean): boolean {
    let ignored = false;
    for (const rule of this.rules) {
      if (ruleMatches(rule, segments, isDirectory)) {
        ignored = !rule.negate;
      }
    }
    return ignored;
  }
}
