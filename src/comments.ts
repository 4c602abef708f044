import fs from 'node:fs';
import path from 'node:path';
import YAML from 'yaml';
import { isRecord } from './guards.js';

/**
 * Source comments for option holders and their fields, as raw comment text.
 * How the text is extracted from source code is up to the implementation.
 */
export interface CommentProvider {
  commentFor(holder: string, field: string): string | undefined;
  holderComment(holder: string): string | undefined;
}

export interface HolderComments {
  comment?: string;
  fields?: Record<string, string>;
}

export class StaticCommentProvider implements CommentProvider {
  constructor(private readonly entries: Record<string, HolderComments>) {}

  commentFor(holder: string, field: string): string | undefined {
    return this.entries[holder]?.fields?.[field];
  }

  holderComment(holder: string): string | undefined {
    return this.entries[holder]?.comment;
  }
}

export const noComments: CommentProvider = new StaticCommentProvider({});

/**
 * Read a YAML or JSON comment file:
 *
 * ```yaml
 * Search:
 *   comment: Looks up entries in the index.
 *   fields:
 *     max_count: Stop after this many matches. @see limit
 * ```
 */
export function loadCommentFile(filePath: string): StaticCommentProvider {
  const content = fs.readFileSync(filePath, 'utf-8');
  const parsed: unknown = path.extname(filePath).toLowerCase() === '.json' ? JSON.parse(content) : YAML.parse(content);
  return new StaticCommentProvider(validateComments(parsed, filePath));
}

function validateComments(data: unknown, source: string): Record<string, HolderComments> {
  if (!isRecord(data)) {
    throw new Error(`Invalid comment file ${source}: expected an object keyed by holder name`);
  }

  const entries: Record<string, HolderComments> = {};
  for (const [holder, value] of Object.entries(data)) {
    if (!isRecord(value)) {
      throw new Error(`Invalid comment file ${source}: entry "${holder}" must be an object`);
    }
    const { comment, fields } = value;
    if (comment !== undefined && typeof comment !== 'string') {
      throw new Error(`Invalid comment file ${source}: "${holder}.comment" must be a string`);
    }

    const fieldComments: Record<string, string> = {};
    if (fields !== undefined) {
      if (!isRecord(fields)) {
        throw new Error(`Invalid comment file ${source}: "${holder}.fields" must be an object`);
      }
      for (const [field, text] of Object.entries(fields)) {
        if (typeof text !== 'string') {
          throw new Error(`Invalid comment file ${source}: "${holder}.fields.${field}" must be a string`);
        }
        fieldComments[field] = text;
      }
    }

    entries[holder] = { comment, fields: fieldComments };
  }
  return entries;
}

export type CommentFragment =
  | { readonly kind: 'text'; readonly text: string }
  | { readonly kind: 'reference'; readonly text: string };

export interface DocComment {
  readonly fragments: CommentFragment[];
  /** Targets of block `@see` tags, in order. */
  readonly see: string[];
}

const INLINE_TAG = /\{@(link|linkcode|linkplain|code)\s+([^}]*)\}/g;
const BLOCK_TAG = /^@(\w+)\s*(.*)$/;

/**
 * The comment text before its first block tag, inline tags left as written.
 */
export function commentBody(raw: string): string {
  return splitBlockTags(raw).body;
}

/**
 * Split raw comment text into inline fragments and `@see` targets.
 * Block tags other than `@see` are dropped.
 */
export function parseDocComment(raw: string): DocComment {
  const { body: text, see } = splitBlockTags(raw);
  const fragments: CommentFragment[] = [];
  let last = 0;
  for (const match of text.matchAll(INLINE_TAG)) {
    const index = match.index ?? 0;
    if (index > last) {
      fragments.push({ kind: 'text', text: text.slice(last, index) });
    }
    fragments.push({ kind: 'reference', text: (match[2] ?? '').trim() });
    last = index + match[0].length;
  }
  if (last < text.length) {
    fragments.push({ kind: 'text', text: text.slice(last) });
  }

  return { fragments, see };
}

function splitBlockTags(raw: string): { body: string; see: string[] } {
  const body: string[] = [];
  const see: string[] = [];
  let inBlock = false;
  let currentSee: string[] | undefined;

  for (const line of raw.split('\n')) {
    const trimmed = line.trim();
    const match = BLOCK_TAG.exec(trimmed);
    if (match) {
      inBlock = true;
      if (currentSee) {
        see.push(currentSee.join(' '));
      }
      currentSee = match[1] === 'see' ? [match[2] ?? ''] : undefined;
      continue;
    }
    if (!inBlock) {
      body.push(line);
    } else if (currentSee && trimmed) {
      currentSee.push(trimmed);
    }
  }
  if (currentSee) {
    see.push(currentSee.join(' '));
  }

  return { body: body.join('\n').trim(), see: see.filter((target) => target.length > 0) };
}

/**
 * Render a comment as HTML, with references shown as code rather than links.
 */
export function flattenDocComment(raw: string): string {
  const doc = parseDocComment(raw);
  let html = doc.fragments
    .map((fragment) => (fragment.kind === 'reference' ? `<code>${fragment.text}</code>` : fragment.text))
    .join('');
  if (doc.see.length > 0) {
    html += ` See: ${doc.see.map((target) => `<code>${target}</code>`).join(', ')}.`;
  }
  return html;
}
