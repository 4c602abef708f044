import escapeHtml from 'escape-html';
import { commentBody, flattenDocComment, noComments, type CommentProvider } from './comments.js';
import type { OptionField } from './model.js';
import type { Options } from './options.js';

export type DocFormat = 'html' | 'jsdoc';

export const DOC_FORMATS: readonly DocFormat[] = ['html', 'jsdoc'];

/** Other names accepted for a format on the command line and in config files. */
const FORMAT_ALIASES: ReadonlyMap<string, DocFormat> = new Map<string, DocFormat>([['javadoc', 'jsdoc']]);

/** Every accepted format name, aliases included. */
export const DOC_FORMAT_NAMES: readonly string[] = [...DOC_FORMATS, ...FORMAT_ALIASES.keys()];

export interface RenderOptions {
  format?: DocFormat;
  /** Nest options under their group titles; ignored when no groups are declared. */
  grouping?: boolean;
  /** `'all'` also documents unpublicized options. */
  visibility?: 'public' | 'all';
  /** Prepend the first holder's own comment. */
  classDoc?: boolean;
  comments?: CommentProvider;
  /** Indentation before `* ` in the jsdoc format. */
  padding?: number;
}

const EOL = '\n';

export function isDocFormat(value: string): value is DocFormat {
  return DOC_FORMATS.some((format) => format === value);
}

/**
 * The format a name stands for, or undefined for an unknown name.
 */
export function resolveDocFormat(name: string): DocFormat | undefined {
  return isDocFormat(name) ? name : FORMAT_ALIASES.get(name);
}

/**
 * Render the options documentation as an HTML list, or as the body of a
 * documentation comment.
 */
export function renderOptions(options: Options, settings: RenderOptions = {}): string {
  const html = renderHtml(options, settings);
  if (settings.format !== 'jsdoc') {
    return html;
  }
  const indent = ' '.repeat(settings.padding ?? 0);
  return html
    .split(EOL)
    .map((line) => `${indent}* ${line}`)
    .join(EOL);
}

function renderHtml(options: Options, settings: RenderOptions): string {
  const comments = settings.comments ?? noComments;
  const includeAll = settings.visibility === 'all';
  const lines: string[] = [];

  if (settings.classDoc) {
    const first = options.getOptions()[0];
    const classComment = first ? comments.holderComment(first.owner.name) : undefined;
    if (classComment && classComment.trim()) {
      lines.push(flattenDocComment(classComment));
    }
    lines.push('<p>Command line options: </p>');
  }

  const describe = (field: OptionField): string => optionToHtml(field, options.longPrefix(), comments, settings.format);

  lines.push('<ul>');
  if (settings.grouping === false || !options.isUsingGroups()) {
    lines.push(...optionList(options.getOptions(), 2, includeAll, describe));
  } else {
    for (const group of options.getGroups()) {
      if (!includeAll && !group.containsPublicizedOption()) {
        continue;
      }
      lines.push(`  <li>${escapeHtml(group.name)}`);
      lines.push('    <ul>');
      lines.push(...optionList(group.options, 6, includeAll, describe));
      lines.push('    </ul>');
      lines.push('  </li>');
    }
  }
  lines.push('</ul>');

  return lines.join(EOL);
}

function optionList(
  fields: readonly OptionField[],
  padding: number,
  includeAll: boolean,
  describe: (field: OptionField) => string,
): string[] {
  return fields
    .filter((field) => includeAll || !field.unpublicized)
    .map((field) => `${' '.repeat(padding)}<li>${describe(field)}</li>`);
}

/**
 * The HTML line describing one option, e.g.
 * `<b>-n</b> <b>--max-count=</b><i>integer</i>. Stop early [default 10]`.
 */
export function optionToHtml(
  field: OptionField,
  prefix: string,
  comments: CommentProvider = noComments,
  format: DocFormat = 'html',
): string {
  let html = '';
  if (field.shortName !== undefined) {
    html += `<b>-${field.shortName}</b> `;
  }
  for (const alias of field.aliasNames) {
    html += `<b>${alias}</b> `;
  }
  const repeat = field.multiplicity === 'repeatable' ? ' <code>[+]</code>' : '';
  html += `<b>${prefix}${field.longName}=</b><i>${field.typeName}</i>${repeat}. `;

  const defaultText = field.defaultValueText === undefined ? 'no default' : `default ${field.defaultValueText}`;
  html += `${describeField(field, comments, format)} [${escapeHtml(defaultText)}]`;
  return html;
}

/**
 * The source comment when there is one, else the declared description.
 * Declared descriptions are plain text and get escaped.
 */
function describeField(field: OptionField, comments: CommentProvider, format: DocFormat): string {
  const raw = comments.commentFor(field.owner.name, field.fieldName);
  const text = format === 'jsdoc' ? commentBody(raw ?? '') : flattenDocComment(raw ?? '');
  return text ? text : escapeHtml(field.description);
}
