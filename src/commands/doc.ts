import fs from 'node:fs';
import path from 'node:path';
import type { CLIArgs, OptdeclConfig } from '../types.js';
import { types } from '../coerce.js';
import { loadCommentFile, noComments, type CommentProvider } from '../comments.js';
import { DocToolError } from '../errors.js';
import { OptionHolder } from '../holder.js';
import { loadModules } from '../loader.js';
import type { OptionSource } from '../model.js';
import { Options } from '../options.js';
import { DOC_FORMAT_NAMES, renderOptions, resolveDocFormat, type DocFormat } from '../render.js';
import { HTML_MARKERS, commentMarkers, splice } from '../splice.js';
import { writeText } from '../output.js';

export interface DocFlags {
  docfile?: string;
  outfile?: string;
  inPlace: boolean;
  format?: string;
  classdoc: boolean;
  singledash: boolean;
  comments?: string;
  help: boolean;
}

/**
 * Flags of the doc command, declared with the framework itself and parsed in
 * single-dash mode. Giving any flag twice is an error.
 */
export function docFlagOptions(flags: DocFlags): Options {
  const holder = new OptionHolder('DocFlags', flags)
    .option('docfile', types.string, {
      description: 'File into which options documentation is inserted',
    })
    .option('outfile', types.string, { description: 'Destination for resulting output' })
    .option('inPlace', types.boolean, { short: 'i', description: 'Edit the docfile in-place' })
    .option('format', types.string, { description: `Output format: ${DOC_FORMAT_NAMES.join(', ')}` })
    .option('classdoc', types.boolean, { description: "Include the first holder's documentation in output" })
    .option('singledash', types.boolean, { description: 'Use single dashes for long options' })
    .option('comments', types.string, { description: 'YAML or JSON file with holder and field comments' })
    .option('help', types.boolean, { description: 'Show this help' });

  return new Options([holder], { useSingleDash: true, repeats: 'reject' });
}

export function defaultDocFlags(): DocFlags {
  return { inPlace: false, classdoc: false, singledash: false, help: false };
}

export interface DocPlan {
  format: DocFormat;
  docfile?: string;
  /** Where the result goes; undefined means stdout. */
  destination?: string;
  classdoc: boolean;
  singledash: boolean;
  comments?: string;
}

/**
 * Check flag combinations and combine them with the config file.
 * Runs before any file is read or written.
 */
export function planDoc(flags: DocFlags, config: OptdeclConfig, cwd: string = process.cwd()): DocPlan {
  const name = flags.format ?? config.format ?? 'html';
  const format = resolveDocFormat(name);
  if (!format) {
    throw new DocToolError('UNKNOWN_FORMAT', `Unrecognized output format: ${name}`, { format: name });
  }

  const docfile = flags.docfile === undefined ? undefined : path.resolve(cwd, flags.docfile);
  const outfile = flags.outfile === undefined ? undefined : path.resolve(cwd, flags.outfile);

  if (flags.inPlace && outfile !== undefined) {
    throw new DocToolError('CONFLICTING_FLAGS', '-i and -outfile can not be used at the same time');
  }
  if (flags.inPlace && docfile === undefined) {
    throw new DocToolError('CONFLICTING_FLAGS', '-i requires -docfile');
  }
  if (docfile !== undefined && !fs.existsSync(docfile)) {
    throw new DocToolError('FILE_NOT_FOUND', `File not found: ${docfile}`, { file: docfile });
  }
  if (docfile !== undefined && outfile !== undefined && docfile === outfile) {
    throw new DocToolError('CONFLICTING_FLAGS', 'docfile must be different from outfile', { file: docfile });
  }

  const comments = flags.comments === undefined ? config.comments : path.resolve(cwd, flags.comments);

  return {
    format,
    docfile,
    destination: flags.inPlace ? docfile : outfile,
    classdoc: flags.classdoc,
    singledash: flags.singledash || config.singleDash,
    comments,
  };
}

/**
 * Produce the documentation text: the rendered options on their own, or the
 * docfile with the region between its markers replaced.
 */
export function generateDoc(
  plan: DocPlan,
  sources: readonly OptionSource[],
  comments: CommentProvider,
  config: Pick<OptdeclConfig, 'markers'> = {},
  log: (message: string) => void = () => {},
): string {
  const options = new Options(sources, { useSingleDash: plan.singledash });
  if (options.getOptions().length === 0) {
    throw new DocToolError('NO_OPTIONS', 'No options declared by the given holders');
  }

  const render = (padding: number): string =>
    renderOptions(options, { format: plan.format, classDoc: plan.classdoc, comments, padding });

  if (plan.docfile === undefined) {
    return render(0);
  }

  const markers = config.markers ?? HTML_MARKERS;
  const document = fs.readFileSync(plan.docfile, 'utf-8');
  const result = plan.format === 'jsdoc'
    ? splice(document, (startLine) => render(Math.max(0, startLine.indexOf('*'))), commentMarkers(markers))
    : splice(document, render(0), markers);

  if (result.status === 'missing') {
    log(`Warning: start marker not found in ${plan.docfile}; output is unchanged\n`);
  } else if (result.status === 'unterminated') {
    log(`Warning: end marker not found in ${plan.docfile}; documentation inserted after the start marker\n`);
  }
  return result.text;
}

export async function docCommand(args: CLIArgs, config: OptdeclConfig): Promise<void> {
  const flags = defaultDocFlags();
  const parser = docFlagOptions(flags);
  const modules = parser.parse(args.positional);

  if (flags.help) {
    process.stdout.write(`Usage: optdecl doc [flags] <module...>\n\n${parser.usage()}`);
    return;
  }

  const plan = planDoc(flags, config);
  const sources = await loadModules(modules, config, args.verbose);
  if (args.verbose) {
    process.stderr.write(`Loaded ${sources.length} option holder(s)\n`);
  }

  const comments = plan.comments ? loadCommentFile(plan.comments) : noComments;
  const log = (message: string): void => {
    if (!args.quiet) {
      process.stderr.write(message);
    }
  };

  const output = generateDoc(plan, sources, comments, config, log);
  writeText(output, plan.destination);

  if (args.verbose && plan.destination) {
    process.stderr.write(`Wrote ${plan.destination}\n`);
  }
}
