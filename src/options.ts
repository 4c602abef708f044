import { coerce, customTypesOf, defaultCoercers, type CoercerRegistry } from './coerce.js';
import { CoercionError, DeclarationError, ParseError } from './errors.js';
import {
  OptionGroup,
  formatValue,
  type OptionDeclaration,
  type OptionField,
  type OptionSource,
} from './model.js';

export type RepeatPolicy = 'overwrite' | 'reject';

export interface OptionsSettings {
  /** Long options are written `-name` instead of `--name`. */
  useSingleDash?: boolean;
  /** What happens when a single-valued option is given more than once. */
  repeats?: RepeatPolicy;
  /** Replaces underscores and camelCase word breaks in long names. */
  wordSeparator?: string;
  coercers?: CoercerRegistry;
}

/** One option occurrence found by `scan`, not yet coerced. */
export interface Occurrence {
  readonly option: OptionField;
  /** The option as it was spelled, without any `=value`. */
  readonly spelling: string;
  readonly text: string;
}

export interface ScanResult {
  readonly occurrences: Occurrence[];
  readonly remaining: string[];
}

const TERMINATOR = '--';

/**
 * Registry of the options declared by one or more configuration holders.
 * Parsing writes values back into the holders' configuration objects.
 */
export class Options {
  private readonly fields: OptionField[] = [];
  private readonly groups: OptionGroup[] = [];
  private readonly byLongName = new Map<string, OptionField>();
  private readonly byShortName = new Map<string, OptionField>();
  private readonly byAlias = new Map<string, OptionField>();
  private readonly usingGroups: boolean;
  private useSingleDash: boolean;
  private readonly repeats: RepeatPolicy;
  private readonly wordSeparator: string;
  private readonly coercers: CoercerRegistry;

  constructor(sources: readonly OptionSource[], settings: OptionsSettings = {}) {
    this.useSingleDash = settings.useSingleDash ?? false;
    this.repeats = settings.repeats ?? 'overwrite';
    this.wordSeparator = settings.wordSeparator ?? '-';
    this.coercers = settings.coercers ?? defaultCoercers;

    for (const source of sources) {
      let current: OptionGroup | undefined;
      for (const declaration of source.declarations()) {
        if (declaration.group) {
          current = this.addGroup(source, declaration);
        }
        const field = this.bind(source, declaration, current);
        current?.options.push(field);
      }
    }

    this.usingGroups = this.groups.length > 0;
    if (this.usingGroups) {
      const ungrouped = this.fields.find((field) => field.groupName === undefined);
      if (ungrouped) {
        throw new DeclarationError(
          'UNGROUPED_OPTION',
          `Option ${ungrouped.owner.name}.${ungrouped.fieldName} is not in a group; once groups are used every option must belong to one`,
          { holder: ungrouped.owner.name, field: ungrouped.fieldName },
        );
      }
    }
  }

  getOptions(): readonly OptionField[] {
    return this.fields;
  }

  getGroups(): readonly OptionGroup[] {
    return this.groups;
  }

  isUsingGroups(): boolean {
    return this.usingGroups;
  }

  isUsingSingleDash(): boolean {
    return this.useSingleDash;
  }

  setUseSingleDash(value: boolean): void {
    this.useSingleDash = value;
  }

  /** Prefix of long options in the current dash mode. */
  longPrefix(): string {
    return this.useSingleDash ? '-' : '--';
  }

  /**
   * Resolve an option spelling such as `--max-count`, `-n` or an alias.
   */
  find(spelling: string): OptionField | undefined {
    const alias = this.byAlias.get(spelling);
    if (alias) {
      return alias;
    }
    if (spelling.startsWith('--')) {
      return this.byLongName.get(this.normalize(spelling.slice(2)));
    }
    if (!spelling.startsWith('-')) {
      return undefined;
    }
    const name = spelling.slice(1);
    const short = name.length === 1 ? this.byShortName.get(name) : undefined;
    if (short) {
      return short;
    }
    return this.useSingleDash ? this.byLongName.get(this.normalize(name)) : undefined;
  }

  /**
   * Split an argument vector into option occurrences and non-option arguments.
   * Scanning stops at `--` (which is dropped) or at the first non-option token.
   */
  scan(args: readonly string[]): ScanResult {
    const occurrences: Occurrence[] = [];
    const seen = new Set<OptionField>();
    let index = 0;

    while (index < args.length) {
      const token = args[index];
      if (token === undefined || !isOptionToken(token)) {
        break;
      }
      index++;
      if (token === TERMINATOR) {
        break;
      }

      const equals = token.indexOf('=');
      const spelling = equals === -1 ? token : token.slice(0, equals);
      const inline = equals === -1 ? undefined : token.slice(equals + 1);

      const option = this.find(spelling);
      if (!option) {
        throw new ParseError('UNKNOWN_OPTION', token, `Unknown option: ${token}`);
      }

      let text = inline;
      if (text === undefined) {
        if (option.type.kind === 'boolean') {
          text = 'true';
        } else {
          text = args[index];
          if (text === undefined) {
            throw new ParseError('MISSING_VALUE', token, `Option ${spelling} requires an argument`);
          }
          index++;
        }
      }

      if (option.multiplicity === 'single' && seen.has(option) && this.repeats === 'reject') {
        throw new ParseError('REPEATED_OPTION', token, `Option ${spelling} specified more than once`);
      }
      seen.add(option);
      occurrences.push({ option, spelling, text });
    }

    return { occurrences, remaining: args.slice(index) };
  }

  /**
   * Coerce each occurrence and write it to its holder, in order.
   * An error leaves the earlier occurrences applied.
   */
  apply(occurrences: readonly Occurrence[]): void {
    for (const { option, spelling, text } of occurrences) {
      try {
        option.declaration.write(coerce(text, option.type, this.coercers));
      } catch (error) {
        if (error instanceof CoercionError) {
          throw new ParseError('INVALID_VALUE', spelling, `Option ${spelling}: ${error.message}`, error);
        }
        throw error;
      }
    }
  }

  /**
   * Parse an argument vector into the holders' fields.
   * Returns the non-option arguments in their original order.
   */
  parse(args: readonly string[]): string[] {
    const { occurrences, remaining } = this.scan(args);
    this.apply(occurrences);
    return remaining;
  }

  /**
   * Like `parse`, but a parse error is reported on stderr together with the
   * usage text, the exit code is set, and null is returned.
   */
  parseOrUsage(args: readonly string[]): string[] | null {
    try {
      return this.parse(args);
    } catch (error) {
      if (!(error instanceof ParseError)) {
        throw error;
      }
      process.stderr.write(`${error.message}\n${this.usage()}`);
      process.exitCode = 1;
      return null;
    }
  }

  /**
   * Plain-text help for the publicized options. Named groups are listed even
   * when they are unpublicized.
   */
  usage(...groupNames: string[]): string {
    if (!this.usingGroups) {
      return formatUsageLines(this.fields.filter((field) => !field.unpublicized), this.longPrefix());
    }

    const selected = groupNames.length > 0
      ? groupNames.map((name) => {
        const group = this.groups.find((candidate) => candidate.name === name);
        if (!group) {
          throw new DeclarationError('UNKNOWN_GROUP', `Unknown option group: ${name}`, { group: name });
        }
        return group;
      })
      : this.groups.filter((group) => !group.unpublicized && group.containsPublicizedOption());

    return selected
      .map((group) => {
        const visible = group.options.filter((field) => !field.unpublicized);
        return `${group.name}:\n${formatUsageLines(visible, this.longPrefix())}`;
      })
      .join('\n');
  }

  /**
   * Current value of every option, one `name = value` line each.
   */
  settings(): string {
    const width = Math.max(0, ...this.fields.map((field) => field.longName.length));
    return this.fields
      .map((field) => `${field.longName.padEnd(width)} = ${formatValue(field.declaration.read()) ?? ''}`.trimEnd() + '\n')
      .join('');
  }

  private addGroup(source: OptionSource, declaration: OptionDeclaration): OptionGroup {
    const marker = declaration.group;
    if (!marker) {
      throw new DeclarationError('DANGLING_GROUP', `No group marker on ${source.name}.${declaration.field}`);
    }
    if (this.groups.some((group) => group.name === marker.title)) {
      throw new DeclarationError('DUPLICATE_NAME', `Duplicate option group: ${marker.title}`, {
        holder: source.name,
        group: marker.title,
      });
    }
    const group = new OptionGroup(marker.title, marker.unpublicized);
    this.groups.push(group);
    return group;
  }

  private bind(source: OptionSource, declaration: OptionDeclaration, group: OptionGroup | undefined): OptionField {
    const where = `${source.name}.${declaration.field}`;
    const longName = this.longNameOf(declaration.field);

    for (const custom of customTypesOf(declaration.type)) {
      if (!this.coercers.has(custom.type)) {
        throw new DeclarationError('NO_COERCER', `No coercer registered for type ${custom.name} of ${where}`, {
          holder: source.name,
          field: declaration.field,
          type: custom.name,
        });
      }
    }

    const field: OptionField = {
      longName,
      shortName: declaration.short,
      aliasNames: declaration.aliases,
      type: declaration.type,
      typeName: declaration.typeName,
      multiplicity: declaration.repeatable ? 'repeatable' : 'single',
      defaultValueText: formatValue(declaration.read()),
      description: declaration.description,
      unpublicized: declaration.unpublicized,
      groupName: group?.name,
      owner: source,
      fieldName: declaration.field,
      declaration,
    };

    const existing = this.byLongName.get(longName) ?? this.aliasSpelling(longName);
    if (existing) {
      throw duplicate(`--${longName}`, where, existing);
    }
    this.byLongName.set(longName, field);

    if (declaration.short !== undefined) {
      if (declaration.short.length !== 1 || declaration.short === '-') {
        throw new DeclarationError('INVALID_NAME', `Short name of ${where} must be a single character other than "-"`, {
          holder: source.name,
          field: declaration.field,
          short: declaration.short,
        });
      }
      const taken = this.byShortName.get(declaration.short) ?? this.byAlias.get(`-${declaration.short}`);
      if (taken) {
        throw duplicate(`-${declaration.short}`, where, taken);
      }
      this.byShortName.set(declaration.short, field);
    }

    for (const alias of declaration.aliases) {
      if (!alias.startsWith('-') || alias === '-' || alias === TERMINATOR || alias.includes('=')) {
        throw new DeclarationError('INVALID_NAME', `Alias "${alias}" of ${where} must start with "-"`, {
          holder: source.name,
          field: declaration.field,
          alias,
        });
      }
      const taken = this.byAlias.get(alias) ?? this.find(alias);
      if (taken) {
        throw duplicate(alias, where, taken);
      }
      this.byAlias.set(alias, field);
    }

    this.fields.push(field);
    return field;
  }

  /** The option owning an alias that is some spelling of `--longName`. */
  private aliasSpelling(longName: string): OptionField | undefined {
    for (const [alias, field] of this.byAlias) {
      if (alias.startsWith('--') && this.normalize(alias.slice(2)) === longName) {
        return field;
      }
    }
    return undefined;
  }

  private longNameOf(field: string): string {
    return field
      .replace(/([a-z0-9])([A-Z])/g, `$1${this.wordSeparator}$2`)
      .replace(/_/g, this.wordSeparator)
      .toLowerCase();
  }

  private normalize(name: string): string {
    return name.replace(/[-_]/g, this.wordSeparator);
  }
}

function isOptionToken(token: string): boolean {
  return token.startsWith('-') && token !== '-';
}

function duplicate(spelling: string, where: string, existing: OptionField): DeclarationError {
  return new DeclarationError(
    'DUPLICATE_NAME',
    `Option name ${spelling} of ${where} is already used by ${existing.owner.name}.${existing.fieldName}`,
    { spelling, field: where },
  );
}

function synopsis(field: OptionField, prefix: string): string {
  const parts: string[] = [];
  if (field.shortName !== undefined) {
    parts.push(`-${field.shortName}`);
  }
  parts.push(...field.aliasNames);
  const repeat = field.multiplicity === 'repeatable' ? ' [+]' : '';
  parts.push(`${prefix}${field.longName}=<${field.typeName}>${repeat}`);
  return parts.join(' ');
}

function formatUsageLines(fields: readonly OptionField[], prefix: string): string {
  const synopses = fields.map((field) => synopsis(field, prefix));
  const width = Math.max(0, ...synopses.map((text) => text.length));

  return fields
    .map((field, index) => {
      const defaultText = field.defaultValueText === undefined ? '' : ` [default ${field.defaultValueText}]`;
      const text = `${field.description}${defaultText}`.trim();
      const head = `  ${(synopses[index] ?? '').padEnd(width)}`;
      return (text ? `${head}  - ${text}` : head.trimEnd()) + '\n';
    })
    .join('');
}
