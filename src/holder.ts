import { CoercionError, DeclarationError } from './errors.js';
import { types, type TypeDescriptor, type ValueType } from './coerce.js';
import type { GroupMarker, OptionDeclaration, OptionSource } from './model.js';

export interface OptionSettings {
  /** Single-character alias, used as `-x`. */
  short?: string;
  /** Extra spellings accepted verbatim, e.g. `--count`. */
  aliases?: readonly string[];
  description?: string;
  /** Parseable but left out of usage text and generated documentation. */
  unpublicized?: boolean;
  /** Overrides the separator of a list-typed value. */
  separator?: string;
}

export interface GroupSettings {
  unpublicized?: boolean;
}

type ListKey<T> = keyof T & string & { [K in keyof T]-?: T[K] extends unknown[] ? K : never }[keyof T];
type ElementOf<A> = A extends (infer E)[] ? E : never;

/**
 * Registers the options of one configuration object.
 *
 * ```ts
 * const config = { verbose: false, max_count: 10, tags: [] as string[] };
 * const holder = new OptionHolder('Search', config)
 *   .group('Output')
 *   .option('verbose', types.boolean, { short: 'v', description: 'Print progress' })
 *   .option('max_count', types.integer, { description: 'Stop after this many matches' })
 *   .list('tags', types.string, { description: 'Only entries with this tag' });
 * ```
 */
export class OptionHolder<T extends object> implements OptionSource {
  private readonly entries: OptionDeclaration[] = [];
  private pendingGroup: GroupMarker | undefined;

  constructor(
    readonly name: string,
    readonly target: T,
  ) {}

  /**
   * Start a group; it attaches to the option declared next.
   */
  group(title: string, settings: GroupSettings = {}): this {
    if (this.pendingGroup) {
      throw new DeclarationError(
        'DANGLING_GROUP',
        `Group "${this.pendingGroup.title}" in ${this.name} is not attached to an option`,
        { holder: this.name, group: this.pendingGroup.title },
      );
    }
    this.pendingGroup = { title, unpublicized: settings.unpublicized ?? false };
    return this;
  }

  /**
   * Declare a single-valued option. A later occurrence replaces an earlier one.
   */
  option<K extends keyof T & string>(field: K, type: ValueType<T[K]>, settings: OptionSettings = {}): this {
    const effective = withSeparator(type, settings.separator);
    return this.add(field, effective.descriptor, type.name, false, settings, {
      read: () => this.target[field],
      write: (value) => {
        if (!type.is(value)) {
          throw mismatch(this.name, field, type.name, value);
        }
        this.target[field] = value;
      },
    });
  }

  /**
   * Declare a repeatable option whose occurrences are appended to an array field.
   * With a `separator`, each occurrence is also split into several elements.
   */
  list<K extends ListKey<T>>(field: K, element: ValueType<ElementOf<T[K]>>, settings: OptionSettings = {}): this {
    if (!Array.isArray(this.target[field])) {
      throw new DeclarationError(
        'UNBOUND_LIST',
        `${this.name}.${field} must be initialized to an array to collect repeated values`,
        { holder: this.name, field },
      );
    }
    const separator = settings.separator;
    const perOccurrence = separator === undefined ? element.descriptor : types.list(element, separator).descriptor;

    return this.add(field, perOccurrence, element.name, true, settings, {
      read: () => this.target[field],
      write: (value) => {
        const items: unknown[] = separator !== undefined && Array.isArray(value) ? value : [value];
        for (const item of items) {
          if (!element.is(item)) {
            throw mismatch(this.name, field, element.name, item);
          }
        }
        const backing: unknown = this.target[field];
        if (Array.isArray(backing)) {
          backing.push(...items);
        }
      },
    });
  }

  declarations(): readonly OptionDeclaration[] {
    if (this.pendingGroup) {
      throw new DeclarationError(
        'DANGLING_GROUP',
        `Group "${this.pendingGroup.title}" in ${this.name} is not attached to an option`,
        { holder: this.name, group: this.pendingGroup.title },
      );
    }
    return this.entries;
  }

  private add(
    field: string,
    type: TypeDescriptor,
    typeName: string,
    repeatable: boolean,
    settings: OptionSettings,
    access: Pick<OptionDeclaration, 'read' | 'write'>,
  ): this {
    const group = this.pendingGroup;
    this.pendingGroup = undefined;

    this.entries.push({
      field,
      type,
      typeName,
      repeatable,
      short: settings.short,
      aliases: settings.aliases ?? [],
      description: settings.description ?? '',
      unpublicized: settings.unpublicized ?? false,
      group,
      read: access.read,
      write: access.write,
    });
    return this;
  }
}

function withSeparator<V>(type: ValueType<V>, separator: string | undefined): ValueType<V> {
  if (separator === undefined || type.descriptor.kind !== 'list') {
    return type;
  }
  return { ...type, descriptor: { ...type.descriptor, separator } };
}

function mismatch(holder: string, field: string, expected: string, value: unknown): CoercionError {
  return new CoercionError('TYPE_MISMATCH', `${holder}.${field} expects ${expected}, got ${typeof value}`, {
    holder,
    field,
    expected,
  });
}
