import type { TypeDescriptor } from './coerce.js';

export interface GroupMarker {
  readonly title: string;
  /** Hidden from usage text; still documented. */
  readonly unpublicized: boolean;
}

/**
 * One option as registered by a configuration holder.
 * `read` and `write` go straight to the holder's configuration object.
 */
export interface OptionDeclaration {
  readonly field: string;
  /** Type of the text supplied by a single occurrence. */
  readonly type: TypeDescriptor;
  readonly typeName: string;
  readonly repeatable: boolean;
  readonly short?: string;
  readonly aliases: readonly string[];
  readonly description: string;
  readonly unpublicized: boolean;
  /** Group that starts at this option. */
  readonly group?: GroupMarker;
  read(): unknown;
  write(value: unknown): void;
}

/**
 * A named configuration holder: the declaring type of a set of options.
 */
export interface OptionSource {
  readonly name: string;
  declarations(): readonly OptionDeclaration[];
}

export type Multiplicity = 'single' | 'repeatable';

export interface OptionField {
  readonly longName: string;
  readonly shortName?: string;
  readonly aliasNames: readonly string[];
  readonly type: TypeDescriptor;
  readonly typeName: string;
  readonly multiplicity: Multiplicity;
  /** Initial value rendered as text; absent when the field starts out empty. */
  readonly defaultValueText?: string;
  readonly description: string;
  readonly unpublicized: boolean;
  readonly groupName?: string;
  readonly owner: OptionSource;
  readonly fieldName: string;
  readonly declaration: OptionDeclaration;
}

export class OptionGroup {
  readonly options: OptionField[] = [];

  constructor(
    readonly name: string,
    readonly unpublicized: boolean,
  ) {}

  containsPublicizedOption(): boolean {
    return this.options.some((option) => !option.unpublicized);
  }
}

/**
 * Render a configuration value the way it appears in documentation.
 * Returns undefined for values that mean "nothing set".
 */
export function formatValue(value: unknown): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (Array.isArray(value)) {
    if (value.length === 0) {
      return undefined;
    }
    return `[${value.map((item) => formatValue(item) ?? '').join(', ')}]`;
  }
  if (value instanceof RegExp) {
    return value.source;
  }
  if (value === '') {
    return '""';
  }
  return String(value);
}
