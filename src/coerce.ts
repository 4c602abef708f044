import { CoercionError, errorMessage } from './errors.js';

/** Any class whose instances a custom coercer produces. */
export type Constructor<V> = abstract new (...args: never[]) => V;

export type TypeDescriptor =
  | { readonly kind: 'boolean' }
  | { readonly kind: 'integer' }
  | { readonly kind: 'floating' }
  | { readonly kind: 'string' }
  | { readonly kind: 'enumeration'; readonly name: string; readonly values: readonly string[] }
  | { readonly kind: 'list'; readonly element: TypeDescriptor; readonly separator: string }
  | { readonly kind: 'custom'; readonly name: string; readonly type: Constructor<unknown> };

export type Coercer<V> = (text: string) => V;

/**
 * A type descriptor bound to the TypeScript type of the values it yields.
 * The guard lets parsed values be stored in typed configuration objects.
 */
export interface ValueType<V> {
  readonly descriptor: TypeDescriptor;
  /** Name shown in usage text and generated documentation. */
  readonly name: string;
  is(value: unknown): value is V;
}

export const DEFAULT_LIST_SEPARATOR = ',';

/**
 * Maps custom types to the functions that build them from text.
 */
export class CoercerRegistry {
  private readonly coercers = new Map<Constructor<unknown>, Coercer<unknown>>();

  register<V>(type: Constructor<V>, coercer: Coercer<V>): this {
    this.coercers.set(type, coercer);
    return this;
  }

  /** Register a class whose constructor takes the option text as its only argument. */
  registerConstructor<V>(type: new (text: string) => V): this {
    return this.register(type, (text) => new type(text));
  }

  has(type: Constructor<unknown>): boolean {
    return this.coercers.has(type);
  }

  get(type: Constructor<unknown>): Coercer<unknown> | undefined {
    return this.coercers.get(type);
  }
}

/** A registry preloaded with coercers for `URL` and `RegExp`. */
export function createCoercerRegistry(): CoercerRegistry {
  return new CoercerRegistry()
    .register(URL, (text) => new URL(text))
    .register(RegExp, (text) => new RegExp(text));
}

export const defaultCoercers = createCoercerRegistry();

const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOATING_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const SPECIAL_FLOATING = new Set(['NaN', 'Infinity', '+Infinity', '-Infinity']);

/**
 * Convert option text into a value of the described type.
 * Throws CoercionError naming the text and the expected type.
 */
export function coerce(
  text: string,
  type: TypeDescriptor,
  coercers: CoercerRegistry = defaultCoercers,
): unknown {
  switch (type.kind) {
    case 'boolean': {
      const lowered = text.toLowerCase();
      if (lowered === 'true') return true;
      if (lowered === 'false') return false;
      throw new CoercionError('MALFORMED', `"${text}" is not a valid boolean; expected true or false`, {
        text,
        type: 'boolean',
      });
    }

    case 'integer': {
      if (!INTEGER_PATTERN.test(text)) {
        throw new CoercionError('MALFORMED', `"${text}" is not a valid integer`, { text, type: 'integer' });
      }
      const value = Number(text);
      if (!Number.isSafeInteger(value)) {
        throw new CoercionError('OUT_OF_RANGE', `"${text}" is out of range for integer`, {
          text,
          type: 'integer',
        });
      }
      return value;
    }

    case 'floating': {
      if (SPECIAL_FLOATING.has(text)) {
        return Number(text);
      }
      if (!FLOATING_PATTERN.test(text)) {
        throw new CoercionError('MALFORMED', `"${text}" is not a valid number`, { text, type: 'number' });
      }
      const value = Number(text);
      if (!Number.isFinite(value)) {
        throw new CoercionError('OUT_OF_RANGE', `"${text}" is out of range for number`, { text, type: 'number' });
      }
      return value;
    }

    case 'string':
      return text;

    case 'enumeration':
      if (type.values.includes(text)) {
        return text;
      }
      throw new CoercionError(
        'NOT_ALLOWED',
        `"${text}" is not a valid ${type.name}; expected one of: ${type.values.join(', ')}`,
        { text, type: type.name, values: type.values },
      );

    case 'list':
      if (text === '') {
        return [];
      }
      return text.split(type.separator).map((token) => coerce(token, type.element, coercers));

    case 'custom': {
      const coercer = coercers.get(type.type);
      if (!coercer) {
        throw new CoercionError('NO_COERCER', `No coercer registered for type ${type.name}`, { type: type.name });
      }
      try {
        return coercer(text);
      } catch (error) {
        throw new CoercionError(
          'MALFORMED',
          `"${text}" is not a valid ${type.name}: ${errorMessage(error)}`,
          { text, type: type.name },
          error,
        );
      }
    }
  }
}

/**
 * Custom types a descriptor depends on, including list elements.
 */
export function customTypesOf(type: TypeDescriptor): Array<Extract<TypeDescriptor, { kind: 'custom' }>> {
  if (type.kind === 'custom') return [type];
  if (type.kind === 'list') return customTypesOf(type.element);
  return [];
}

function valueType<V>(descriptor: TypeDescriptor, name: string, is: (value: unknown) => value is V): ValueType<V> {
  return { descriptor, name, is };
}

export const types = {
  boolean: valueType(
    { kind: 'boolean' },
    'boolean',
    (value): value is boolean => typeof value === 'boolean',
  ),

  integer: valueType(
    { kind: 'integer' },
    'integer',
    (value): value is number => typeof value === 'number' && Number.isInteger(value),
  ),

  floating: valueType({ kind: 'floating' }, 'number', (value): value is number => typeof value === 'number'),

  string: valueType({ kind: 'string' }, 'string', (value): value is string => typeof value === 'string'),

  /**
   * A fixed set of string constants, e.g. `types.enumeration('Mode', ['fast', 'safe'] as const)`
   * or `types.enumeration('Level', Object.values(Level))` for a string enum.
   */
  enumeration<E extends string>(name: string, values: readonly E[]): ValueType<E> {
    const allowed: readonly string[] = values;
    return valueType(
      { kind: 'enumeration', name, values },
      name,
      (value): value is E => typeof value === 'string' && allowed.includes(value),
    );
  },

  list<V>(element: ValueType<V>, separator: string = DEFAULT_LIST_SEPARATOR): ValueType<V[]> {
    return valueType(
      { kind: 'list', element: element.descriptor, separator },
      `${element.name}[]`,
      (value): value is V[] => Array.isArray(value) && value.every((item) => element.is(item)),
    );
  },

  custom<V>(type: Constructor<V>, name: string = type.name): ValueType<V> {
    return valueType({ kind: 'custom', name, type }, name, (value): value is V => value instanceof type);
  },
};
