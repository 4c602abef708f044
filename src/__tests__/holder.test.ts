import { describe, it, expect } from 'vitest';
import { types } from '../coerce.js';
import { CoercionError } from '../errors.js';
import { OptionHolder } from '../holder.js';

describe('OptionHolder', () => {
  it('records declarations in order with their settings', () => {
    const config = { verbose: false, max_count: 10, tags: [] as string[] };
    const holder = new OptionHolder('Search', config)
      .group('Output')
      .option('verbose', types.boolean, { short: 'v', description: 'Print progress' })
      .option('max_count', types.integer, { aliases: ['--limit'] })
      .list('tags', types.string, { unpublicized: true });

    const declarations = holder.declarations();
    expect(declarations.map((declaration) => declaration.field)).toEqual(['verbose', 'max_count', 'tags']);
    expect(declarations[0]!.group).toEqual({ title: 'Output', unpublicized: false });
    expect(declarations[1]!.group).toBeUndefined();
    expect(declarations[0]!.short).toBe('v');
    expect(declarations[1]!.aliases).toEqual(['--limit']);
    expect(declarations[1]!.description).toBe('');
    expect(declarations[2]!.repeatable).toBe(true);
    expect(declarations[2]!.typeName).toBe('string');
    expect(declarations[2]!.unpublicized).toBe(true);
  });

  it('reads and writes the bound field', () => {
    const config = { max_count: 10 };
    const declaration = new OptionHolder('Search', config).option('max_count', types.integer).declarations()[0]!;

    expect(declaration.read()).toBe(10);
    declaration.write(25);
    expect(config.max_count).toBe(25);
  });

  it('rejects values of the wrong type', () => {
    const config = { max_count: 10 };
    const declaration = new OptionHolder('Search', config).option('max_count', types.integer).declarations()[0]!;

    try {
      declaration.write('25');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(CoercionError);
      expect((error as CoercionError).code).toBe('TYPE_MISMATCH');
      expect((error as CoercionError).message).toBe('Search.max_count expects integer, got string');
    }
    expect(config.max_count).toBe(10);
  });

  it('appends to list fields without dropping their initial contents', () => {
    const config = { include: ['src'] };
    const declaration = new OptionHolder('Build', config).list('include', types.string).declarations()[0]!;

    declaration.write('test');
    expect(config.include).toEqual(['src', 'test']);
    expect(declaration.type).toEqual({ kind: 'string' });
  });

  it('splits list occurrences when a separator is given', () => {
    const config = { ports: [] as number[] };
    const declaration = new OptionHolder('Net', config)
      .list('ports', types.integer, { separator: ':' })
      .declarations()[0]!;

    expect(declaration.type).toEqual({ kind: 'list', element: { kind: 'integer' }, separator: ':' });
    declaration.write([80, 443]);
    expect(config.ports).toEqual([80, 443]);
  });

  it('overrides the separator of a list-typed option', () => {
    const config = { ports: [] as number[] };
    const declaration = new OptionHolder('Net', config)
      .option('ports', types.list(types.integer), { separator: ';' })
      .declarations()[0]!;

    expect(declaration.type).toEqual({ kind: 'list', element: { kind: 'integer' }, separator: ';' });
    expect(declaration.typeName).toBe('integer[]');
    expect(declaration.repeatable).toBe(false);
  });
});
