import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { holdersFromModule, isOptionSource, loadModules, loadOptionSources } from '../loader.js';
import { OptionHolder } from '../holder.js';

const FIXTURE = fileURLToPath(new URL('./fixtures/search-options.ts', import.meta.url));

describe('loader', () => {
  describe('holdersFromModule', () => {
    const holder = new OptionHolder('Search', { verbose: false });

    it('prefers the holders export', () => {
      expect(holdersFromModule({ holders: [holder], default: 5 }, 'm.js')).toEqual([holder]);
    });

    it('accepts a single default holder', () => {
      expect(holdersFromModule({ default: holder }, 'm.js')).toEqual([holder]);
    });

    it('rejects modules without holders', () => {
      expect(() => holdersFromModule({ other: 1 }, 'm.js')).toThrow(
        'm.js exports no option holders; export "holders" or a default holder',
      );
    });

    it('rejects exports that are not holders', () => {
      expect(() => holdersFromModule({ holders: [holder, { name: 'x' }] }, 'm.js')).toThrow(
        'Export #1 of m.js is not an option holder',
      );
    });

    it('recognizes option sources structurally', () => {
      expect(isOptionSource(holder)).toBe(true);
      expect(isOptionSource({ name: 'Plain', declarations: () => [] })).toBe(true);
      expect(isOptionSource({ name: 'Plain' })).toBe(false);
      expect(isOptionSource(null)).toBe(false);
    });
  });

  describe('loadOptionSources', () => {
    let tmpDir: string;

    beforeEach(() => {
      tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'optdecl-loader-'));
    });

    afterEach(() => {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it('bundles and imports a TypeScript module', async () => {
      const sources = await loadOptionSources(FIXTURE);

      expect(sources.map((source) => source.name)).toEqual(['Search']);
      expect(sources[0]!.declarations().map((declaration) => declaration.field)).toEqual([
        'verbose',
        'max_count',
        'tags',
      ]);
    });

    it('removes the temporary bundle', async () => {
      const modulePath = path.join(tmpDir, 'inline.ts');
      fs.writeFileSync(modulePath, "export default { name: 'Inline', declarations: (): never[] => [] };\n");

      const sources = await loadOptionSources(modulePath);
      expect(sources.map((source) => source.name)).toEqual(['Inline']);
      expect(fs.readdirSync(tmpDir)).toEqual(['inline.ts']);
    });

    it('imports JavaScript modules directly', async () => {
      const modulePath = path.join(tmpDir, 'plain.mjs');
      fs.writeFileSync(modulePath, "export default { name: 'Plain', declarations() { return []; } };\n");

      const sources = await loadOptionSources(modulePath);
      expect(sources.map((source) => source.name)).toEqual(['Plain']);
    });

    it('reports missing modules', async () => {
      const missing = path.join(tmpDir, 'missing.ts');
      await expect(loadOptionSources(missing)).rejects.toThrow(`Module not found: ${missing}`);
    });
  });

  describe('loadModules', () => {
    it('falls back to the configured modules', async () => {
      const sources = await loadModules([], { modules: [FIXTURE], singleDash: false }, false);
      expect(sources.map((source) => source.name)).toEqual(['Search']);
    });

    it('requires at least one module', async () => {
      await expect(loadModules([], { modules: [], singleDash: false }, false)).rejects.toThrow(
        'No modules given. Pass module paths or set "modules" in .optdecl.yaml',
      );
    });
  });
});
