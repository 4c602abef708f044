import { randomUUID } from 'node:crypto';
import fs from 'node:fs';
import path from 'node:path';
import { pathToFileURL } from 'node:url';
import { build } from 'esbuild';
import { DocToolError } from './errors.js';
import type { OptionSource } from './model.js';
import type { OptdeclConfig } from './types.js';

const TYPESCRIPT_EXTENSIONS = new Set(['.ts', '.mts', '.cts', '.tsx']);

export function isOptionSource(value: unknown): value is OptionSource {
  return (
    typeof value === 'object' &&
    value !== null &&
    'name' in value &&
    typeof value.name === 'string' &&
    'declarations' in value &&
    typeof value.declarations === 'function'
  );
}

/**
 * Pick the option holders out of a module namespace: the `holders` export,
 * else the default export (one holder or an array of them).
 */
export function holdersFromModule(namespace: unknown, modulePath: string): OptionSource[] {
  if (typeof namespace !== 'object' || namespace === null) {
    throw new DocToolError('INVALID_MODULE', `${modulePath} did not load as a module`, { module: modulePath });
  }

  const exported = 'holders' in namespace ? namespace.holders : 'default' in namespace ? namespace.default : undefined;
  const candidates: unknown[] = Array.isArray(exported) ? exported : exported === undefined ? [] : [exported];

  if (candidates.length === 0) {
    throw new DocToolError(
      'INVALID_MODULE',
      `${modulePath} exports no option holders; export "holders" or a default holder`,
      { module: modulePath },
    );
  }

  return candidates.map((candidate, index) => {
    if (!isOptionSource(candidate)) {
      throw new DocToolError('INVALID_MODULE', `Export #${index} of ${modulePath} is not an option holder`, {
        module: modulePath,
        index,
      });
    }
    return candidate;
  });
}

/**
 * Import a module that declares option holders. TypeScript sources are
 * bundled with esbuild to a temporary file next to the source, so that its
 * package imports resolve from the same node_modules.
 */
export async function loadOptionSources(modulePath: string, options: { verbose?: boolean } = {}): Promise<OptionSource[]> {
  const resolved = path.resolve(modulePath);
  if (!fs.existsSync(resolved)) {
    throw new DocToolError('FILE_NOT_FOUND', `Module not found: ${resolved}`, { module: resolved });
  }

  if (!TYPESCRIPT_EXTENSIONS.has(path.extname(resolved).toLowerCase())) {
    const namespace: unknown = await import(pathToFileURL(resolved).href);
    return holdersFromModule(namespace, resolved);
  }

  const outfile = path.join(path.dirname(resolved), `.${path.basename(resolved)}.${randomUUID()}.bundle.mjs`);

  if (options.verbose) {
    process.stderr.write(`Bundling ${resolved}...\n`);
  }

  try {
    await build({
      entryPoints: [resolved],
      outfile,
      bundle: true,
      format: 'esm',
      platform: 'node',
      target: 'node20',
      packages: 'external',
      logLevel: 'silent',
    });
    const namespace: unknown = await import(pathToFileURL(outfile).href);
    return holdersFromModule(namespace, resolved);
  } finally {
    fs.rmSync(outfile, { force: true });
  }
}

/**
 * Resolve the modules named on the command line, or the configured ones.
 */
export async function loadModules(
  modulePaths: string[],
  config: OptdeclConfig,
  verbose: boolean,
): Promise<OptionSource[]> {
  const paths = modulePaths.length > 0 ? modulePaths : config.modules;
  if (paths.length === 0) {
    throw new DocToolError('NO_MODULES', 'No modules given. Pass module paths or set "modules" in .optdecl.yaml');
  }
  const sources: OptionSource[] = [];
  for (const modulePath of paths) {
    sources.push(...(await loadOptionSources(modulePath, { verbose })));
  }
  return sources;
}
