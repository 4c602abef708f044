import fs from 'node:fs';
import path from 'node:path';
import YAML from 'yaml';
import { isRecord } from './guards.js';
import { DOC_FORMAT_NAMES, resolveDocFormat } from './render.js';
import type { SpliceMarkers } from './splice.js';
import type { OptdeclConfig } from './types.js';

const CONFIG_FILENAMES = ['.optdecl.yaml', '.optdecl.yml', '.optdecl.json'];

/**
 * Discover the config file by walking upward from startDir.
 * Priority: --config flag > OPTDECL_CONFIG env var > file discovery walking upward.
 */
export function discoverConfigPath(
  explicitPath?: string,
  startDir: string = process.cwd(),
): string | null {
  // 1. Explicit --config flag
  if (explicitPath) {
    const resolved = path.resolve(startDir, explicitPath);
    if (fs.existsSync(resolved)) {
      return resolved;
    }
    throw new Error(`Config file not found: ${resolved}`);
  }

  // 2. OPTDECL_CONFIG env var
  const envPath = process.env['OPTDECL_CONFIG'];
  if (envPath) {
    const resolved = path.resolve(startDir, envPath);
    if (fs.existsSync(resolved)) {
      return resolved;
    }
    throw new Error(`Config file from OPTDECL_CONFIG not found: ${resolved}`);
  }

  // 3. Walk upward from startDir
  let dir = path.resolve(startDir);
  while (true) {
    for (const filename of CONFIG_FILENAMES) {
      const candidate = path.join(dir, filename);
      if (fs.existsSync(candidate)) {
        return candidate;
      }
    }
    const parent = path.dirname(dir);
    if (parent === dir) {
      return null;
    }
    dir = parent;
  }
}

/**
 * Parse a config file (YAML or JSON) into an OptdeclConfig.
 */
export function parseConfigFile(configPath: string): OptdeclConfig {
  const content = fs.readFileSync(configPath, 'utf-8');
  const ext = path.extname(configPath).toLowerCase();

  let parsed: unknown;
  if (ext === '.json') {
    parsed = JSON.parse(content);
  } else {
    parsed = YAML.parse(content);
  }

  return validateConfig(parsed, configPath);
}

/**
 * Validate raw parsed config data. Relative paths are resolved against the
 * config file's directory.
 */
function validateConfig(data: unknown, source: string): OptdeclConfig {
  if (!isRecord(data)) {
    throw new Error(`Invalid config in ${source}: expected an object`);
  }

  const baseDir = path.dirname(source);
  const config: OptdeclConfig = { modules: [], singleDash: false };

  const modules = data['modules'];
  if (modules !== undefined) {
    if (!Array.isArray(modules) || !modules.every((item) => typeof item === 'string' && item.trim())) {
      throw new Error(`Invalid config in ${source}: "modules" must be an array of paths`);
    }
    config.modules = modules.map((item: string) => path.resolve(baseDir, item));
  }

  const comments = data['comments'];
  if (comments !== undefined) {
    if (typeof comments !== 'string' || !comments.trim()) {
      throw new Error(`Invalid config in ${source}: "comments" must be a path`);
    }
    config.comments = path.resolve(baseDir, comments);
  }

  const format = data['format'];
  if (format !== undefined) {
    const resolved = typeof format === 'string' ? resolveDocFormat(format) : undefined;
    if (!resolved) {
      throw new Error(`Invalid config in ${source}: "format" must be one of: ${DOC_FORMAT_NAMES.join(', ')}`);
    }
    config.format = resolved;
  }

  const singleDash = data['singleDash'];
  if (singleDash !== undefined) {
    if (typeof singleDash !== 'boolean') {
      throw new Error(`Invalid config in ${source}: "singleDash" must be true or false`);
    }
    config.singleDash = singleDash;
  }

  const markers = data['markers'];
  if (markers !== undefined) {
    config.markers = validateMarkers(markers, source);
  }

  return config;
}

function validateMarkers(data: unknown, source: string): SpliceMarkers {
  if (!isRecord(data)) {
    throw new Error(`Invalid config in ${source}: "markers" must be an object with "start" and "end"`);
  }
  const { start, end } = data;
  if (typeof start !== 'string' || !start.trim() || typeof end !== 'string' || !end.trim()) {
    throw new Error(`Invalid config in ${source}: "markers.start" and "markers.end" must be non-empty strings`);
  }
  if (start.trim() === end.trim()) {
    throw new Error(`Invalid config in ${source}: start and end markers must differ`);
  }
  return { start: start.trim(), end: end.trim() };
}

/**
 * Load config from file, or fall back to defaults.
 */
export function loadConfig(args: { config?: string }): OptdeclConfig {
  const configPath = discoverConfigPath(args.config);

  if (configPath) {
    return parseConfigFile(configPath);
  }

  return { modules: [], singleDash: false };
}
