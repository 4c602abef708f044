import type { CLIArgs, OptdeclConfig } from '../types.js';
import { loadModules } from '../loader.js';
import { Options } from '../options.js';

export async function usageCommand(args: CLIArgs, config: OptdeclConfig): Promise<void> {
  const sources = await loadModules(args.positional, config, args.verbose);
  const options = new Options(sources, { useSingleDash: config.singleDash });
  process.stdout.write(options.usage());
}
