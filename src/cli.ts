import minimist from 'minimist';
import type { CLIArgs } from './types.js';
import { loadConfig } from './config.js';
import { errorMessage } from './errors.js';
import { docCommand } from './commands/doc.js';
import { usageCommand } from './commands/usage.js';
import { checkCommand } from './commands/check.js';

export const VERSION = '0.1.0';

export const HELP_TEXT = `
optdecl - Declarative command-line options and their documentation

USAGE:
  optdecl [global options] <command> [command options]

COMMANDS:
  doc <module...>      Generate HTML documentation of the declared options
  usage <module...>    Print plain-text usage of the declared options
  check <module...>    Build the option registry and report it as JSON

DOC OPTIONS:
  -docfile <file>      Insert documentation between the markers of <file>
  -outfile <file>      Destination for the output (default: stdout)
  -i                   Edit the docfile in-place
  -format <format>     html (default) | jsdoc | javadoc
  -classdoc            Include the first holder's documentation
  -singledash          Use single dashes for long options
  -comments <file>     YAML or JSON file with holder and field comments

GLOBAL OPTIONS (before the command):
  --config <path>      Path to config file
  --verbose            Debug output on stderr
  -q, --quiet          Suppress stderr
  -h, --help           Show help
  -v, --version        Show version

EXAMPLES:
  optdecl doc src/options.ts
  optdecl doc -i -docfile docs/manual.html src/options.ts
  optdecl doc -i -docfile src/main.ts -format jsdoc src/options.ts
  optdecl usage src/options.ts
  optdecl check src/options.ts
`.trimStart();

export function parseArgs(argv: string[]): CLIArgs {
  const parsed = minimist(argv.slice(2), {
    string: ['_', 'config'],
    boolean: ['verbose', 'quiet', 'help', 'version'],
    alias: {
      q: 'quiet',
      h: 'help',
      v: 'version',
    },
    default: {
      verbose: false,
      quiet: false,
      help: false,
      version: false,
    },
    // Everything after the command belongs to the command's own parser.
    stopEarly: true,
  });

  const positional = parsed._;
  const command = positional[0] ?? '';
  const config: unknown = parsed['config'];

  return {
    command,
    positional: positional.slice(1),
    config: typeof config === 'string' ? config : undefined,
    verbose: Boolean(parsed['verbose']),
    quiet: Boolean(parsed['quiet']),
    help: Boolean(parsed['help']),
    version: Boolean(parsed['version']),
  };
}

export async function main(argv: string[]): Promise<void> {
  const args = parseArgs(argv);

  if (args.version) {
    process.stdout.write(`optdecl v${VERSION}\n`);
    return;
  }

  if (args.help || !args.command) {
    process.stdout.write(HELP_TEXT);
    return;
  }

  switch (args.command) {
    case 'doc': {
      const config = loadConfig(args);
      await docCommand(args, config);
      break;
    }

    case 'usage': {
      const config = loadConfig(args);
      await usageCommand(args, config);
      break;
    }

    case 'check': {
      const config = loadConfig(args);
      await checkCommand(args, config);
      break;
    }

    default:
      process.stderr.write(`Unknown command: ${args.command}\n`);
      process.stdout.write(HELP_TEXT);
      process.exitCode = 1;
  }
}

/**
 * Run the CLI, reporting any failure on stderr with a failing exit code.
 */
export async function run(argv: string[]): Promise<void> {
  try {
    await main(argv);
  } catch (error) {
    process.stderr.write(`Fatal: ${errorMessage(error)}\n`);
    process.exitCode = 1;
  }
}
