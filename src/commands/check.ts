import type { CLIArgs, OptdeclConfig } from '../types.js';
import { errorMessage } from '../errors.js';
import type { OptionField } from '../model.js';
import { Options } from '../options.js';
import { writeOutput, writeError } from '../output.js';
import { loadModules } from '../loader.js';

function describeOption(field: OptionField) {
  return {
    name: field.longName,
    short: field.shortName ?? null,
    aliases: field.aliasNames,
    holder: field.owner.name,
    field: field.fieldName,
    type: field.typeName,
    multiplicity: field.multiplicity,
    default: field.defaultValueText ?? null,
    group: field.groupName ?? null,
    unpublicized: field.unpublicized,
  };
}

/**
 * Build the registry for the given modules and report what was declared.
 * Declaration errors are reported as JSON errors.
 */
export async function checkCommand(args: CLIArgs, config: OptdeclConfig): Promise<void> {
  try {
    const sources = await loadModules(args.positional, config, args.verbose);
    const options = new Options(sources, { useSingleDash: config.singleDash });

    writeOutput({
      holders: sources.map((source) => source.name),
      options: options.getOptions().map(describeOption),
      groups: options.getGroups().map((group) => ({
        name: group.name,
        unpublicized: group.unpublicized,
        publicized: group.containsPublicizedOption(),
        options: group.options.map((field) => field.longName),
      })),
      count: options.getOptions().length,
    });
  } catch (error) {
    writeError(errorMessage(error));
    process.exitCode = 1;
  }
}
