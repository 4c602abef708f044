import type { DocFormat } from './render.js';
import type { SpliceMarkers } from './splice.js';

export interface CLIArgs {
  /** The command to execute */
  command: string;

  /** Arguments after the command, handed to the command's own parser */
  positional: string[];

  /** Path to config file */
  config?: string;

  /** Debug output on stderr */
  verbose: boolean;

  /** Suppress stderr */
  quiet: boolean;

  /** Show help */
  help: boolean;

  /** Show version */
  version: boolean;
}

export interface OptdeclConfig {
  /** Modules exporting option holders, used when none are given on the command line */
  modules: string[];

  /** YAML or JSON file with holder and field comments */
  comments?: string;

  /** Default documentation format */
  format?: DocFormat;

  /** Render and parse long options with a single dash */
  singleDash: boolean;

  /** Sentinel lines delimiting the generated region of a docfile */
  markers?: SpliceMarkers;
}
