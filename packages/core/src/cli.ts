/**
 * @fileoverview Command line interface
 *
 * addon-builder ui [-t anki21|anki20|all] [-r <root>] [-c <addon.json>]
 */

import * as path from 'path';
import { parseArgs } from 'util';
import { BUILDER_COMMAND, BUILDER_TITLE, BUILDER_VERSION, PATH_ROOT } from './constants.js';
import { BuilderError } from './errors/index.js';
import { createLogger, getLogger, resetLogger } from './logging/logger.js';
import type { LogThreshold } from './logging/types.js';
import { getConfigPath, loadAddonConfig } from './settings/loader.js';
import { DEFAULT_TARGET, TARGET_PLATFORMS, parseTarget } from './ui/categories.js';
import { UIBuilder } from './ui/builder.js';
import type { ExecutableLocator } from './ui/discovery.js';
import type { TargetPlatform } from './ui/types.js';
import type { ShellInvoker } from './utils/shell.js';

// =============================================================================
// Argument Parsing
// =============================================================================

export type CliCommand = 'ui';

export interface ParsedArgs {
  command?: CliCommand;
  /** Targets to build, in order */
  targets: TargetPlatform[];
  root: string;
  configPath: string;
  logLevel?: LogThreshold;
  help: boolean;
  version: boolean;
}

const COMMANDS: readonly CliCommand[] = ['ui'];

function isCommand(value: string): value is CliCommand {
  return COMMANDS.some((command) => command === value);
}

/**
 * Parse command line arguments (without the node and script entries).
 *
 * @throws TypeError for unknown options or commands
 * @throws ConfigError for unknown targets
 */
export function parseCliArgs(argv: string[], cwd: string = PATH_ROOT): ParsedArgs {
  const { values, positionals } = parseArgs({
    args: argv,
    options: {
      target: { type: 'string', short: 't', default: DEFAULT_TARGET },
      root: { type: 'string', short: 'r' },
      config: { type: 'string', short: 'c' },
      verbose: { type: 'boolean', short: 'v', default: false },
      quiet: { type: 'boolean', short: 'q', default: false },
      help: { type: 'boolean', short: 'h', default: false },
      version: { type: 'boolean', default: false },
    },
    allowPositionals: true,
    strict: true,
  });

  const [first, ...rest] = positionals;
  if (first !== undefined && !isCommand(first)) {
    throw new TypeError(`Unknown command '${first}'`);
  }
  if (rest.length > 0) {
    throw new TypeError(`Unexpected argument '${rest[0]}'`);
  }

  const target = values.target ?? DEFAULT_TARGET;
  const targets = target === 'all' ? [...TARGET_PLATFORMS] : [parseTarget(target)];

  let logLevel: LogThreshold | undefined;
  if (values.verbose === true) {
    logLevel = 'debug';
  } else if (values.quiet === true) {
    logLevel = 'warn';
  }

  return {
    command: first,
    targets,
    root: path.resolve(cwd, values.root ?? '.'),
    configPath: values.config ? path.resolve(cwd, values.config) : getConfigPath(cwd),
    logLevel,
    help: values.help === true,
    version: values.version === true,
  };
}

export function printHelp(): void {
  console.log(`
${BUILDER_TITLE} - compiles Qt forms and resources of an add-on

USAGE:
  ${BUILDER_COMMAND} ui [options]

COMMANDS:
  ui                        Compile designer/*.ui and resources/*.qrc

OPTIONS:
  -t, --target <target>     ${TARGET_PLATFORMS.join(', ')} or all (default: ${DEFAULT_TARGET})
  -r, --root <dir>          Directory containing designer/, resources/ and src/
                            (default: current directory)
  -c, --config <file>       Add-on configuration (default: ./addon.json)
  -v, --verbose             Debug output
  -q, --quiet               Warnings and errors only
  -h, --help                Show this help
  --version                 Show version

ENVIRONMENT:
  LOG_LEVEL                 trace, debug, info, warn, error, fatal or silent
`);
}

// =============================================================================
// Entry
// =============================================================================

/**
 * Collaborators the CLI passes on to the builder
 */
export interface CliDependencies {
  shell?: ShellInvoker;
  which?: ExecutableLocator;
  now?: Date;
}

/**
 * Run the CLI
 *
 * @returns Process exit code
 */
export function runCli(argv: string[], deps: CliDependencies = {}, cwd: string = PATH_ROOT): number {
  let args: ParsedArgs;
  try {
    args = parseCliArgs(argv, cwd);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`Error: ${message}`);
    console.error(`Run '${BUILDER_COMMAND} --help' for usage information`);
    return 1;
  }

  if (args.help) {
    printHelp();
    return 0;
  }

  if (args.version) {
    console.log(`${BUILDER_COMMAND} v${BUILDER_VERSION}`);
    return 0;
  }

  if (!args.command) {
    printHelp();
    return 1;
  }

  if (args.logLevel) {
    resetLogger();
    getLogger({ level: args.logLevel });
  }
  const logger = createLogger('cli');

  try {
    const config = loadAddonConfig(args.configPath);
    const builder = new UIBuilder({
      config,
      root: args.root,
      logger: createLogger('ui'),
      shell: deps.shell,
      which: deps.which,
      now: deps.now,
    });

    for (const target of args.targets) {
      builder.build(target);
    }
    return 0;
  } catch (error) {
    const structured = BuilderError.from(error);
    logger.fatal(structured.toStructuredLog(), structured.message);
    return 1;
  }
}
