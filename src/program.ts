import { Argument, Command, CommanderError } from 'commander';
import { resolve } from 'path';
import { logger } from './utils/logger.js';
import { loadConfig } from './config/loader.js';
import { scanTemplates } from './catalog/index.js';
import { printCatalog } from './commands/list.js';
import { runMerge } from './commands/merge.js';
import { STDOUT_TARGET } from './merge/index.js';
import type { SelectorTerminal } from './select/index.js';
import { ExitCode, PromptMergeError, type ExitCodeValue } from './errors.js';

export const VERSION = '0.1.0';

export interface CliContext extends SelectorTerminal {
  cwd: string;
}

export interface CliOptions {
  list?: boolean;
  output?: string;
  root?: string;
  select?: string[];
  details?: boolean;
  config?: string;
  verbose?: boolean;
  quiet?: boolean;
}

export function defaultContext(): CliContext {
  return {
    cwd: process.cwd(),
    input: process.stdin,
    output: process.stderr,
  };
}

export function createProgram(context: CliContext) {
  return new Command()
    .name('prompt-merge')
    .description('Select prompt templates and merge them into a single CLAUDE.md')
    .version(VERSION)
    .addArgument(
      new Argument('[command]', 'optional "go": interactive selection (the default)').choices([
        'go',
      ])
    )
    .option('-l, --list', 'List all available templates')
    .option('-o, --output <path>', 'Output file path, "-" for stdout (default: CLAUDE.md)')
    .option('-r, --root <dir>', 'Template root directory (default: templates)')
    .option('-s, --select <templates...>', 'Merge these templates in order without prompting')
    .option('-d, --details', 'Show descriptions and extends hints (only with --list)')
    .option('-c, --config <path>', 'Config file (default: prompt-merge.config.json)')
    .option('-v, --verbose', 'Enable verbose logging')
    .option('-q, --quiet', 'Suppress non-error output')
    .allowExcessArguments(false)
    .showHelpAfterError()
    .exitOverride()
    .action(async (_command: string | undefined, options: CliOptions) => {
      logger.setVerbose(Boolean(options.verbose));
      logger.setQuiet(Boolean(options.quiet));

      if (options.details && !options.list) {
        logger.warn('--details only applies with --list');
      }

      const config = await loadConfig(context.cwd, options.config);
      const root = resolve(context.cwd, options.root ?? config.templates.root);

      const catalog = await scanTemplates(root, {
        extensions: config.templates.extensions,
        exclude: config.templates.exclude,
      });

      if (options.list) {
        logger.debug(`Listing templates in ${root}`);
        printCatalog(catalog, { details: options.details });
        return;
      }

      const output = options.output ?? config.output.path;
      await runMerge({
        catalog,
        root,
        outputPath: output === STDOUT_TARGET ? output : resolve(context.cwd, output),
        select: options.select,
        terminal: context,
      });
    });
}

/**
 * Parse `argv` (user arguments only) and run; resolves with the exit code
 */
export async function runCli(
  argv: readonly string[],
  context: CliContext = defaultContext()
): Promise<ExitCodeValue> {
  const program = createProgram(context);

  try {
    await program.parseAsync([...argv], { from: 'user' });
    return ExitCode.Success;
  } catch (error) {
    return handleError(error);
  }
}

function handleError(error: unknown): ExitCodeValue {
  if (error instanceof CommanderError) {
    // commander has already printed the message and usage
    if (
      error.code === 'commander.helpDisplayed' ||
      error.code === 'commander.help' ||
      error.code === 'commander.version'
    ) {
      return ExitCode.Success;
    }
    return ExitCode.Usage;
  }

  if (error instanceof PromptMergeError) {
    logger.error(error.message);
    if (error.internalDetails) {
      logger.debug(error.internalDetails);
    }
    return error.exitCode;
  }

  logger.error(`Unexpected error: ${error instanceof Error ? error.message : String(error)}`);
  return ExitCode.Unexpected;
}
