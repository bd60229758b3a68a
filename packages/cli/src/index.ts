import { Command } from 'commander';
import { logger } from '@layerkit/core/utils/logger.js';
import { getVersion } from './utils/package.js';
import { withErrorHandling } from './utils/error-handling.js';
import type { ChainCommandOptions } from './commands/chain.js';
import type { DepsCommandOptions } from './commands/deps.js';
import type { PlanCommandOptions } from './commands/plan.js';
import type { GenerateCommandOptions } from './commands/generate.js';

/**
 * layerkit CLI - Main entry point
 *
 * Commands are lazily loaded via dynamic import() so only the invoked
 * command's module tree is loaded.
 */

const program = new Command();

program
  .name('layerkit')
  .description('Compose project scaffolds from layered, versioned templates')
  .version(getVersion())
  .option('--cwd <dir>', 'set working directory')
  .option('--templates <dir>', 'templates directory (default: templatesDir from layerkit.jsonc, or ./templates)')
  .option('--max-depth <n>', 'maximum inheritance depth')
  .option('--strategy <strategy>', 'default file strategy: replace, override or merge')
  .option('--exclude-dev', 'skip dev dependencies of the requested template')
  .option('--progress', 'log pipeline progress events')
  .configureHelp({
    sortSubcommands: true,
    formatHelp: (cmd, helper) => {
      const termWidth = helper.padWidth(cmd, helper);
      let output = `Usage: ${helper.commandUsage(cmd)}\n\n`;

      if (cmd.description()) {
        output += `${cmd.description()}\n\n`;
      }

      const args = helper.visibleArguments(cmd);
      if (args.length > 0) {
        output += 'Arguments:\n';
        for (const arg of args) {
          output += `  ${helper.argumentTerm(arg).padEnd(termWidth)}  ${helper.argumentDescription(arg)}\n`;
        }
        output += '\n';
      }

      const options = helper.visibleOptions(cmd);
      if (options.length > 0) {
        output += 'Options:\n';
        for (const opt of options) {
          output += `  ${helper.optionTerm(opt).padEnd(termWidth)}  ${helper.optionDescription(opt)}\n`;
        }
        output += '\n';
      }

      const commands = helper.visibleCommands(cmd);
      if (commands.length > 0) {
        output += 'Commands:\n';
        for (const subCmd of commands) {
          output += `  ${helper.subcommandTerm(subCmd).padEnd(termWidth)}  ${helper.subcommandDescription(subCmd)}\n`;
        }
        output += '\n';
      }

      if (!cmd.parent) {
        output += `layerkit@${cmd.version() ?? getVersion()}\n`;
      }

      return output;
    }
  });

// =============================================================================
// LAZY-LOADED COMMANDS
// =============================================================================

program
  .command('chain')
  .argument('<template>', 'template id')
  .description('Show the inheritance chain of a template, root first')
  .option('--json', 'output as JSON')
  .action(withErrorHandling(async (templateId: string, options: ChainCommandOptions, command: Command) => {
    const { setupChainCommand } = await import('./commands/chain.js');
    await setupChainCommand(templateId, options, command);
  }));

program
  .command('deps')
  .argument('<template>', 'template id')
  .description('Resolve the dependencies declared along a template chain')
  .option('--json', 'output as JSON')
  .action(withErrorHandling(async (templateId: string, options: DepsCommandOptions, command: Command) => {
    const { setupDepsCommand } = await import('./commands/deps.js');
    await setupDepsCommand(templateId, options, command);
  }));

program
  .command('plan')
  .argument('<template>', 'template id')
  .description('Show per-file strategies, resolved versions, warnings and errors without writing')
  .option('--json', 'output as JSON')
  .action(withErrorHandling(async (templateId: string, options: PlanCommandOptions, command: Command) => {
    const { setupPlanCommand } = await import('./commands/plan.js');
    await setupPlanCommand(templateId, options, command);
  }));

program
  .command('generate')
  .alias('gen')
  .argument('<template>', 'template id')
  .argument('<target>', 'directory to write into')
  .description('Compose a template and write its files')
  .option('--dry-run', 'preview files without writing them')
  .option('-f, --force', 'overwrite existing files')
  .action(withErrorHandling(
    async (templateId: string, targetDir: string, options: GenerateCommandOptions, command: Command) => {
      const { setupGenerateCommand } = await import('./commands/generate.js');
      await setupGenerateCommand(templateId, targetDir, options, command);
    }
  ));

// =============================================================================
// GLOBAL ERROR HANDLING
// =============================================================================

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', { reason });
  console.error('An unexpected error occurred. Set LAYERKIT_VERBOSE=1 for details.');
  process.exit(1);
});

/**
 * Main execution function
 */
export async function run(argv: string[] = process.argv): Promise<void> {
  if (argv.length <= 2) {
    program.outputHelp();
    return;
  }
  await program.parseAsync(argv);
}

// Run when executed directly (tsx packages/cli/src/index.ts); the bin wrapper calls run() itself
if (process.argv[1] && process.argv[1].endsWith('index.ts')) {
  run().catch((error: unknown) => {
    logger.error('Fatal error in main execution', { error });
    console.error('Fatal error occurred. Exiting.');
    process.exit(1);
  });
}

export { program };
