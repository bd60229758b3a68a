/**
 * Chain Command (CLI layer)
 *
 * Prints the root-first inheritance chain of a template.
 */

import type { Command } from 'commander';
import { InheritanceResolver, chainIds } from '@layerkit/core/core/inheritance/inheritance-resolver.js';
import { resolveOutput } from '@layerkit/core/core/ports/resolve.js';
import { createCliExecutionContext, toContextOptions, type GlobalOptions } from '../cli/context.js';
import { loadTemplates } from '../cli/template-source.js';
import { formatChain } from '../printers/plan-printers.js';

export interface ChainCommandOptions {
  json?: boolean;
}

export async function setupChainCommand(
  templateId: string,
  options: ChainCommandOptions,
  command: Command
): Promise<void> {
  const ctx = await createCliExecutionContext({
    ...toContextOptions(command.optsWithGlobals<GlobalOptions>()),
    interactive: options.json ? false : undefined,
  });
  const registry = await loadTemplates(ctx);
  const result = new InheritanceResolver(registry).resolveChain(
    templateId,
    ctx.config.maxDepth,
    ctx.config.defaultStrategy
  );

  if (options.json) {
    console.log(JSON.stringify({
      success: result.success,
      chain: chainIds(result.chain),
      path: result.path,
      strategy: result.strategy,
      errors: result.errors.map(error => ({ code: error.code, message: error.message })),
    }, null, 2));
  } else {
    resolveOutput(ctx).message(formatChain(result).join('\n'));
  }

  if (!result.success) {
    process.exitCode = 1;
  }
}
