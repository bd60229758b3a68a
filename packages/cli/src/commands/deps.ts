/**
 * Deps Command (CLI layer)
 *
 * Resolves every dependency declared along a template's inheritance chain
 * and prints the selected versions, install order and conflicts.
 */

import type { Command } from 'commander';
import { InheritanceResolver } from '@layerkit/core/core/inheritance/inheritance-resolver.js';
import { DependencyResolver } from '@layerkit/core/core/dependencies/dependency-resolver.js';
import { collectDependencies } from '@layerkit/core/core/composition/parameter-merger.js';
import { resolveOutput } from '@layerkit/core/core/ports/resolve.js';
import { createCliExecutionContext, toContextOptions, type GlobalOptions } from '../cli/context.js';
import { loadTemplates } from '../cli/template-source.js';
import { formatResolution, printDiagnostics } from '../printers/plan-printers.js';

export interface DepsCommandOptions {
  json?: boolean;
}

export async function setupDepsCommand(
  templateId: string,
  options: DepsCommandOptions,
  command: Command
): Promise<void> {
  const ctx = await createCliExecutionContext({
    ...toContextOptions(command.optsWithGlobals<GlobalOptions>()),
    interactive: options.json ? false : undefined,
  });
  const output = resolveOutput(ctx);
  const registry = await loadTemplates(ctx);

  const inheritance = new InheritanceResolver(registry).resolveChain(templateId, ctx.config.maxDepth);
  if (!inheritance.success) {
    printDiagnostics(inheritance.warnings, inheritance.errors.map(error => error.message), output);
    process.exitCode = 1;
    return;
  }

  const result = new DependencyResolver(registry, registry, { includeDev: ctx.config.includeDev })
    .resolve(collectDependencies(inheritance.chain));

  if (options.json) {
    console.log(JSON.stringify({
      success: result.success,
      resolvedVersions: Object.fromEntries(
        Array.from(result.resolvedVersions, ([name, version]) => [name, version.toString()])
      ),
      order: result.order,
      conflicts: result.conflicts,
      cycles: result.cycles,
      errors: result.errors.map(error => ({ code: error.code, message: error.message })),
      warnings: result.warnings,
    }, null, 2));
  } else {
    output.message(formatResolution(result).join('\n'));
    printDiagnostics(result.warnings, result.errors.map(error => error.message), output);
  }

  if (!result.success) {
    process.exitCode = 1;
  }
}
