/**
 * Generate Command (CLI layer)
 *
 * Plans a template and writes the composed files into a target directory.
 * Nothing is written when the plan has errors.
 */

import { resolve } from 'path';
import type { Command } from 'commander';
import { generatePlan } from '@layerkit/core/core/pipeline/generation-pipeline.js';
import { emitComposedTemplate } from '@layerkit/core/core/emission/emitter.js';
import { resolveOutput } from '@layerkit/core/core/ports/resolve.js';
import { UserCancellationError } from '@layerkit/core/utils/errors.js';
import { createCliExecutionContext, detectInteractive, toContextOptions, type GlobalOptions } from '../cli/context.js';
import { loadTemplates } from '../cli/template-source.js';
import { formatEmitResult, printDiagnostics, printPlan } from '../printers/plan-printers.js';

export interface GenerateCommandOptions {
  dryRun?: boolean;
  force?: boolean;
}

export async function setupGenerateCommand(
  templateId: string,
  targetDir: string,
  options: GenerateCommandOptions,
  command: Command
): Promise<void> {
  const ctx = await createCliExecutionContext(toContextOptions(command.optsWithGlobals<GlobalOptions>()));
  const output = resolveOutput(ctx);
  const registry = await loadTemplates(ctx);
  output.step(`Planning '${templateId}'`);
  const plan = generatePlan(templateId, registry, { config: ctx.config, progress: ctx.progress });

  const composed = plan.composition?.composedTemplate;
  if (!plan.success || !composed) {
    printPlan(plan, output);
    output.error(`Nothing written: the plan for '${templateId}' has errors`);
    process.exitCode = 1;
    return;
  }

  printDiagnostics(plan.warnings, [], output);

  const outputDir = resolve(ctx.cwd, targetDir);
  if (options.dryRun) {
    output.info(`Dry run: nothing will be written to ${outputDir}`);
  }
  let force = options.force ?? false;
  if (!options.dryRun && !force && detectInteractive()) {
    const preview = await emitComposedTemplate(composed, outputDir, { dryRun: true });
    const existing = preview.files.filter(file => file.existed);
    if (existing.length > 0) {
      const confirmed = await output.confirm(`Overwrite ${existing.length} existing file(s) in ${preview.targetDir}?`, {
        initial: false,
      });
      if (!confirmed) {
        throw new UserCancellationError();
      }
      force = true;
    }
  }

  const result = await emitComposedTemplate(composed, outputDir, {
    dryRun: options.dryRun,
    force,
    progress: ctx.progress,
  });

  const [summary, ...files] = formatEmitResult(result);
  if (files.length > 0) {
    output.note(files.join('\n'), summary);
  }
  output.success(summary);
}
