/**
 * Plan Command (CLI layer)
 *
 * Thin shell over the generation pipeline: shows what `generate` would
 * produce without writing anything.
 */

import type { Command } from 'commander';
import { generatePlan } from '@layerkit/core/core/pipeline/generation-pipeline.js';
import { createCliExecutionContext, toContextOptions, type GlobalOptions } from '../cli/context.js';
import { loadTemplates } from '../cli/template-source.js';
import { planToJson, printPlan } from '../printers/plan-printers.js';

export interface PlanCommandOptions {
  json?: boolean;
}

export async function setupPlanCommand(
  templateId: string,
  options: PlanCommandOptions,
  command: Command
): Promise<void> {
  const ctx = await createCliExecutionContext({
    ...toContextOptions(command.optsWithGlobals<GlobalOptions>()),
    interactive: options.json ? false : undefined,
  });
  const registry = await loadTemplates(ctx);
  const plan = generatePlan(templateId, registry, { config: ctx.config, progress: ctx.progress });

  if (options.json) {
    console.log(JSON.stringify(planToJson(plan), null, 2));
  } else {
    printPlan(plan, ctx.output);
  }

  if (!plan.success) {
    process.exitCode = 1;
  }
}
