/**
 * Plan Printers
 *
 * Rendering for `layerkit chain|deps|plan|generate`. Formatting functions
 * return lines so they can be checked without a terminal; the print*
 * wrappers route them through an OutputPort.
 */

import pc from 'picocolors';
import type { GenerationPlan } from '@layerkit/core/core/pipeline/generation-pipeline.js';
import type { InheritanceResult } from '@layerkit/core/core/inheritance/types.js';
import type { ResolutionResult } from '@layerkit/core/core/dependencies/types.js';
import type { CompositionResult } from '@layerkit/core/core/composition/types.js';
import type { EmitResult } from '@layerkit/core/core/emission/emitter.js';
import { conflictToError } from '@layerkit/core/core/dependencies/dependency-resolver.js';
import type { OutputPort } from '@layerkit/core/core/ports/output.js';
import { resolveOutput } from '@layerkit/core/core/ports/resolve.js';

export type Colors = ReturnType<typeof pc.createColors>;

function sectionHeader(c: Colors, title: string, count: number): string {
  return `${c.cyan(`[${title}]`)} ${c.dim(`(${count})`)}`;
}

// ---------------------------------------------------------------------------
// Inheritance
// ---------------------------------------------------------------------------

export function formatChain(result: InheritanceResult, c: Colors = pc): string[] {
  if (!result.success) {
    return result.errors.map(error => c.red(`✗ ${error.message}`));
  }

  return result.chain.map((node, index) => {
    const prefix = index === 0 ? '' : `${'   '.repeat(index - 1)}└─ `;
    const tags: string[] = [];
    if (index === 0) tags.push('root');
    if (index === result.chain.length - 1) tags.push('leaf');
    const label = `${node.template.id}@${node.template.version}`;
    return `${prefix}${c.bold(label)}${tags.length ? ' ' + c.dim(`(${tags.join(', ')})`) : ''}`;
  });
}

// ---------------------------------------------------------------------------
// Dependencies
// ---------------------------------------------------------------------------

export function formatResolution(result: ResolutionResult, c: Colors = pc): string[] {
  const lines: string[] = [];

  const names = result.order.length > 0 ? result.order : Array.from(result.resolvedVersions.keys()).sort();
  lines.push(sectionHeader(c, 'Resolved', result.resolvedVersions.size));
  for (const name of names) {
    const version = result.resolvedVersions.get(name);
    lines.push(`  ${name} ${version ? c.green(version.toString()) : c.dim('unresolved')}`);
  }

  if (result.order.length > 0) {
    lines.push(`${c.dim('Order:')} ${result.order.join(' -> ')}`);
  }

  if (result.conflicts.length > 0) {
    lines.push(sectionHeader(c, 'Conflicts', result.conflicts.length));
    for (const conflict of result.conflicts) {
      const detail = conflict.reason === 'invalid-constraint'
        ? `Invalid constraint for '${conflict.name}': ${conflict.constraints.join(', ')} (from ${conflict.requestedBy.join(', ')})`
        : conflictToError(conflict).message;
      lines.push(`  ${c.red('✗')} ${detail}`);
    }
  }

  if (result.cycles.length > 0) {
    lines.push(sectionHeader(c, 'Cycles', result.cycles.length));
    for (const cycle of result.cycles) {
      lines.push(`  ${c.red('✗')} ${cycle.join(' -> ')}`);
    }
  }

  return lines;
}

// ---------------------------------------------------------------------------
// Composition
// ---------------------------------------------------------------------------

export function formatComposition(result: CompositionResult, c: Colors = pc): string[] {
  const composed = result.composedTemplate;
  if (!composed) {
    return [];
  }

  const lines: string[] = [sectionHeader(c, 'Files', composed.files.length)];
  const width = Math.max(0, ...composed.files.map(file => file.strategy.length));
  for (const file of composed.files) {
    lines.push(`  ${c.cyan(file.strategy.padEnd(width))} ${file.path} ${c.dim(`<- ${file.contributors.join(', ')}`)}`);
  }

  if (result.shadowedFragments.length > 0) {
    lines.push(sectionHeader(c, 'Shadowed', result.shadowedFragments.length));
    for (const shadowed of result.shadowedFragments) {
      const verb = shadowed.strategy === 'override' ? 'overridden' : 'replaced';
      lines.push(`  ${shadowed.filePath} ${c.dim(`${shadowed.templateId} (${verb} by ${shadowed.shadowedBy})`)}`);
    }
  }

  const parameterNames = Object.keys(composed.parameters);
  if (parameterNames.length > 0) {
    lines.push(sectionHeader(c, 'Parameters', parameterNames.length));
    for (const name of parameterNames) {
      const definition = composed.parameters[name];
      const flags = definition.required ? ', required' : '';
      lines.push(`  ${name} ${c.dim(`${definition.type}${flags} from ${composed.parameterSources[name]}`)}`);
    }
  }

  return lines;
}

export function formatPlan(plan: GenerationPlan, c: Colors = pc): string[] {
  const lines: string[] = [];
  const status = plan.success ? c.green('ok') : c.red('failed');
  lines.push(`${c.bold(plan.templateId)} ${status}`);

  if (plan.inheritance.success) {
    lines.push(`${c.dim('Chain:')} ${plan.inheritance.chain.map(node => node.template.id).join(' -> ')}`);
  }
  if (plan.resolution) {
    lines.push(...formatResolution(plan.resolution, c));
  }
  if (plan.composition) {
    lines.push(...formatComposition(plan.composition, c));
  }

  return lines;
}

export function formatEmitResult(result: EmitResult, c: Colors = pc): string[] {
  const verb = result.dryRun ? 'Would write' : 'Wrote';
  const lines = [`${verb} ${result.files.length} file(s) to ${result.targetDir}`];
  for (const file of result.files) {
    lines.push(`  ${file.path}${file.existed ? ' ' + c.yellow('(overwritten)') : ''}`);
  }
  return lines;
}

// ---------------------------------------------------------------------------
// JSON output
// ---------------------------------------------------------------------------

export interface PlanJson {
  templateId: string;
  success: boolean;
  chain: string[];
  resolvedVersions: Record<string, string>;
  order: string[];
  files: Array<{ path: string; strategy: string; contributors: string[] }>;
  errors: Array<{ code: string; message: string }>;
  warnings: string[];
}

export function planToJson(plan: GenerationPlan): PlanJson {
  const resolvedVersions: Record<string, string> = {};
  for (const [name, version] of plan.resolution?.resolvedVersions ?? []) {
    resolvedVersions[name] = version.toString();
  }

  return {
    templateId: plan.templateId,
    success: plan.success,
    chain: plan.inheritance.chain.map(node => node.template.id),
    resolvedVersions,
    order: plan.resolution?.order ?? [],
    files: (plan.composition?.composedTemplate?.files ?? []).map(file => ({
      path: file.path,
      strategy: file.strategy,
      contributors: file.contributors
    })),
    errors: plan.errors.map(error => ({ code: error.code, message: error.message })),
    warnings: plan.warnings
  };
}

// ---------------------------------------------------------------------------
// Port wrappers
// ---------------------------------------------------------------------------

/**
 * Print a plan's body, then its warnings and errors.
 */
export function printPlan(plan: GenerationPlan, out?: OutputPort): void {
  const o = out ?? resolveOutput();
  o.message(formatPlan(plan).join('\n'));
  printDiagnostics(plan.warnings, plan.errors.map(error => error.message), o);
}

export function printDiagnostics(warnings: readonly string[], errors: readonly string[], out?: OutputPort): void {
  const o = out ?? resolveOutput();
  for (const warning of warnings) {
    o.warn(warning);
  }
  for (const error of errors) {
    o.error(error);
  }
}
