import type { ExecutionContext } from '@layerkit/core/types/execution-context.js';
import { resolveOutput } from '@layerkit/core/core/ports/resolve.js';
import { loadTemplateRepository } from '@layerkit/core/core/store/template-repository.js';
import type { TemplateRegistry } from '@layerkit/core/core/store/template-registry.js';

/**
 * Load the context's templates directory behind a spinner.
 */
export async function loadTemplates(ctx: ExecutionContext): Promise<TemplateRegistry> {
  const spinner = resolveOutput(ctx).spinner();
  spinner.start(`Loading templates from ${ctx.templatesDir}`);
  try {
    const registry = await loadTemplateRepository(ctx.templatesDir);
    spinner.stop(`Loaded ${registry.size} template(s)`);
    return registry;
  } catch (error) {
    spinner.stop('Failed to load templates');
    throw error;
  }
}
