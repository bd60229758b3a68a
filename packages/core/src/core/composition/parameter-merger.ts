import type { Dependency, ParameterDefinition } from '../../types/index.js';
import type { InheritanceNode } from '../inheritance/types.js';

export interface MergedParameters {
  parameters: Record<string, ParameterDefinition>;
  /** Parameter name -> templateId whose definition won */
  sources: Record<string, string>;
}

/**
 * Union of parameter definitions across a root-first chain. A name defined
 * more than once takes the leaf-most definition but keeps the position of
 * its first declaration.
 */
export function mergeParameters(chain: readonly InheritanceNode[]): MergedParameters {
  const parameters: Record<string, ParameterDefinition> = {};
  const sources: Record<string, string> = {};

  for (const { template } of chain) {
    for (const [name, definition] of Object.entries(template.parameters)) {
      parameters[name] = cloneDefinition(definition);
      sources[name] = template.id;
    }
  }

  return { parameters, sources };
}

/**
 * Every dependency declared in the chain, root first. A later declaration of
 * the same name and kind is kept as well; the resolver intersects them.
 */
export function collectDependencies(chain: readonly InheritanceNode[]): Dependency[] {
  return chain.flatMap(({ template }) =>
    template.dependencies.map(dep => ({ ...dep, declaredBy: dep.declaredBy ?? template.id }))
  );
}

function cloneDefinition(definition: ParameterDefinition): ParameterDefinition {
  return {
    ...definition,
    ...(Array.isArray(definition.default) ? { default: [...definition.default] } : {}),
    ...(definition.choices ? { choices: [...definition.choices] } : {})
  };
}
