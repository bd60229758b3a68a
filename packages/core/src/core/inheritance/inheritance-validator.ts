/**
 * Non-fatal consistency checks over a resolved inheritance chain.
 *
 * Composition will still run when these report problems; the issues surface
 * as warnings so template authors can see where a descendant quietly changes
 * an ancestor's contract.
 */

import type { ParameterDefinition, ParameterValue } from '../../types/index.js';
import type { InheritanceNode, InheritanceValidationResult, ValidationIssue } from './types.js';

export function validateInheritanceChain(chain: readonly InheritanceNode[]): InheritanceValidationResult {
  const issues: ValidationIssue[] = [
    ...checkChainIntegrity(chain),
    ...checkParameterCompatibility(chain),
    ...checkParameterDefaults(chain),
    ...checkDuplicateFiles(chain)
  ];

  return {
    isValid: !issues.some(issue => issue.severity === 'error'),
    issues
  };
}

/**
 * Each node must extend the node right before it (root first).
 */
function checkChainIntegrity(chain: readonly InheritanceNode[]): ValidationIssue[] {
  const issues: ValidationIssue[] = [];

  if (chain.length > 0 && chain[0].parentId !== undefined) {
    issues.push({
      rule: 'chain-integrity',
      severity: 'error',
      templateId: chain[0].template.id,
      message: `Root template '${chain[0].template.id}' still extends '${chain[0].parentId}'`
    });
  }

  for (let i = 1; i < chain.length; i++) {
    const node = chain[i];
    const expected = chain[i - 1].template.id;
    if (node.parentId !== expected) {
      issues.push({
        rule: 'chain-integrity',
        severity: 'error',
        templateId: node.template.id,
        message: `Template '${node.template.id}' should extend '${expected}' but extends '${node.parentId ?? 'nothing'}'`
      });
    }
  }

  return issues;
}

function checkParameterCompatibility(chain: readonly InheritanceNode[]): ValidationIssue[] {
  const issues: ValidationIssue[] = [];

  for (let i = 1; i < chain.length; i++) {
    const child = chain[i].template;

    for (const [paramName, childParam] of Object.entries(child.parameters)) {
      const inherited = nearestAncestorDefinition(chain, i, paramName);
      if (!inherited) continue;

      const { definition: parentParam, templateId: parentId } = inherited;

      if (parentParam.type !== childParam.type) {
        issues.push({
          rule: 'parameter-type',
          severity: 'warning',
          templateId: child.id,
          message: `Parameter '${paramName}' changes type from '${parentParam.type}' (${parentId}) to '${childParam.type}' (${child.id})`
        });
      }

      if (parentParam.required === true && childParam.required === false) {
        issues.push({
          rule: 'parameter-required',
          severity: 'warning',
          templateId: child.id,
          message: `Parameter '${paramName}' is required by '${parentId}' but made optional by '${child.id}'`
        });
      }
    }
  }

  return issues;
}

function nearestAncestorDefinition(
  chain: readonly InheritanceNode[],
  index: number,
  paramName: string
): { definition: ParameterDefinition; templateId: string } | undefined {
  for (let j = index - 1; j >= 0; j--) {
    const definition = chain[j].template.parameters[paramName];
    if (definition) {
      return { definition, templateId: chain[j].template.id };
    }
  }
  return undefined;
}

function checkParameterDefaults(chain: readonly InheritanceNode[]): ValidationIssue[] {
  const issues: ValidationIssue[] = [];

  for (const node of chain) {
    for (const [paramName, definition] of Object.entries(node.template.parameters)) {
      if (definition.default === undefined) continue;
      if (!defaultMatchesType(definition, definition.default)) {
        issues.push({
          rule: 'parameter-default',
          severity: 'warning',
          templateId: node.template.id,
          message: `Default for parameter '${paramName}' in '${node.template.id}' does not match type '${definition.type}'`
        });
      }
    }
  }

  return issues;
}

function defaultMatchesType(definition: ParameterDefinition, value: ParameterValue): boolean {
  switch (definition.type) {
    case 'string':
      return typeof value === 'string' && (!definition.pattern || new RegExp(definition.pattern).test(value));
    case 'number':
      return typeof value === 'number';
    case 'boolean':
      return typeof value === 'boolean';
    case 'enum':
      return typeof value === 'string' && (definition.choices ?? []).includes(value);
    case 'list':
      return Array.isArray(value);
  }
}

function checkDuplicateFiles(chain: readonly InheritanceNode[]): ValidationIssue[] {
  const issues: ValidationIssue[] = [];

  for (const node of chain) {
    const seen = new Set<string>();
    for (const fragment of node.template.files) {
      if (fragment.slot !== undefined) continue;
      if (seen.has(fragment.filePath)) {
        issues.push({
          rule: 'duplicate-file',
          severity: 'warning',
          templateId: node.template.id,
          message: `Template '${node.template.id}' declares '${fragment.filePath}' more than once`
        });
      }
      seen.add(fragment.filePath);
    }
  }

  return issues;
}
