/**
 * Shared constants for layerkit.
 * Single source of truth for file names, defaults and markers used across the engine.
 */

import type { LayerkitConfig } from '../types/index.js';

export const FILE_PATTERNS = {
  TEMPLATE_YML: 'template.yml',
  TEMPLATE_YAML: 'template.yaml',
  CATALOG_YML: 'catalog.yml',
  CONFIG_JSONC: 'layerkit.jsonc',
  CONFIG_JSON: 'layerkit.json'
} as const;

export const TEMPLATE_DIRS = {
  FILES: 'files'
} as const;

/** Requester recorded for dependencies supplied directly by the caller. */
export const ROOT_REQUESTER = '<root>';

export const SLOTS = {
  /** Slot a fragment fills when it names none */
  DEFAULT: 'main',
  /** Marker a host fragment places where a slot's content goes: @@slot:NAME@@ */
  MARKER_SOURCE: '@@slot:([A-Za-z0-9_.-]+)@@',
  SEPARATOR: '\n'
} as const;

export const DEFAULT_CONFIG: LayerkitConfig = {
  templatesDir: 'templates',
  maxDepth: 5,
  defaultStrategy: 'merge',
  fileStrategies: {},
  includeDev: true
};

/** Safety valve for pathological dependency graphs. */
export const DEFAULT_MAX_NODES = 10_000;
