import { readFileSync } from 'fs';

/**
 * Version of the CLI package, read from its package.json.
 */
export function getVersion(): string {
  try {
    const raw: unknown = JSON.parse(readFileSync(new URL('../../package.json', import.meta.url), 'utf8'));
    if (typeof raw === 'object' && raw !== null && 'version' in raw && typeof raw.version === 'string') {
      return raw.version;
    }
  } catch {
    // Fall through to the placeholder below
  }
  return '0.0.0';
}
