import { fileURLToPath } from 'url';
import { parseConfigText } from '../../src/config/parse.js';
import type { TConfigTable } from '../../src/config/types.js';

const FIXTURE_DIR = new URL('../../fixtures/toml/', import.meta.url);

/** Absolute path of a file under fixtures/toml */
export function fixturePath(name: string): string {
  return fileURLToPath(new URL(name, FIXTURE_DIR));
}

/** Parse an inline TOML snippet, dropping common indentation */
export function toml(source: string): TConfigTable {
  const lines = source.split('\n');
  const indents = lines.filter((l) => l.trim()).map((l) => l.length - l.trimStart().length);
  const margin = indents.length > 0 ? Math.min(...indents) : 0;
  return parseConfigText(lines.map((l) => l.slice(margin)).join('\n'), 'inline.toml');
}
