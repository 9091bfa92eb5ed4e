import type { UnitScalar, UnitSections, UnitValue } from '../compiler/types.js';

const SECTION_ORDER = ['Unit', 'Service', 'Timer', 'Install'];

/** Well-known sections first, in unit-file order, then the rest alphabetically. */
export function orderSections(names: readonly string[]): string[] {
  const known = SECTION_ORDER.filter(name => names.includes(name));
  const rest = names.filter(name => !SECTION_ORDER.includes(name)).sort();
  return [...known, ...rest];
}

function isList(value: UnitValue): value is readonly UnitScalar[] {
  return Array.isArray(value);
}

function formatScalar(value: UnitScalar): string {
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  return String(value);
}

/**
 * Render unit sections as systemd INI text.
 * A list value is written as one `Key=value` line per element.
 */
export function renderUnit(sections: UnitSections): string {
  const blocks: string[] = [];
  for (const name of orderSections(Object.keys(sections))) {
    const lines: string[] = [];
    for (const [key, value] of Object.entries(sections[name])) {
      const values = isList(value) ? value : [value];
      for (const item of values) lines.push(`${key}=${formatScalar(item)}`);
    }
    if (lines.length === 0) continue;
    blocks.push(`[${name}]\n${lines.join('\n')}\n`);
  }
  return blocks.join('\n');
}
