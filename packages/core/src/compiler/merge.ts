import type { UnitSections, UnitValue } from './types.js';

const UNSAFE_KEYS = new Set(['__proto__', 'constructor', 'prototype']);

/**
 * Layer `overlay` on top of `base`, section by section.
 * Within a section present in both, overlay keys win; every other key and section is kept.
 * Neither input is mutated.
 */
export function mergeSections(base: UnitSections, overlay: UnitSections): Record<string, Record<string, UnitValue>> {
  const merged: Record<string, Record<string, UnitValue>> = {};
  for (const layer of [base, overlay]) {
    for (const [sectionName, section] of Object.entries(layer)) {
      if (UNSAFE_KEYS.has(sectionName)) continue;
      const target = Object.hasOwn(merged, sectionName) ? merged[sectionName] : {};
      for (const [key, value] of Object.entries(section)) {
        if (UNSAFE_KEYS.has(key)) continue;
        target[key] = value;
      }
      merged[sectionName] = target;
    }
  }
  return merged;
}
