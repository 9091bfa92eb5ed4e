import { describe, it, expect } from 'vitest';
import { mergeSections } from '../compiler/merge.js';

describe('mergeSections', () => {
  it('lets overlay keys win inside a shared section', () => {
    const merged = mergeSections(
      { Unit: { Description: 'from extraConfig', After: 'network-online.target' } },
      { Unit: { Description: 'computed' } },
    );
    expect(merged).toEqual({
      Unit: { Description: 'computed', After: 'network-online.target' },
    });
  });

  it('keeps sections that only one layer has', () => {
    const merged = mergeSections(
      { Service: { Nice: 19 } },
      { Unit: { Description: 'computed' } },
    );
    expect(merged).toEqual({
      Service: { Nice: 19 },
      Unit: { Description: 'computed' },
    });
  });

  it('does not mutate either layer', () => {
    const base = { Service: { ExecStart: '/bin/false' } };
    const overlay = { Service: { ExecStart: '/bin/true' } };
    mergeSections(base, overlay);
    expect(base).toEqual({ Service: { ExecStart: '/bin/false' } });
    expect(overlay).toEqual({ Service: { ExecStart: '/bin/true' } });
  });

  it('ignores prototype-polluting keys', () => {
    const base = JSON.parse('{"__proto__": {"polluted": "yes"}, "Service": {"constructor": "x", "Nice": 1}}');
    const merged = mergeSections(base, {});
    expect(merged).toEqual({ Service: { Nice: 1 } });
    expect(Object.prototype).not.toHaveProperty('polluted');
  });

  it('handles section names that shadow Object.prototype members', () => {
    const merged = mergeSections({ toString: { A: 1 } }, { toString: { B: 2 } });
    expect(merged.toString).toEqual({ A: 1, B: 2 });
  });
});
