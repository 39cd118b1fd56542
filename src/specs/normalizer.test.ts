import { describe, it, expect } from 'vitest';
import { normalizeSpecKey, normalizeSpecs } from './normalizer.js';

describe('normalizeSpecKey', () => {
  it('lower-cases and replaces spaces and hyphens with underscores', () => {
    expect(normalizeSpecKey(' Screen Size ')).toBe('screen_size');
    expect(normalizeSpecKey('RAM-Type')).toBe('ram_type');
    expect(normalizeSpecKey('refresh - rate')).toBe('refresh_rate');
  });
});

describe('normalizeSpecs', () => {
  it('returns an empty map for empty or non-object input', () => {
    expect(normalizeSpecs({})).toEqual({});
    expect(normalizeSpecs(null)).toEqual({});
    expect(normalizeSpecs(['256GB'])).toEqual({});
  });

  it('normalizes keys and string values', () => {
    expect(
      normalizeSpecs({
        Storage: '1TB',
        'RAM Size': '8GB RAM',
        'Screen-Size': '6.7 inch',
        Color: ' Titanium Blue ',
        'Battery mAh': '4500',
      }),
    ).toEqual({
      storage: 1024,
      ram_size: 8,
      screen_size: 6.7,
      color: 'titanium blue',
      battery_mah: 4500,
    });
  });

  it('passes non-string values through', () => {
    const ports = ['usb-c', 'hdmi'];
    const result = normalizeSpecs({ Weight: 1.4, '5G': true, Ports: ports, Extra: null });
    expect(result).toEqual({ weight: 1.4, '5g': true, ports, extra: null });
    expect(result.ports).toBe(ports);
  });

  it('is idempotent', () => {
    const inputs: Array<Record<string, unknown>> = [
      {},
      { Storage: '256GB', Model: 'Pixel 8 Pro', 'Display Size': '6.7"' },
      { ram: '512 MB', cpu: '  Octa-Core ', 'Refresh Rate': '120', nested: { a: 1 } },
      { 'Camera-MP': '50MP', Weight: 187, Notes: '' },
    ];

    for (const specs of inputs) {
      const once = normalizeSpecs(specs);
      expect(normalizeSpecs(once)).toEqual(once);
    }
  });
});
