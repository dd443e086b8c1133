import { describe, expect, it } from 'vitest';
import registry from '../src/metrics/descriptors.js';
import { isEnabled, labelText, normalizeValue, type MetricInstance } from '../src/metrics/normalize.js';

function valueOf(instance: MetricInstance) {
  if (!isEnabled(instance)) {
    throw new Error(`expected ${instance.descriptor.name} to be enabled`);
  }
  return instance.value;
}

describe('normalizeValue', () => {
  it('converts MiB readings to bytes', () => {
    const instance = normalizeValue(registry.describe('memory.total'), ' 16130 MiB');
    expect(valueOf(instance)).toEqual({ kind: 'integer', value: 16913530880 });
  });

  it('converts percentages to ratios', () => {
    expect(valueOf(normalizeValue(registry.describe('utilization.gpu'), '97 %'))).toEqual({
      kind: 'float',
      value: 0.97
    });
    expect(valueOf(normalizeValue(registry.describe('utilization.memory'), '5 %'))).toEqual({
      kind: 'float',
      value: 0.05
    });
  });

  it('keeps watts and celsius unscaled', () => {
    expect(valueOf(normalizeValue(registry.describe('power.draw'), '30.65 W'))).toEqual({
      kind: 'float',
      value: 30.65
    });
    expect(valueOf(normalizeValue(registry.describe('temperature.gpu'), '36'))).toEqual({
      kind: 'integer',
      value: 36
    });
  });

  it('keeps the text of hex fields while validating them', () => {
    const value = valueOf(normalizeValue(registry.describe('pci.device_id'), ' 0x13B210DE'));
    expect(value).toEqual({ kind: 'hex', text: '0x13B210DE', value: 0x13b210de });
    expect(labelText(value)).toBe('0x13B210DE');
  });

  it('keeps string fields verbatim, spaces included', () => {
    const value = valueOf(normalizeValue(registry.describe('gpu_name'), '  Tesla M10 '));
    expect(value).toEqual({ kind: 'string', text: 'Tesla M10' });
  });

  it('disables fields reported as not supported', () => {
    for (const name of ['gpu_serial', 'fan.speed', 'memory.used', 'power.limit']) {
      const instance = normalizeValue(registry.describe(name), '  [Not Supported] ');
      expect(instance).toMatchObject({ enabled: false, reason: 'not-supported' });
    }
  });

  it('disables malformed numeric fields instead of throwing', () => {
    expect(normalizeValue(registry.describe('fan.speed'), 'N/A')).toMatchObject({
      enabled: false,
      reason: 'malformed'
    });
    expect(normalizeValue(registry.describe('power.draw'), 'abc W')).toMatchObject({
      enabled: false,
      reason: 'malformed'
    });
    expect(normalizeValue(registry.describe('pci.bus'), '0xZZ')).toMatchObject({
      enabled: false,
      reason: 'malformed'
    });
    expect(normalizeValue(registry.describe('temperature.gpu'), '36.5')).toMatchObject({
      enabled: false,
      reason: 'malformed'
    });
  });

  it('disables empty fields', () => {
    expect(normalizeValue(registry.describe('memory.free'), '   ')).toMatchObject({
      enabled: false,
      reason: 'empty'
    });
    expect(normalizeValue(registry.describe('driver_version'), '')).toMatchObject({
      enabled: false,
      reason: 'empty'
    });
  });

  it('reports whether an instance carries a value', () => {
    expect(isEnabled(normalizeValue(registry.describe('temperature.gpu'), '36'))).toBe(true);
    expect(isEnabled(normalizeValue(registry.describe('temperature.gpu'), '[Not Supported]'))).toBe(false);
  });

  it('keeps the raw field on the instance', () => {
    const instance = normalizeValue(registry.describe('memory.used'), ' 130 MiB');
    expect(instance.raw).toBe(' 130 MiB');
  });
});
