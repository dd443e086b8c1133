import type { MetricDescriptor } from './descriptors.js';

export const NOT_SUPPORTED = '[Not Supported]';

export const MEBIBYTE = 1024 * 1024;

export type DisableReason = 'not-supported' | 'empty' | 'malformed';

export type MetricValue =
  | { kind: 'string'; text: string }
  | { kind: 'integer'; value: number }
  | { kind: 'float'; value: number }
  | { kind: 'hex'; text: string; value: number };

export type MetricInstance =
  | {
      descriptor: MetricDescriptor;
      raw: string;
      enabled: true;
      value: MetricValue;
    }
  | {
      descriptor: MetricDescriptor;
      raw: string;
      enabled: false;
      reason: DisableReason;
    };

export type EnabledMetricInstance = Extract<MetricInstance, { enabled: true }>;

const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const HEX_PATTERN = /^(?:0[xX])?([0-9a-fA-F]+)$/;

function parseInteger(token: string): number | null {
  if (!INTEGER_PATTERN.test(token)) {
    return null;
  }
  const parsed = Number.parseInt(token, 10);
  return Number.isSafeInteger(parsed) ? parsed : null;
}

function parseFloatStrict(token: string): number | null {
  if (!FLOAT_PATTERN.test(token)) {
    return null;
  }
  const parsed = Number(token);
  return Number.isFinite(parsed) ? parsed : null;
}

function parseHex(token: string): number | null {
  const match = HEX_PATTERN.exec(token);
  if (!match) {
    return null;
  }
  const parsed = Number.parseInt(match[1], 16);
  return Number.isSafeInteger(parsed) ? parsed : null;
}

function convert(descriptor: MetricDescriptor, token: string): MetricValue | null {
  switch (descriptor.valueKind) {
    case 'string':
      return { kind: 'string', text: token };
    case 'integerRaw':
    case 'celsius': {
      const value = parseInteger(token);
      return value === null ? null : { kind: 'integer', value };
    }
    case 'hex': {
      const value = parseHex(token);
      return value === null ? null : { kind: 'hex', text: token, value };
    }
    case 'percentRatio': {
      const value = parseFloatStrict(token);
      return value === null ? null : { kind: 'float', value: value / 100.0 };
    }
    case 'megabytesToBytes': {
      const value = parseInteger(token);
      if (value === null) {
        return null;
      }
      const bytes = value * MEBIBYTE;
      return Number.isSafeInteger(bytes) ? { kind: 'integer', value: bytes } : null;
    }
    case 'watts': {
      const value = parseFloatStrict(token);
      return value === null ? null : { kind: 'float', value };
    }
    default: {
      const unreachable: never = descriptor.valueKind;
      return unreachable;
    }
  }
}

/**
 * Turns one raw nvidia-smi field into a typed value.
 *
 * Never throws: unsupported, empty and malformed fields produce a disabled
 * instance, which only silences this metric for this device.
 */
export function normalizeValue(descriptor: MetricDescriptor, raw: string): MetricInstance {
  const trimmed = raw.trim();

  if (trimmed === NOT_SUPPORTED) {
    return { descriptor, raw, enabled: false, reason: 'not-supported' };
  }

  if (trimmed.length === 0) {
    return { descriptor, raw, enabled: false, reason: 'empty' };
  }

  if (descriptor.valueKind === 'string') {
    return { descriptor, raw, enabled: true, value: { kind: 'string', text: trimmed } };
  }

  // unit suffixes such as "MiB", "W" and "%" follow the first space
  const token = trimmed.split(' ')[0] ?? '';

  const value = convert(descriptor, token);
  if (!value) {
    return { descriptor, raw, enabled: false, reason: 'malformed' };
  }

  return { descriptor, raw, enabled: true, value };
}

export function isEnabled(instance: MetricInstance): instance is EnabledMetricInstance {
  return instance.enabled;
}

/** Text used when the value is carried as a label rather than a sample. */
export function labelText(value: MetricValue): string {
  switch (value.kind) {
    case 'string':
    case 'hex':
      return value.text;
    case 'integer':
      return String(value.value);
    case 'float':
      return formatFloat(value.value);
    default: {
      const unreachable: never = value;
      return unreachable;
    }
  }
}

export function formatFloat(value: number): string {
  return Number.isInteger(value) ? value.toFixed(1) : String(value);
}
