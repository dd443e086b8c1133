import { DEFAULT_METRIC_PREFIX, exposedName } from './descriptors.js';
import { formatFloat, labelText, type MetricInstance, type MetricValue } from './normalize.js';

export type Label = {
  readonly name: string;
  readonly value: string;
};

/** Ordered label pairs; order is preserved when rendered. */
export type LabelSet = readonly Label[];

export type ExpositionRecord = {
  exposedName: string;
  helpLine: string;
  typeLine: string;
  lines: string[];
};

export type FormatOptions = {
  prefix?: string;
};

export function sanitizeLabelName(name: string): string {
  const sanitized = name.replace(/[^A-Za-z0-9_]/g, '_');
  if (!sanitized) {
    return 'label';
  }
  if (/^[0-9]/.test(sanitized)) {
    return `_${sanitized}`;
  }
  return sanitized;
}

export function escapeLabelValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/\n/g, '\\n').replace(/"/g, '\\"');
}

export function escapeHelp(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/\n/g, '\\n');
}

export function formatLabels(labels: LabelSet): string {
  if (labels.length === 0) {
    return '';
  }
  const rendered = labels.map(
    label => `${sanitizeLabelName(label.name)}="${escapeLabelValue(label.value)}"`
  );
  return `{${rendered.join(', ')}}`;
}

export function formatSampleValue(value: MetricValue): string {
  switch (value.kind) {
    case 'string':
      return '1';
    case 'integer':
    case 'hex':
      return String(value.value);
    case 'float':
      return formatFloat(value.value);
    default: {
      const unreachable: never = value;
      return unreachable;
    }
  }
}

/**
 * Renders one metric instance as a gauge sample.
 *
 * String values follow the info-metric pattern: the text becomes an extra
 * label after the base labels and the sample value is 1.
 */
export function formatInstance(
  instance: MetricInstance,
  labels: LabelSet,
  options: FormatOptions = {}
): ExpositionRecord | null {
  if (!instance.enabled) {
    return null;
  }

  const { descriptor, value } = instance;
  const name = exposedName(descriptor, options.prefix ?? DEFAULT_METRIC_PREFIX);
  const sampleLabels: LabelSet =
    value.kind === 'string' ? [...labels, { name: descriptor.name, value: labelText(value) }] : labels;

  return {
    exposedName: name,
    helpLine: `# HELP ${name} ${escapeHelp(descriptor.description)}`,
    typeLine: `# TYPE ${name} gauge`,
    lines: [`${name}${formatLabels(sampleLabels)} ${formatSampleValue(value)}`]
  };
}
