import type { Logger } from 'pino';
import logger from '../logger.js';
import { FieldCountMismatchError } from '../errors.js';
import defaultRegistry, { type MetricRegistry } from './descriptors.js';
import { isEnabled, labelText, normalizeValue, type MetricInstance } from './normalize.js';
import { formatInstance, type Label, type LabelSet } from './exposition.js';
import { MetricCollection } from './collection.js';

export type PassOptions = {
  registry?: MetricRegistry;
  log?: Pick<Logger, 'debug'>;
};

export type RowSummary = {
  samples: number;
  disabled: string[];
};

export type PassResult = {
  text: string;
  rows: number;
  samples: number;
  metrics: number;
  disabled: number;
};

function stripUnit(field: string): string {
  return field.trim().replace(/\s*\[[^\]]*\]$/, '');
}

export function isBlankRow(fields: readonly string[]): boolean {
  return fields.every(field => field.trim().length === 0);
}

/**
 * nvidia-smi prints the queried field names (with a bracketed unit where one
 * applies) as the first CSV line unless asked not to.
 */
export function isHeaderRow(fields: readonly string[], registry: MetricRegistry = defaultRegistry): boolean {
  const [first] = registry.names();
  return fields.length > 0 && first !== undefined && stripUnit(fields[0]) === first;
}

export function buildLabelSet(instances: ReadonlyMap<string, MetricInstance>, registry: MetricRegistry): LabelSet {
  const labels: Label[] = [];
  for (const name of registry.labelNames()) {
    const instance = instances.get(name);
    if (!instance || !isEnabled(instance)) {
      continue;
    }
    labels.push({ name, value: labelText(instance.value) });
  }
  return labels;
}

/**
 * Normalizes one device row and feeds its samples into the collection.
 *
 * Every call builds its own instance map from the read-only registry, so a
 * field disabled on one device never affects another.
 */
export function processRow(
  fields: readonly string[],
  collection: MetricCollection,
  options: PassOptions & { rowNumber?: number } = {}
): RowSummary {
  const registry = options.registry ?? defaultRegistry;
  const names = registry.names();
  const rowNumber = options.rowNumber ?? 1;

  if (fields.length !== names.length) {
    throw new FieldCountMismatchError(names.length, fields.length, rowNumber);
  }

  const instances = new Map<string, MetricInstance>();
  names.forEach((name, position) => {
    instances.set(name, normalizeValue(registry.describe(name), fields[position]));
  });

  const disabled: string[] = [];
  for (const instance of instances.values()) {
    if (!isEnabled(instance)) {
      disabled.push(instance.descriptor.name);
      (options.log ?? logger).debug(
        { metric: instance.descriptor.name, reason: instance.reason, raw: instance.raw, row: rowNumber },
        'metric disabled for device'
      );
    }
  }

  const labels = buildLabelSet(instances, registry);
  let samples = 0;
  for (const [name, instance] of instances) {
    if (registry.isLabel(name)) {
      continue;
    }
    const record = formatInstance(instance, labels, { prefix: registry.prefix });
    if (record) {
      samples += record.lines.length;
    }
    collection.add(record);
  }

  return { samples, disabled };
}

/**
 * Runs one collection pass over the rows of a single nvidia-smi invocation.
 *
 * Throws before returning any text when a row is misaligned or the registry
 * is inconsistent; the caller either gets a complete blob or nothing.
 */
export function collectPass(rows: readonly (readonly string[])[], options: PassOptions = {}): PassResult {
  const registry = options.registry ?? defaultRegistry;
  const collection = new MetricCollection();

  let headerPending = true;
  let processed = 0;
  let disabled = 0;
  let samples = 0;

  rows.forEach((fields, index) => {
    if (isBlankRow(fields)) {
      return;
    }
    if (headerPending) {
      headerPending = false;
      if (isHeaderRow(fields, registry)) {
        return;
      }
    }
    const summary = processRow(fields, collection, { ...options, registry, rowNumber: index + 1 });
    processed += 1;
    disabled += summary.disabled.length;
    samples += summary.samples;
  });

  return {
    text: collection.render(),
    rows: processed,
    samples,
    metrics: collection.size,
    disabled
  };
}

export function runCollectionPass(rows: readonly (readonly string[])[], options: PassOptions = {}): string {
  return collectPass(rows, options).text;
}

export { MetricCollection } from './collection.js';
export { normalizeValue } from './normalize.js';
export { formatInstance, formatLabels } from './exposition.js';
export { createRegistry, MetricRegistry, exposedName } from './descriptors.js';
export type { MetricDescriptor, ValueKind } from './descriptors.js';
export type { MetricInstance, MetricValue } from './normalize.js';
export type { ExpositionRecord, LabelSet } from './exposition.js';
