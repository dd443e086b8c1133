import { RegistryConfigurationError, UnknownMetricError } from '../errors.js';

export type ValueKind =
  | 'string'
  | 'integerRaw'
  | 'percentRatio'
  | 'megabytesToBytes'
  | 'celsius'
  | 'watts'
  | 'hex';

export type MetricDescriptor = {
  readonly name: string;
  readonly description: string;
  readonly valueKind: ValueKind;
};

export const DEFAULT_METRIC_PREFIX = 'nvsmi_';

export function unitSuffix(kind: ValueKind): string {
  switch (kind) {
    case 'percentRatio':
      return '_ratio';
    case 'megabytesToBytes':
      return '_bytes';
    case 'celsius':
      return '_celsius';
    case 'watts':
      return '_watts';
    case 'string':
      return '_info';
    case 'integerRaw':
    case 'hex':
      return '';
    default: {
      const unreachable: never = kind;
      throw new RegistryConfigurationError(`Unhandled value kind ${String(unreachable)}`);
    }
  }
}

/** Label names and metric names share this form: dots become underscores. */
export function toPrometheusName(name: string): string {
  return name.replace(/\./g, '_');
}

export function exposedName(descriptor: MetricDescriptor, prefix = DEFAULT_METRIC_PREFIX): string {
  return `${prefix}${toPrometheusName(descriptor.name)}${unitSuffix(descriptor.valueKind)}`;
}

export type MetricRegistryOptions = {
  descriptors: MetricDescriptor[];
  labels: string[];
  prefix?: string;
};

/**
 * Ordered, read-only table of the fields queried from nvidia-smi.
 *
 * The descriptor order is the query order: the n-th CSV column of a device
 * row belongs to the n-th descriptor.
 */
export class MetricRegistry {
  readonly prefix: string;
  private readonly ordered: readonly MetricDescriptor[];
  private readonly byName: ReadonlyMap<string, MetricDescriptor>;
  private readonly labelOrder: readonly string[];
  private readonly labelSet: ReadonlySet<string>;

  constructor(options: MetricRegistryOptions) {
    this.prefix = options.prefix ?? DEFAULT_METRIC_PREFIX;
    const byName = new Map<string, MetricDescriptor>();
    const exposed = new Map<string, string>();

    for (const descriptor of options.descriptors) {
      if (byName.has(descriptor.name)) {
        throw new RegistryConfigurationError(`Duplicate metric name "${descriptor.name}"`);
      }
      const exposedKey = exposedName(descriptor, this.prefix);
      const owner = exposed.get(exposedKey);
      if (owner) {
        throw new RegistryConfigurationError(
          `Metrics "${owner}" and "${descriptor.name}" both expose ${exposedKey}`
        );
      }
      exposed.set(exposedKey, descriptor.name);
      byName.set(descriptor.name, Object.freeze({ ...descriptor }));
    }

    const labelSet = new Set<string>();
    for (const label of options.labels) {
      if (!byName.has(label)) {
        throw new RegistryConfigurationError(`Label "${label}" is not a registered metric`);
      }
      if (labelSet.has(label)) {
        throw new RegistryConfigurationError(`Duplicate label "${label}"`);
      }
      labelSet.add(label);
    }

    this.byName = byName;
    this.ordered = Object.freeze(Array.from(byName.values()));
    this.labelOrder = Object.freeze([...options.labels]);
    this.labelSet = labelSet;
  }

  describe(name: string): MetricDescriptor {
    const descriptor = this.byName.get(name);
    if (!descriptor) {
      throw new UnknownMetricError(name);
    }
    return descriptor;
  }

  names(): string[] {
    return this.ordered.map(descriptor => descriptor.name);
  }

  descriptors(): readonly MetricDescriptor[] {
    return this.ordered;
  }

  isLabel(name: string): boolean {
    return this.labelSet.has(name);
  }

  labelNames(): string[] {
    return [...this.labelOrder];
  }

  exposedName(name: string): string {
    return exposedName(this.describe(name), this.prefix);
  }

  get size(): number {
    return this.ordered.length;
  }
}

export const DEFAULT_DESCRIPTORS: MetricDescriptor[] = [
  { name: 'driver_version', description: 'NVIDIA display driver version', valueKind: 'string' },
  {
    name: 'gpu_serial',
    description: 'the serial number physically printed on the board',
    valueKind: 'string'
  },
  { name: 'gpu_name', description: 'official product name of the GPU', valueKind: 'string' },
  { name: 'index', description: 'zero based index of the GPU', valueKind: 'integerRaw' },
  {
    name: 'utilization.gpu',
    description: 'fraction of time the GPU was busy',
    valueKind: 'percentRatio'
  },
  {
    name: 'utilization.memory',
    description: 'fraction of time GPU RAM was read / written',
    valueKind: 'percentRatio'
  },
  { name: 'memory.total', description: 'total installed GPU RAM', valueKind: 'megabytesToBytes' },
  { name: 'memory.free', description: 'total free GPU RAM', valueKind: 'megabytesToBytes' },
  {
    name: 'memory.used',
    description: 'total GPU RAM allocated by active contexts',
    valueKind: 'megabytesToBytes'
  },
  { name: 'temperature.gpu', description: 'core GPU temperature', valueKind: 'celsius' },
  {
    name: 'fan.speed',
    description: 'intended (NOT MEASURED!) fan speed in percent',
    valueKind: 'integerRaw'
  },
  { name: 'power.draw', description: 'power draw for the entire board', valueKind: 'watts' },
  { name: 'power.limit', description: 'software power limit', valueKind: 'watts' },
  { name: 'pci.domain', description: 'PCI domain number', valueKind: 'hex' },
  { name: 'pci.bus', description: 'PCI bus number', valueKind: 'hex' },
  { name: 'pci.device', description: 'PCI device number', valueKind: 'hex' },
  { name: 'pci.device_id', description: 'PCI vendor device id', valueKind: 'hex' },
  {
    name: 'pcie.link.gen.current',
    description: 'current PCI-E link generation',
    valueKind: 'integerRaw'
  },
  {
    name: 'pcie.link.gen.max',
    description: 'maximum PCI-E link generation possible with this GPU and system',
    valueKind: 'integerRaw'
  },
  { name: 'pcie.link.width.current', description: 'current PCI-E link width', valueKind: 'integerRaw' },
  {
    name: 'pcie.link.width.max',
    description: 'maximum PCI-E link width possible with this GPU and system configuration',
    valueKind: 'integerRaw'
  }
];

export const DEFAULT_LABELS = [
  'gpu_serial',
  'gpu_name',
  'index',
  'pci.domain',
  'pci.bus',
  'pci.device',
  'pci.device_id'
];

export function createRegistry(options: Partial<MetricRegistryOptions> = {}): MetricRegistry {
  return new MetricRegistry({
    descriptors: options.descriptors ?? DEFAULT_DESCRIPTORS,
    labels: options.labels ?? DEFAULT_LABELS,
    prefix: options.prefix
  });
}

const defaultRegistry = createRegistry();

export default defaultRegistry;
