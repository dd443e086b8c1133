import { describe, expect, it, vi } from 'vitest';
import registry, { createRegistry } from '../src/metrics/descriptors.js';
import {
  collectPass,
  isHeaderRow,
  processRow,
  runCollectionPass
} from '../src/metrics/index.js';
import { MetricCollection } from '../src/metrics/collection.js';
import { FieldCountMismatchError } from '../src/errors.js';

const M10_ROW = [
  '440.100',
  '0322918011111',
  'Tesla M10',
  '0',
  '23 %',
  '5 %',
  '16130 MiB',
  '16000 MiB',
  '130 MiB',
  '36',
  'N/A',
  '30.65 W',
  '150.00 W',
  '0x0',
  '0x00',
  '0x04',
  '0x13B210DE',
  '3',
  '3',
  '16',
  '16'
];

const M10_LABELS =
  '{gpu_serial="0322918011111", gpu_name="Tesla M10", index="0", pci_domain="0x0", pci_bus="0x00", pci_device="0x04", pci_device_id="0x13B210DE"}';

const HEADER = [
  'driver_version',
  ' serial',
  ' name',
  ' index',
  ' utilization.gpu [%]',
  ' utilization.memory [%]',
  ' memory.total [MiB]',
  ' memory.free [MiB]',
  ' memory.used [MiB]',
  ' temperature.gpu',
  ' fan.speed [%]',
  ' power.draw [W]',
  ' power.limit [W]',
  ' pci.domain',
  ' pci.bus',
  ' pci.device',
  ' pci.device_id',
  ' pcie.link.gen.current',
  ' pcie.link.gen.max',
  ' pcie.link.width.current',
  ' pcie.link.width.max'
];

function withField(row: string[], name: string, value: string): string[] {
  const copy = [...row];
  copy[registry.names().indexOf(name)] = value;
  return copy;
}

const silent = { debug: vi.fn() };

describe('processRow', () => {
  it('renders every supported reading of one device', () => {
    const collection = new MetricCollection();
    const summary = processRow(M10_ROW, collection, { log: silent });

    expect(summary).toEqual({ samples: 13, disabled: ['fan.speed'] });
    expect(collection.render()).toBe(
      [
        '# HELP nvsmi_driver_version_info NVIDIA display driver version',
        '# TYPE nvsmi_driver_version_info gauge',
        `nvsmi_driver_version_info${M10_LABELS.slice(0, -1)}, driver_version="440.100"} 1`,
        '# HELP nvsmi_utilization_gpu_ratio fraction of time the GPU was busy',
        '# TYPE nvsmi_utilization_gpu_ratio gauge',
        `nvsmi_utilization_gpu_ratio${M10_LABELS} 0.23`,
        '# HELP nvsmi_utilization_memory_ratio fraction of time GPU RAM was read / written',
        '# TYPE nvsmi_utilization_memory_ratio gauge',
        `nvsmi_utilization_memory_ratio${M10_LABELS} 0.05`,
        '# HELP nvsmi_memory_total_bytes total installed GPU RAM',
        '# TYPE nvsmi_memory_total_bytes gauge',
        `nvsmi_memory_total_bytes${M10_LABELS} 16913530880`,
        '# HELP nvsmi_memory_free_bytes total free GPU RAM',
        '# TYPE nvsmi_memory_free_bytes gauge',
        `nvsmi_memory_free_bytes${M10_LABELS} 16777216000`,
        '# HELP nvsmi_memory_used_bytes total GPU RAM allocated by active contexts',
        '# TYPE nvsmi_memory_used_bytes gauge',
        `nvsmi_memory_used_bytes${M10_LABELS} 136314880`,
        '# HELP nvsmi_temperature_gpu_celsius core GPU temperature',
        '# TYPE nvsmi_temperature_gpu_celsius gauge',
        `nvsmi_temperature_gpu_celsius${M10_LABELS} 36`,
        '# HELP nvsmi_power_draw_watts power draw for the entire board',
        '# TYPE nvsmi_power_draw_watts gauge',
        `nvsmi_power_draw_watts${M10_LABELS} 30.65`,
        '# HELP nvsmi_power_limit_watts software power limit',
        '# TYPE nvsmi_power_limit_watts gauge',
        `nvsmi_power_limit_watts${M10_LABELS} 150.0`,
        '# HELP nvsmi_pcie_link_gen_current current PCI-E link generation',
        '# TYPE nvsmi_pcie_link_gen_current gauge',
        `nvsmi_pcie_link_gen_current${M10_LABELS} 3`,
        '# HELP nvsmi_pcie_link_gen_max maximum PCI-E link generation possible with this GPU and system',
        '# TYPE nvsmi_pcie_link_gen_max gauge',
        `nvsmi_pcie_link_gen_max${M10_LABELS} 3`,
        '# HELP nvsmi_pcie_link_width_current current PCI-E link width',
        '# TYPE nvsmi_pcie_link_width_current gauge',
        `nvsmi_pcie_link_width_current${M10_LABELS} 16`,
        '# HELP nvsmi_pcie_link_width_max maximum PCI-E link width possible with this GPU and system configuration',
        '# TYPE nvsmi_pcie_link_width_max gauge',
        `nvsmi_pcie_link_width_max${M10_LABELS} 16`,
        ''
      ].join('\n')
    );
  });

  it('logs disabled readings at debug level', () => {
    const log = { debug: vi.fn() };
    processRow(M10_ROW, new MetricCollection(), { log, rowNumber: 2 });
    expect(log.debug).toHaveBeenCalledTimes(1);
    expect(log.debug).toHaveBeenCalledWith(
      { metric: 'fan.speed', reason: 'malformed', raw: 'N/A', row: 2 },
      'metric disabled for device'
    );
  });

  it('omits disabled label fields instead of emitting empty labels', () => {
    const collection = new MetricCollection();
    processRow(withField(M10_ROW, 'gpu_serial', '[Not Supported]'), collection, { log: silent });
    const lines = collection.render().split('\n');
    expect(lines).toContain(
      'nvsmi_temperature_gpu_celsius{gpu_name="Tesla M10", index="0", pci_domain="0x0", pci_bus="0x00", pci_device="0x04", pci_device_id="0x13B210DE"} 36'
    );
  });

  it('rejects rows whose field count differs from the query', () => {
    expect(() => processRow(M10_ROW.slice(1), new MetricCollection(), { rowNumber: 4 })).toThrow(
      FieldCountMismatchError
    );
    expect(() => processRow(M10_ROW.slice(1), new MetricCollection(), { rowNumber: 4 })).toThrow(
      'Row 4 has 20 fields, expected 21'
    );
  });
});

describe('collectPass', () => {
  it('emits one header per metric across devices', () => {
    const second = withField(
      withField(withField(M10_ROW, 'index', '1'), 'gpu_serial', '0322918022222'),
      'memory.used',
      '8 MiB'
    );
    const text = runCollectionPass([M10_ROW, second], { log: silent });
    const lines = text.split('\n');

    expect(lines.filter(line => line === '# HELP nvsmi_memory_used_bytes total GPU RAM allocated by active contexts')).toHaveLength(1);
    expect(lines.filter(line => line === '# TYPE nvsmi_memory_used_bytes gauge')).toHaveLength(1);

    const start = lines.indexOf('# TYPE nvsmi_memory_used_bytes gauge');
    expect(lines[start + 1]).toBe(`nvsmi_memory_used_bytes${M10_LABELS} 136314880`);
    expect(lines[start + 2]).toBe(
      'nvsmi_memory_used_bytes{gpu_serial="0322918022222", gpu_name="Tesla M10", index="1", pci_domain="0x0", pci_bus="0x00", pci_device="0x04", pci_device_id="0x13B210DE"} 8388608'
    );
  });

  it('keeps a reading disabled on one device only on that device', () => {
    const first = withField(M10_ROW, 'power.draw', '[Not Supported]');
    const second = withField(withField(M10_ROW, 'index', '1'), 'fan.speed', '45 %');
    const text = runCollectionPass([first, second], { log: silent });
    const lines = text.split('\n');

    expect(lines.filter(line => line.startsWith('nvsmi_power_draw_watts{'))).toEqual([
      'nvsmi_power_draw_watts{gpu_serial="0322918011111", gpu_name="Tesla M10", index="1", pci_domain="0x0", pci_bus="0x00", pci_device="0x04", pci_device_id="0x13B210DE"} 30.65'
    ]);
    expect(lines.filter(line => line.startsWith('nvsmi_fan_speed{'))).toEqual([
      'nvsmi_fan_speed{gpu_serial="0322918011111", gpu_name="Tesla M10", index="1", pci_domain="0x0", pci_bus="0x00", pci_device="0x04", pci_device_id="0x13B210DE"} 45'
    ]);
  });

  it('drops the header row and blank rows', () => {
    const result = collectPass([HEADER, [''], M10_ROW, ['  ', ' ']], { log: silent });
    expect(result.rows).toBe(1);
    expect(result.samples).toBe(13);
    expect(result.metrics).toBe(13);
    expect(result.disabled).toBe(1);
    expect(result.text).toBe(runCollectionPass([M10_ROW], { log: silent }));
  });

  it('treats the first row as data when it is not a header', () => {
    expect(isHeaderRow(HEADER)).toBe(true);
    expect(isHeaderRow(M10_ROW)).toBe(false);
    expect(collectPass([M10_ROW], { log: silent }).rows).toBe(1);
  });

  it('only looks for the header in the first non-blank row', () => {
    expect(collectPass([[''], HEADER, M10_ROW], { log: silent }).rows).toBe(1);
    expect(collectPass([M10_ROW, HEADER], { log: silent }).rows).toBe(2);
  });

  it('produces every non-label metric exactly once for a well-formed row', () => {
    const row = withField(M10_ROW, 'fan.speed', '30 %');
    const text = runCollectionPass([row], { log: silent });
    const sampleNames = text
      .split('\n')
      .filter(line => line.length > 0 && !line.startsWith('#'))
      .map(line => line.slice(0, line.indexOf('{')));
    const expected = registry
      .names()
      .filter(name => !registry.isLabel(name))
      .map(name => registry.exposedName(name));
    expect(sampleNames).toEqual(expected);
  });

  it('is deterministic for identical input', () => {
    const rows = [M10_ROW, withField(M10_ROW, 'index', '1')];
    expect(runCollectionPass(rows, { log: silent })).toBe(runCollectionPass(rows, { log: silent }));
  });

  it('returns no text when a later row is misaligned', () => {
    expect(() => runCollectionPass([M10_ROW, M10_ROW.slice(0, 5)], { log: silent })).toThrow(
      'Row 2 has 5 fields, expected 21'
    );
  });

  it('returns an empty blob when there are no devices', () => {
    expect(runCollectionPass([HEADER])).toBe('');
    expect(runCollectionPass([])).toBe('');
  });

  it('uses the prefix of the given registry', () => {
    const custom = createRegistry({ prefix: 'gpu_' });
    const text = runCollectionPass([M10_ROW], { registry: custom, log: silent });
    expect(text.startsWith('# HELP gpu_driver_version_info NVIDIA display driver version\n')).toBe(true);
  });
});
