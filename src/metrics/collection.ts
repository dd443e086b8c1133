import { ExpositionConflictError } from '../errors.js';
import type { ExpositionRecord } from './exposition.js';

type StoredRecord = {
  helpLine: string;
  typeLine: string;
  lines: string[];
};

/**
 * Groups exposition records by exposed name so every metric gets exactly one
 * HELP/TYPE header, whatever the number of devices reporting it.
 */
export class MetricCollection {
  // Map iteration follows insertion order, which is the render order.
  private readonly records = new Map<string, StoredRecord>();

  add(record: ExpositionRecord | null): void {
    if (!record) {
      return;
    }

    const existing = this.records.get(record.exposedName);
    if (!existing) {
      this.records.set(record.exposedName, {
        helpLine: record.helpLine,
        typeLine: record.typeLine,
        lines: [...record.lines]
      });
      return;
    }

    if (existing.helpLine !== record.helpLine) {
      throw new ExpositionConflictError(
        record.exposedName,
        `HELP "${record.helpLine}" differs from "${existing.helpLine}"`
      );
    }
    if (existing.typeLine !== record.typeLine) {
      throw new ExpositionConflictError(
        record.exposedName,
        `TYPE "${record.typeLine}" differs from "${existing.typeLine}"`
      );
    }
    existing.lines.push(...record.lines);
  }

  get size(): number {
    return this.records.size;
  }

  names(): string[] {
    return Array.from(this.records.keys());
  }

  sampleCount(): number {
    let total = 0;
    for (const record of this.records.values()) {
      total += record.lines.length;
    }
    return total;
  }

  render(): string {
    const lines: string[] = [];
    for (const record of this.records.values()) {
      lines.push(record.helpLine, record.typeLine, ...record.lines);
    }
    return lines.map(line => `${line}\n`).join('');
  }
}
