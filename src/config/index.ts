import fs from 'node:fs';
import path from 'node:path';
import config from 'config';
import { ConfigValidationError } from '../errors.js';

export type AppConfig = {
  name: string;
};

export type LoggingConfig = {
  level: string;
};

export type ExporterConfig = {
  smiPath: string;
  timeoutMs: number;
  maxBufferBytes: number;
  metricPrefix: string;
  outputPath: string | null;
};

export type ExporterAppConfig = {
  app: AppConfig;
  logging: LoggingConfig;
  exporter: ExporterConfig;
};

type JsonType = 'object' | 'number' | 'string' | 'null';

type JsonSchema = {
  type: JsonType | JsonType[];
  properties?: Record<string, JsonSchema>;
  required?: string[];
  additionalProperties?: boolean;
  enum?: string[];
  minimum?: number;
};

const exporterConfigSchema: JsonSchema = {
  type: 'object',
  required: ['app', 'logging', 'exporter'],
  additionalProperties: true,
  properties: {
    app: {
      type: 'object',
      required: ['name'],
      additionalProperties: false,
      properties: {
        name: { type: 'string' }
      }
    },
    logging: {
      type: 'object',
      required: ['level'],
      additionalProperties: false,
      properties: {
        level: {
          type: 'string',
          enum: ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']
        }
      }
    },
    exporter: {
      type: 'object',
      required: ['smiPath', 'timeoutMs', 'maxBufferBytes', 'metricPrefix', 'outputPath'],
      additionalProperties: false,
      properties: {
        smiPath: { type: 'string' },
        timeoutMs: { type: 'number', minimum: 1 },
        maxBufferBytes: { type: 'number', minimum: 1024 },
        metricPrefix: { type: 'string' },
        outputPath: { type: ['string', 'null'] }
      }
    }
  }
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Checks `value` against one schema, returning every violation found. */
function validateAgainstSchema(schema: JsonSchema, value: unknown, pathLabel: string): string[] {
  const types = Array.isArray(schema.type) ? schema.type : [schema.type];
  const results = types.map(type => validateType(type, schema, value, pathLabel));

  if (results.some(errors => errors.length === 0)) {
    return [];
  }

  return results[0] ?? [];
}

function validateObject(schema: JsonSchema, value: unknown, pathLabel: string): string[] {
  if (!isRecord(value)) {
    return [`${pathLabel} must be an object`];
  }

  const properties = schema.properties ?? {};
  const errors = (schema.required ?? [])
    .filter(key => !(key in value))
    .map(key => `${pathLabel}.${key} is required`);

  if (schema.additionalProperties === false) {
    for (const key of Object.keys(value)) {
      if (!(key in properties)) {
        errors.push(`${pathLabel}.${key} is not allowed`);
      }
    }
  }

  for (const [key, childSchema] of Object.entries(properties)) {
    if (key in value) {
      errors.push(...validateAgainstSchema(childSchema, value[key], `${pathLabel}.${key}`));
    }
  }

  return errors;
}

function validateType(type: JsonType, schema: JsonSchema, value: unknown, pathLabel: string): string[] {
  switch (type) {
    case 'object':
      return validateObject(schema, value, pathLabel);
    case 'number':
      if (typeof value !== 'number' || Number.isNaN(value)) {
        return [`${pathLabel} must be a number`];
      }
      return typeof schema.minimum === 'number' && value < schema.minimum
        ? [`${pathLabel} must be >= ${schema.minimum}`]
        : [];
    case 'string':
      if (typeof value !== 'string') {
        return [`${pathLabel} must be a string`];
      }
      return schema.enum && !schema.enum.includes(value)
        ? [`${pathLabel} must be one of ${schema.enum.join(', ')}`]
        : [];
    case 'null':
      return value === null ? [] : [`${pathLabel} must be null`];
    default: {
      const unreachable: never = type;
      return unreachable;
    }
  }
}

function validateLogicalConfig(value: ExporterAppConfig): string[] {
  const messages: string[] = [];
  const { exporter } = value;

  if (exporter.metricPrefix && !/^[a-zA-Z_:][a-zA-Z0-9_:]*$/.test(exporter.metricPrefix)) {
    messages.push('config.exporter.metricPrefix must be a valid metric name prefix');
  }

  if (!exporter.smiPath.trim()) {
    messages.push('config.exporter.smiPath must not be empty');
  }

  if (exporter.outputPath !== null && !exporter.outputPath.trim()) {
    messages.push('config.exporter.outputPath must be null or a path');
  }

  return messages;
}

export function validateConfig(value: unknown): asserts value is ExporterAppConfig {
  const errors = validateAgainstSchema(exporterConfigSchema, value, 'config');
  if (errors.length > 0) {
    throw new ConfigValidationError(errors);
  }
  const logical = validateLogicalConfig(value as ExporterAppConfig);
  if (logical.length > 0) {
    throw new ConfigValidationError(logical);
  }
}

export function parseConfig(contents: string): ExporterAppConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(contents);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigValidationError([`Failed to parse configuration: ${message}`]);
  }

  validateConfig(parsed);
  return parsed;
}

export function loadConfigFromFile(filePath: string): ExporterAppConfig {
  const resolvedPath = path.resolve(filePath);
  const contents = fs.readFileSync(resolvedPath, 'utf-8');
  return parseConfig(contents);
}

/** Reads the configuration the `config` package assembled from config/. */
export function resolveConfig(): ExporterAppConfig {
  const value: unknown = config.util.toObject();
  validateConfig(value);
  return value;
}
