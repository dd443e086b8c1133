import process from 'node:process';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import logger, { getAvailableLogLevels, setLogLevel } from './logger.js';
import { loadConfigFromFile, resolveConfig, type ExporterAppConfig } from './config/index.js';
import { createRegistry, type MetricRegistry } from './metrics/descriptors.js';
import { collectPass } from './metrics/index.js';
import { parseCsv } from './smi/csv.js';
import { querySmi, readSmiOutput } from './smi/query.js';
import { writeTextfile } from './textfile.js';

type Writable = Pick<NodeJS.WritableStream, 'write'>;

export type CliIo = {
  stdout: Writable;
  stderr: Writable;
};

const DEFAULT_IO: CliIo = {
  stdout: process.stdout,
  stderr: process.stderr
};

export const USAGE_LINES = [
  'gpu-textfile-exporter',
  '',
  'Queries nvidia-smi once and prints the readings in the Prometheus text format.',
  '',
  'Usage:',
  '  gpu-textfile-exporter [options]',
  '',
  'Options:',
  '  -c, --config <path>   Load configuration from a JSON file instead of config/',
  '  -o, --output <path>   Write the exposition atomically to <path> instead of stdout',
  '  -i, --input <path>    Read captured nvidia-smi CSV output instead of running nvidia-smi',
  '      --log-level <lvl> Override logging.level',
  '      --list-metrics    Print the queried fields and exit',
  '  -h, --help            Show this help message'
];

type ParsedArgs = {
  help: boolean;
  listMetrics: boolean;
  configPath: string | null;
  outputPath: string | null;
  inputPath: string | null;
  logLevel: string | null;
  errors: string[];
};

type ValueOption = 'configPath' | 'outputPath' | 'inputPath' | 'logLevel';

const VALUE_OPTIONS: Record<string, ValueOption> = {
  '-c': 'configPath',
  '--config': 'configPath',
  '-o': 'outputPath',
  '--output': 'outputPath',
  '-i': 'inputPath',
  '--input': 'inputPath',
  '--log-level': 'logLevel'
};

export function parseArgs(argv: string[]): ParsedArgs {
  const parsed: ParsedArgs = {
    help: false,
    listMetrics: false,
    configPath: null,
    outputPath: null,
    inputPath: null,
    logLevel: null,
    errors: []
  };

  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index];
    if (!token) {
      continue;
    }

    if (token === '-h' || token === '--help') {
      parsed.help = true;
      continue;
    }

    if (token === '--list-metrics') {
      parsed.listMetrics = true;
      continue;
    }

    const separator = token.indexOf('=');
    const flag = separator > 0 ? token.slice(0, separator) : token;
    const key = VALUE_OPTIONS[flag];
    if (!key) {
      parsed.errors.push(`Unknown option: ${token}`);
      continue;
    }

    let value: string | undefined;
    if (separator > 0) {
      value = token.slice(separator + 1);
    } else {
      value = argv[index + 1];
      index += 1;
    }

    if (!value) {
      parsed.errors.push(`Missing value for ${flag}`);
      continue;
    }
    parsed[key] = value;
  }

  return parsed;
}

function formatError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function listMetrics(registry: MetricRegistry, io: CliIo) {
  const lines = registry.descriptors().map(descriptor => {
    const role = registry.isLabel(descriptor.name) ? 'label' : 'metric';
    return [descriptor.name, registry.exposedName(descriptor.name), descriptor.valueKind, role].join('\t');
  });
  io.stdout.write(`${lines.join('\n')}\n`);
}

function loadConfig(configPath: string | null): ExporterAppConfig {
  return configPath ? loadConfigFromFile(configPath) : resolveConfig();
}

export async function runCli(argv = process.argv.slice(2), io: CliIo = DEFAULT_IO): Promise<number> {
  const args = parseArgs(argv);

  if (args.errors.length > 0) {
    io.stderr.write(`${args.errors.join('\n')}\n${USAGE_LINES.join('\n')}\n`);
    return 1;
  }

  if (args.help) {
    io.stdout.write(`${USAGE_LINES.join('\n')}\n`);
    return 0;
  }

  let appConfig: ExporterAppConfig;
  try {
    appConfig = loadConfig(args.configPath);
    setLogLevel(args.logLevel ?? appConfig.logging.level);
  } catch (error) {
    io.stderr.write(`Configuration error: ${formatError(error)}\n`);
    if (args.logLevel) {
      io.stderr.write(`Available log levels: ${getAvailableLogLevels().join(', ')}\n`);
    }
    return 1;
  }

  const { exporter } = appConfig;

  try {
    const registry = createRegistry({ prefix: exporter.metricPrefix });

    if (args.listMetrics) {
      listMetrics(registry, io);
      return 0;
    }

    const csv = args.inputPath
      ? await readSmiOutput(args.inputPath)
      : await querySmi({
          smiPath: exporter.smiPath,
          timeoutMs: exporter.timeoutMs,
          maxBufferBytes: exporter.maxBufferBytes,
          registry
        });

    const result = collectPass(parseCsv(csv), { registry });
    const outputPath = args.outputPath ?? exporter.outputPath;

    if (outputPath) {
      const written = await writeTextfile(outputPath, result.text);
      logger.info({ path: written, devices: result.rows, samples: result.samples }, 'Exposition written');
    } else {
      io.stdout.write(result.text);
      logger.debug({ devices: result.rows, samples: result.samples }, 'Exposition printed');
    }

    if (result.disabled > 0) {
      logger.debug({ disabled: result.disabled }, 'Some readings were unavailable');
    }
    return 0;
  } catch (error) {
    logger.error({ err: error }, 'Collection pass failed');
    io.stderr.write(`${formatError(error)}\n`);
    return 1;
  }
}

const resolvedPath = path.resolve(process.argv[1] ?? '');
const modulePath = fileURLToPath(import.meta.url);

if (resolvedPath === modulePath) {
  runCli().then(
    code => {
      process.exitCode = code;
    },
    error => {
      logger.error({ err: error }, 'gpu-textfile-exporter failed');
      process.exitCode = 1;
    }
  );
}
