import { execFile, type ExecFileException } from 'node:child_process';
import fs from 'node:fs/promises';
import path from 'node:path';
import logger from '../logger.js';
import { SmiQueryError } from '../errors.js';
import defaultRegistry, { type MetricRegistry } from '../metrics/descriptors.js';

export type SmiQueryOptions = {
  smiPath?: string;
  timeoutMs?: number;
  maxBufferBytes?: number;
  registry?: MetricRegistry;
};

const DEFAULT_SMI_PATH = 'nvidia-smi';
const DEFAULT_TIMEOUT_MS = 10_000;
const DEFAULT_MAX_BUFFER_BYTES = 1024 * 1024;

export function buildQueryArgs(registry: MetricRegistry = defaultRegistry): string[] {
  return [`--query-gpu=${registry.names().join(',')}`, '--format=csv'];
}

function describeFailure(
  error: ExecFileException,
  smiPath: string,
  timeoutMs: number,
  stderr: string
): string {
  if (error.code === 'ENOENT') {
    return `${smiPath} not found`;
  }
  if (error.killed || error.signal) {
    return `${smiPath} timed out after ${timeoutMs}ms`;
  }
  const detail = stderr.trim() || error.message;
  return `${smiPath} exited with code ${String(error.code ?? 'unknown')}: ${detail}`;
}

/** Runs nvidia-smi once and resolves with its CSV output. */
export function querySmi(options: SmiQueryOptions = {}): Promise<string> {
  const smiPath = options.smiPath ?? DEFAULT_SMI_PATH;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const maxBuffer = options.maxBufferBytes ?? DEFAULT_MAX_BUFFER_BYTES;
  const args = buildQueryArgs(options.registry);

  logger.debug({ smiPath, args }, 'Querying nvidia-smi');

  return new Promise((resolve, reject) => {
    execFile(
      smiPath,
      args,
      { timeout: timeoutMs, maxBuffer, encoding: 'utf8', windowsHide: true },
      (error, stdout, stderr) => {
        if (error) {
          reject(
            new SmiQueryError(describeFailure(error, smiPath, timeoutMs, stderr), {
              cause: error,
              exitCode: error.code ?? null
            })
          );
          return;
        }
        resolve(stdout);
      }
    );
  });
}

/** Reads CSV output captured from an earlier nvidia-smi run. */
export async function readSmiOutput(filePath: string): Promise<string> {
  const resolvedPath = path.resolve(filePath);
  try {
    return await fs.readFile(resolvedPath, 'utf-8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new SmiQueryError(`Failed to read ${resolvedPath}: ${message}`, { cause: error });
  }
}
