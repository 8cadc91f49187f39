import { parseArgs } from 'node:util';
import type { NotificationConfig } from './config/notification.config';

export const WORKER_USAGE = `Usage: worker [options]

Polls notification_jobs and delivers due notifications.

Options:
  --run-once                   process a single batch, then exit
  --batch-size <n>             jobs claimed per batch
  --poll-interval <ms>         sleep between batches
  --error-retry-interval <ms>  sleep after a failed batch
  --retry-backoff <ms>         delay before a failed job is retried
  -h, --help                   show this message
`;

export interface WorkerCliOptions {
  runOnce: boolean;
  help: boolean;
  /** Flags given on the command line; they take precedence over env vars. */
  overrides: Partial<NotificationConfig>;
}

export class WorkerCliError extends Error {
  override name = 'WorkerCliError';
}

function parseInteger(flag: string, raw: string, min: number): number {
  if (!/^\d+$/.test(raw) || Number(raw) < min) {
    throw new WorkerCliError(`--${flag} must be an integer >= ${min}, got "${raw}"`);
  }
  return Number(raw);
}

function readFlags(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      strict: true,
      allowPositionals: false,
      options: {
        'run-once': { type: 'boolean', default: false },
        'batch-size': { type: 'string' },
        'poll-interval': { type: 'string' },
        'error-retry-interval': { type: 'string' },
        'retry-backoff': { type: 'string' },
        help: { type: 'boolean', short: 'h', default: false },
      },
    }).values;
  } catch (error) {
    throw new WorkerCliError(
      error instanceof Error ? error.message : String(error),
    );
  }
}

export function parseWorkerArgs(argv: string[]): WorkerCliOptions {
  const values = readFlags(argv);
  const overrides: Partial<NotificationConfig> = {};

  if (values['batch-size'] !== undefined) {
    overrides.batchSize = parseInteger('batch-size', values['batch-size'], 1);
  }
  if (values['poll-interval'] !== undefined) {
    overrides.pollIntervalMs = parseInteger(
      'poll-interval',
      values['poll-interval'],
      0,
    );
  }
  if (values['error-retry-interval'] !== undefined) {
    overrides.errorRetryIntervalMs = parseInteger(
      'error-retry-interval',
      values['error-retry-interval'],
      0,
    );
  }
  if (values['retry-backoff'] !== undefined) {
    overrides.retryBackoffMs = parseInteger(
      'retry-backoff',
      values['retry-backoff'],
      0,
    );
  }

  return {
    runOnce: values['run-once'] ?? false,
    help: values.help ?? false,
    overrides,
  };
}
