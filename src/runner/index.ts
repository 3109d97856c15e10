/**
 * Runs sessions for settings files, sequentially or one worker per EML file.
 */

import type { Settings } from '../config';
import { loadSettings } from '../config';
import { toError } from '../errors';
import type { Logger } from '../observability';
import { Timer, createNoopLogger, createSessionContext } from '../observability';
import type { SessionResult } from '../session';
import { sendMessages } from '../session';
import type { TransportFactory } from '../transport';

/**
 * Runner options.
 */
export interface RunnerOptions {
  logger?: Logger;
  transportFactory?: TransportFactory;
}

/**
 * Outcome of one worker (one connection).
 */
export type WorkerResult =
  | { workerId: string; files: string[]; success: true; result: SessionResult }
  | { workerId: string; files: string[]; success: false; error: Error };

/**
 * Outcome of all workers for one settings record.
 */
export interface BatchRunResult {
  results: WorkerResult[];
  total: number;
  succeeded: number;
  failed: number;
  durationMs: number;
}

/**
 * Outcome of one settings file.
 */
export interface SettingsFileResult {
  settingsFile: string;
  success: boolean;
  /** Present once the settings were loaded. */
  batch?: BatchRunResult;
  /** Settings error, or the first worker error. */
  error?: Error;
}

async function runWorker(
  workerId: string,
  settings: Settings,
  files: string[],
  logger: Logger,
  options: RunnerOptions
): Promise<WorkerResult> {
  try {
    const result = await sendMessages(settings, files, {
      logger,
      transportFactory: options.transportFactory,
    });
    return { workerId, files, success: true, result };
  } catch (err) {
    const error = toError(err);
    logger.debug(`${files.join(', ')}: ${error.message}`);
    return { workerId, files, success: false, error };
  }
}

/**
 * Sends the settings' EML files.
 *
 * With `useParallel` and more than one file every file gets its own
 * connection, run concurrently; otherwise one connection carries them all.
 * Worker failures are collected, never thrown.
 */
export async function runSettings(settings: Settings, options: RunnerOptions = {}): Promise<BatchRunResult> {
  const logger = options.logger ?? createNoopLogger();
  const timer = Timer.start();

  let results: WorkerResult[];
  if (settings.useParallel && settings.emlFiles.length > 1) {
    results = await Promise.all(
      settings.emlFiles.map((file, i) => {
        const workerId = `worker-${i + 1}`;
        const context = createSessionContext(workerId, 'send_messages', { file });
        return runWorker(workerId, settings, [file], logger.withContext(context), options);
      })
    );
  } else {
    results = [await runWorker('main', settings, [...settings.emlFiles], logger, options)];
  }

  const succeeded = results.filter((r) => r.success).length;
  return {
    results,
    total: results.length,
    succeeded,
    failed: results.length - succeeded,
    durationMs: timer.elapsed(),
  };
}

/**
 * Loads one settings file and runs it. Never throws.
 */
export async function processSettingsFile(
  settingsFile: string,
  options: RunnerOptions = {}
): Promise<SettingsFileResult> {
  const logger = options.logger ?? createNoopLogger();

  let settings: Settings;
  try {
    settings = await loadSettings(settingsFile);
  } catch (err) {
    const error = toError(err);
    logger.error(`error: ${settingsFile}: ${error.message}`);
    return { settingsFile, success: false, error };
  }

  const batch = await runSettings(settings, options);
  const failures = batch.results.flatMap((r) => (r.success ? [] : [r]));
  for (const failure of failures) {
    logger.error(`error: ${settingsFile}: [${failure.workerId}] ${failure.error.message}`);
  }

  return {
    settingsFile,
    success: failures.length === 0,
    batch,
    error: failures[0]?.error,
  };
}

/**
 * Processes settings files one after another; a failing file does not stop the rest.
 */
export async function processSettingsFiles(
  settingsFiles: readonly string[],
  options: RunnerOptions = {}
): Promise<SettingsFileResult[]> {
  const results: SettingsFileResult[] = [];
  for (const settingsFile of settingsFiles) {
    results.push(await processSettingsFile(settingsFile, options));
  }
  return results;
}
