#!/usr/bin/env node
/**
 * Command-line entry point: `raw-eml-sender json_file ...`
 */

import { makeJsonSample } from './config';
import type { Logger } from './observability';
import { createLogger, parseLogLevel } from './observability';
import type { RunnerOptions } from './runner';
import { processSettingsFiles } from './runner';

export const NAME = 'raw-eml-sender';
export const VERSION = '0.1.0';

/**
 * Options for {@link main}.
 */
export interface MainOptions extends RunnerOptions {
  /** Receives usage and version text. */
  print?: (text: string) => void;
}

export function usage(): string {
  return [`Usage: ${NAME} json_file ...`, '---', 'json_file sample:', makeJsonSample()].join('\n');
}

/**
 * Runs the CLI and returns the process exit code.
 *
 * Settings files are processed in order; the exit code is 1 when any of them
 * could not be loaded or had a failed session.
 */
export async function main(args: readonly string[], options: MainOptions = {}): Promise<number> {
  const print = options.print ?? ((text: string) => console.log(text));

  if (args.length === 0) {
    print(usage());
    return 0;
  }
  if (args[0] === '--version') {
    print(`${NAME} / Version: ${VERSION}`);
    return 0;
  }

  const logger: Logger =
    options.logger ?? createLogger(parseLogLevel(process.env.RAW_EML_SENDER_LOG_LEVEL));
  const results = await processSettingsFiles(args, {
    logger,
    transportFactory: options.transportFactory,
  });
  return results.every((r) => r.success) ? 0 : 1;
}

if (require.main === module) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err: unknown) => {
      console.error(err);
      process.exitCode = 1;
    });
}
