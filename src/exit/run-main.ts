/**
 * Entry point helper
 *
 * Runs an application's main function and exits with whatever it produced,
 * so callers never touch process.exit themselves:
 *
 *   runMain(async () => {
 *     await copyFiles();
 *     return ok();
 *   });
 */

import type { ExitOptions } from '../config/exit-options';
import { err } from '../types/result';
import { Exit, toExit } from './exit';
import type { ExitResult } from './exit';
import { exit } from './report';

export type MainFunction = () => ExitResult | Promise<ExitResult>;

/**
 * Await main, turning anything it throws into an Exit
 */
export async function settleMain(main: MainFunction, options: ExitOptions = {}): Promise<ExitResult> {
  try {
    return await main();
  } catch (error) {
    if (!(error instanceof Exit)) {
      options.logger?.event('unexpected_error', 'main threw instead of returning a result', {
        error: error instanceof Error ? error.stack ?? error.message : String(error),
      });
    }
    return err(toExit(error));
  }
}

/**
 * Run main and terminate the process with its outcome
 */
export async function runMain(main: MainFunction, options: ExitOptions = {}): Promise<never> {
  const result = await settleMain(main, options);
  return exit(result, options);
}
