#!/usr/bin/env node
/**
 * cloudtune entry point
 */

import * as dotenv from 'dotenv';
import { createProgram, runCli } from './cli.js';
import { isMainModule } from './utils/filesystem.js';
import { Logger } from './utils/logger.js';

// Load environment variables
dotenv.config();

export async function main(argv: string[] = process.argv): Promise<number> {
  const controller = new AbortController();
  const abort = (signal: NodeJS.Signals) => {
    Logger.warn('Interrupted, cleaning up', { signal });
    controller.abort(new Error(`Received ${signal}`));
  };
  process.once('SIGINT', abort);
  process.once('SIGTERM', abort);

  try {
    const program = createProgram((service, options) => runCli(service, options, { signal: controller.signal }));
    await program.parseAsync(argv);
    return 0;
  } catch (error) {
    Logger.error('run cloudtune', error);
    return 1;
  } finally {
    process.off('SIGINT', abort);
    process.off('SIGTERM', abort);
  }
}

if (isMainModule(import.meta.url, process.argv[1])) {
  main().then(code => {
    process.exitCode = code;
  }, (error: unknown) => {
    Logger.error('start cloudtune', error);
    process.exitCode = 1;
  });
}
