#!/usr/bin/env node
import { runCli } from './cli.js';

/**
 * Entry point
 */
function bootstrap() {
  runCli(process.argv.slice(2)).then(
    code => {
      process.exitCode = code;
    },
    (err: unknown) => {
      console.error(`[Process] ${err instanceof Error ? `${err.name}: ${err.message}` : String(err)}`);
      process.exitCode = 1;
    }
  );
}

bootstrap();
