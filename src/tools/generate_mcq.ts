#!/usr/bin/env node
/**
 * mcq-generate entry point. See generate_cli.ts for usage and exit codes.
 */

import { EXIT_IO_ERROR, run } from './generate_cli.js';

async function main(): Promise<void> {
  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort());

  const exitCode = await run(process.argv.slice(2), {
    stdout: (line) => console.log(line),
    stderr: (line) => console.error(line),
    env: process.env,
    signal: controller.signal,
  });
  process.exit(exitCode);
}

main().catch((err) => {
  console.log(
    JSON.stringify({
      ok: false,
      code: 'IO',
      message: `Unexpected error: ${err instanceof Error ? err.message : String(err)}`,
    })
  );
  process.exit(EXIT_IO_ERROR);
});
