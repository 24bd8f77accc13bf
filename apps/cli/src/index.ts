#!/usr/bin/env -S npx tsx

import { run } from './run.js';

async function main(): Promise<void> {
  process.exitCode = await run(process.argv.slice(2), {
    stdout(message: string) {
      process.stdout.write(message);
    },
    stderr(message: string) {
      process.stderr.write(message);
    },
  });
}

main().catch((error: unknown) => {
  console.error('Error:', error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
