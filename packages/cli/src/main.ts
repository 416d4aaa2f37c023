#!/usr/bin/env node
// ============================================================================
// @argloom/cli — Process Entry
// ============================================================================

import { readFile } from 'node:fs/promises';
import { runCli } from './cli.js';

function supportsColor(): boolean {
  if (process.env.NO_COLOR !== undefined && process.env.NO_COLOR !== '') return false;
  if (process.env.FORCE_COLOR === '1') return true;
  return process.stdout.isTTY === true;
}

runCli(process.argv.slice(2), {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
  readFile: (file) => readFile(file, 'utf8'),
  color: supportsColor(),
})
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(`Error: ${error instanceof Error ? error.message : 'Unknown error'}`);
    process.exitCode = 1;
  });
