#!/usr/bin/env -S node --import tsx
/**
 * CLI Entry Point
 *
 * Exit codes: 0 success or help, 2 usage and configuration errors,
 * 1 build failures.
 */

import { loadSettings } from './config/index.js';
import { toRelpackError } from '@relpack/core';
import { createContext } from './context.js';
import { printError } from './lib/output.js';
import { runCli } from './program.js';

async function main(): Promise<number> {
  try {
    const settings = loadSettings();
    return await runCli(process.argv.slice(2), createContext(settings, process.cwd()));
  } catch (error) {
    const relpackError = toRelpackError(error);
    printError(relpackError.message);
    return relpackError.exitCode;
  }
}

process.exitCode = await main();
