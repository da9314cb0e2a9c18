#!/usr/bin/env node
/**
 * Lantern CLI Entry Point
 *
 * This is the main entry point for the `lantern` command.
 */

import { createProgram } from './program.js';
import { handleError, createGlobalErrorHandler } from '../errors/index.js';
import { loadEnv } from '../config/index.js';

async function main(): Promise<void> {
  // .env is read before any config lookup
  loadEnv();

  const program = createProgram();

  // Global flags are read straight from argv: errors can happen before parsing finishes
  const errorOptions = {
    verbose: process.argv.includes('--verbose'),
    json: process.argv.includes('--json'),
  };

  // Catch errors that escape all try/catch blocks
  const globalHandler = createGlobalErrorHandler(errorOptions);
  process.on('uncaughtException', globalHandler);
  process.on('unhandledRejection', globalHandler);

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    handleError(error, errorOptions);
  }
}

main().catch((error: unknown) => handleError(error));
