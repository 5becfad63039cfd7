#!/usr/bin/env node
/**
 * @module main
 * Executable entry point for the imgmail CLI.
 */

import dotenv from 'dotenv';
import { runCli } from './cli.js';

// Load a local .env file outside production.
if (process.env.NODE_ENV !== 'production') {
  dotenv.config();
}

process.exitCode = await runCli(process.argv.slice(2));
