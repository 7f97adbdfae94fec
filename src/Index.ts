#!/usr/bin/env node
// src/Index.ts
import * as dotenv from 'dotenv';
import { runCli } from './ShowCommand';

function main() {
  // Load environment variables from .env file
  dotenv.config();

  try {
    process.exitCode = runCli(process.argv.slice(2));
  } catch (error: unknown) {
    console.error('Failed to show SNDS files:', error instanceof Error ? error.message : error);
    process.exitCode = 1;
  }
}

main();
