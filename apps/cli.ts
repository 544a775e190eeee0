#!/usr/bin/env node
/**
 * modelctl CLI entry point
 */

import { argv, exit } from 'node:process';
import { runCli } from '../src/cli/run';

process.on('SIGINT', () => {
  console.error('\n⚠️  Operation interrupted');
  exit(1);
});

process.on('unhandledRejection', (reason) => {
  console.error('❌ Unhandled rejection:', reason);
  exit(1);
});

runCli(argv.slice(2))
  .then((code) => exit(code))
  .catch((error: unknown) => {
    console.error('❌ Unexpected error:', error);
    exit(1);
  });
