#!/usr/bin/env node

import { createProgram } from './program';

const program = createProgram();

// Global error handling
process.on('uncaughtException', (error) => {
  console.error('❌ Unexpected error:', error.message);
  if (program.opts()['verbose']) {
    console.error(error.stack);
  }
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  console.error('❌ Unhandled promise rejection:', reason);
  process.exit(1);
});

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error('❌ Fatal error:', error);
  process.exit(1);
});
