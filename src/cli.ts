#!/usr/bin/env node
/**
 * markdown-notes CLI entry point
 */

import { createProgram } from './program.js';

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error('❌ Build failed:', error instanceof Error ? error.message : error);
    process.exitCode = 1;
  });
