#!/usr/bin/env node
import { createCli } from './cli/index.js';

createCli()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : String(error));
    process.exit(1);
  });
