#!/usr/bin/env node
/**
 * skillbook CLI
 */

import 'dotenv/config';
import { run } from './run.js';

run(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
