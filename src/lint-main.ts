#!/usr/bin/env node

import { config } from './config.js';
import { ConfigError } from './errors.js';
import { lintProject } from './lint.js';

async function main() {
  const root = process.argv[2] ?? process.cwd();
  try {
    const compliant = await lintProject(root, config.report.format);
    process.exitCode = compliant ? 0 : 1;
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`Invalid configuration: ${error.message}`);
    } else {
      console.error('Lint failed:', error);
    }
    process.exitCode = 2;
  }
}

main();
