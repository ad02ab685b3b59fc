#!/usr/bin/env node
import 'dotenv/config';
import { resolveConfig } from '../config/index.js';
import { handleError } from '../utils/errors.js';
import { createHandlers } from './commands.js';
import { createProgram } from './program.js';

async function run(): Promise<void> {
  const config = resolveConfig();
  const program = createProgram(createHandlers(config), config);

  if (!process.argv.slice(2).length) {
    program.outputHelp();
    return;
  }

  await program.parseAsync(process.argv);
}

run().catch(handleError);
