#!/usr/bin/env node

/**
 * routine CLI entry point.
 * Thin wrapper; the logic lives in core.
 */

import 'dotenv/config';
import { Command } from 'commander';

import { registerValidateCommand, registerRunCommand } from './run.js';

const program = new Command();

program
  .name('routine')
  .description(
    'Declarative browser routine runner. Validate parameterized routines and execute them with Playwright.',
  )
  .version('0.1.0');

registerValidateCommand(program);
registerRunCommand(program);

await program.parseAsync();
