#!/usr/bin/env node

/**
 * hintcfg CLI entry point.
 * Parses argv and hands off to the registered commands.
 */

import 'dotenv/config';
import { Command } from 'commander';

import { registerValidateCommand, registerShowCommand } from './run.js';

const program = new Command();

program
  .name('hintcfg')
  .description(
    'Load and validate extrinsic hint configuration files for gene-prediction engines.',
  )
  .version('0.1.0');

registerValidateCommand(program);
registerShowCommand(program);

await program.parseAsync();
