#!/usr/bin/env -S node --import tsx
/**
 * @scriptwrap/cli - CLI for the scriptwrap binding generator
 */

import { Command } from 'commander';
import { SCRIPTWRAP_VERSION } from '@scriptwrap/core';
import { generateCommand } from './commands/generate.js';
import { lsCommand } from './commands/ls.js';

const program = new Command();

program
  .name('scriptwrap')
  .description('Generate scripting binding descriptors from rustdoc JSON type graphs')
  .version(SCRIPTWRAP_VERSION);

program.addCommand(generateCommand);
program.addCommand(lsCommand);

program.parse();
