#!/usr/bin/env node

import { Command } from 'commander';
import { searchCommand } from './commands/search.js';
import { regionsCommand } from './commands/regions.js';

const program = new Command();

program
  .name('pricefinder')
  .description('Compare product prices across regional eBay sites')
  .version('0.1.0');

program.addCommand(searchCommand, { isDefault: true });
program.addCommand(regionsCommand);

await program.parseAsync();
