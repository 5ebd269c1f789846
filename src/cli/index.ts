#!/usr/bin/env node
// Namespace scanner CLI

import { Command } from 'commander';
import { createScanCommand, createLocationsCommand } from './commands/scan.js';

const program = new Command();

program
  .name('nsscan')
  .description('Namespace Scanner - list the resources behind dot-delimited namespaces')
  .version('0.1.0');

program.addCommand(createScanCommand());
program.addCommand(createLocationsCommand());

await program.parseAsync();
