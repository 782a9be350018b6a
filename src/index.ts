#!/usr/bin/env node
import { program } from 'commander';
import { VERSION } from './config/package-info';
import { registerAnalyzeCommand } from './cli/analyze-command';
import { registerValidateConfigCommand } from './cli/validate-config-command';

// Set up Commander program
program
  .name('syncjob')
  .description('Derive text/audio synchronization jobs from containers')
  .version(VERSION);

// Register commands
registerAnalyzeCommand(program);
registerValidateConfigCommand(program);

// Parse command line arguments
program.parse();
