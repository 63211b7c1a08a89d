import { Command } from 'commander';
import { createCheckCommand, createComputeCommand, createFormatCommand } from './commands/index.js';

export function createCli(): Command {
  const program = new Command();

  program
    .name('stylewright')
    .description('Check, format and inspect stylesheets')
    .version('0.1.0');

  program.addCommand(createCheckCommand());
  program.addCommand(createComputeCommand());
  program.addCommand(createFormatCommand());

  return program;
}

// Re-export config utilities for user config files
export { defineConfig } from './config/schema.js';
export type { StylewrightConfig, StylewrightConfigInput } from './config/schema.js';
