/**
 * Standard Command Interface for the quickpush CLI
 */

import type { Command } from 'commander';

/**
 * Base options that all commands should support
 */
export interface BaseCommandOptions {
  verbose?: boolean;
  quiet?: boolean;
}

/**
 * Command registration interface for Commander.js integration
 */
export interface ICommand {
  /**
   * Register the command with Commander.js program
   */
  register(program: Command): void;
}
