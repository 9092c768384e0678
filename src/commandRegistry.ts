import type { Command } from 'commander';

import { registerPingCommand } from '@/commands/ping.js';
import { registerPublishCommand } from '@/commands/publish.js';
import { registerQueryCommand } from '@/commands/query.js';

/**
 * Command registration function type
 */
export type CommandRegistrar = (program: Command) => void;

/**
 * Helper to add a command group
 */
const addCommandGroup = (groupName: string): CommandRegistrar => {
  return (program: Command) => {
    program.commandsGroup(groupName);
  };
};

/**
 * Registry of all CLI commands with grouping
 * Order matters: groups organize commands in help output
 */
export const commandRegistry: CommandRegistrar[] = [
  addCommandGroup('Query Commands:'),
  registerQueryCommand,
  registerPingCommand,

  addCommandGroup('Publishing Commands:'),
  registerPublishCommand,
];
