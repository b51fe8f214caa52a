import type { Command } from 'commander';

import { registerCallCommand } from '@/commands/call.js';
import { registerPingCommand } from '@/commands/ping.js';

/**
 * Command registration function type
 */
export type CommandRegistrar = (program: Command) => void;

/**
 * Registry of all CLI commands, in help-output order
 */
export const commandRegistry: CommandRegistrar[] = [registerCallCommand, registerPingCommand];
