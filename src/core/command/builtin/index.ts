/**
 * Builtin commands available by default
 */
import type { CommandHandler } from '../types.js';
import { createHelpCommand } from './help.js';
import { HistoryCommand } from './history.js';
import { LiveCommand } from './live.js';
import { LogCommand } from './log.js';

export { createHelpCommand, HistoryCommand, LiveCommand, LogCommand };

export function builtinCommands(): CommandHandler[] {
  const commands = [HistoryCommand, LogCommand, LiveCommand];
  return [...commands, createHelpCommand(commands)];
}
