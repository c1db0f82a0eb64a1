import type { CommandHandler } from '../types.js';

/**
 * Help command - list the given commands
 */
export function createHelpCommand(commands: readonly CommandHandler[]): CommandHandler {
  const help: CommandHandler = {
    name: 'help',
    aliases: ['h', '帮助'],
    description: '显示所有可用命令',

    async run({ event, sender }) {
      const lines = [...commands, help].map(
        (cmd) => `  /${cmd.name} - ${cmd.description ?? ''}`.trimEnd(),
      );
      const helpText = ['可用命令：', ...lines, '', '提示：命令可以用 / 或 ！ 开头'].join('\n');
      await sender.notify(event.channelId, helpText);
    },
  };
  return help;
}
