import type { CommandHandler } from '../types.js';
import { exportPath, parseCount, publishExport } from './exportShared.js';

/**
 * Log command - export the latest N bot log entries as CSV
 */
export const LogCommand: CommandHandler = {
  name: 'log',
  aliases: ['最近日志'],
  description: '导出最近 N 条日志 (管理员)',
  adminOnly: true,

  async run(ctx) {
    const count = parseCount(ctx.args);
    if (count === null) {
      await ctx.sender.notify(ctx.event.channelId, '用法：/log <条数>');
      return;
    }
    const filePath = exportPath(ctx, 'log');
    await ctx.services.logSink.exportRecentCsv(count, filePath);
    await publishExport(ctx, filePath, (location) => `导出了${count}条日志: ${location}`);
  },
};
