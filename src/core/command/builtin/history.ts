import type { CommandHandler } from '../types.js';
import { exportPath, parseCount, publishExport } from './exportShared.js';

/**
 * History command - export the latest N message events of this group as CSV
 */
export const HistoryCommand: CommandHandler = {
  name: 'history',
  aliases: ['最近聊天记录'],
  description: '导出最近 N 条聊天记录 (管理员)',
  adminOnly: true,

  async run(ctx) {
    const count = parseCount(ctx.args);
    if (count === null) {
      await ctx.sender.notify(ctx.event.channelId, '用法：/history <条数>');
      return;
    }
    const filePath = exportPath(ctx, 'history');
    await ctx.services.store.exportRecentCsv(ctx.event.channelId, count, filePath);
    await publishExport(ctx, filePath, (location) => `导出了${count}条聊天记录: ${location}`);
  },
};
