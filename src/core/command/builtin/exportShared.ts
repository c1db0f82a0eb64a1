import { join } from 'node:path';
import type { CommandContext } from '../types.js';

/** Parse the record count argument; null when missing or below 1. */
export function parseCount(args: string[]): number | null {
  const raw = args[0];
  if (!raw || !/^\d+$/.test(raw)) return null;
  const count = Number.parseInt(raw, 10);
  return count >= 1 ? count : null;
}

export function exportPath(ctx: CommandContext, kind: 'history' | 'log'): string {
  const stamp = Math.floor(ctx.services.now().getTime() / 1000);
  const suffix = ctx.services.uniqueSuffix();
  return join(ctx.services.exportDir, `${ctx.event.channelId}-${kind}-${stamp}-${suffix}.csv`);
}

/**
 * Upload an export, reply with its location and drop the local copy once it lives elsewhere.
 */
export async function publishExport(
  ctx: CommandContext,
  filePath: string,
  describe: (location: string) => string,
): Promise<void> {
  const location = await ctx.services.uploader.upload(filePath);
  await ctx.sender.notify(ctx.event.channelId, describe(location));
  if (location !== filePath) {
    await ctx.services.removeFile(filePath);
  }
}
