import { z } from 'zod';
import type { GroupMessageSender, OneBotCaller } from '../../core/messaging/MessageSender.js';
import type { Logger } from '../../infra/logger/logger.js';

const SendResultSchema = z.object({ message_id: z.number() });

/**
 * QQ/NapCat message sender implementation.
 * Converts GroupMessageSender calls to OneBot11 send_group_msg.
 */
export class QQMessageSender implements GroupMessageSender {
  constructor(
    private api: OneBotCaller,
    private logger: Logger,
  ) {}

  async sendGroupMessage(groupId: number, text: string, imageUrl?: string): Promise<number | null> {
    const segments: Array<{ type: string; data: Record<string, unknown> }> = [
      { type: 'text', data: { text } },
    ];
    if (imageUrl) {
      segments.push({ type: 'image', data: { file: imageUrl } });
    }

    this.logger.info(
      'qq-sender',
      `Sending to group ${groupId}: "${text.substring(0, 40)}" (${text.length} chars${imageUrl ? ', 1 image' : ''})`,
    );
    const data = await this.api.call('send_group_msg', { group_id: groupId, message: segments });

    const result = SendResultSchema.safeParse(data);
    if (!result.success) {
      this.logger.warn('qq-sender', `send_group_msg returned no message_id for group ${groupId}`);
      return null;
    }
    return result.data.message_id;
  }
}
