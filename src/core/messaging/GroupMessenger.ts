import type { Logger } from '../../infra/logger/logger.js';
import { errorMessage } from '../errors.js';
import type { GroupMessageRecorder } from '../segment/GroupMessageRecorder.js';
import type { GroupMessageSender, NotificationSink } from './MessageSender.js';

/** Current bot account id, learned from inbound events. */
export class BotIdentity {
  private id = 0;

  get selfId(): number {
    return this.id;
  }

  observe(selfId: number | undefined): void {
    if (selfId !== undefined && selfId > 0) this.id = selfId;
  }
}

/**
 * Sends a group message and records the bot's own message in the segment store,
 * so exported history and recalls see both sides of the conversation.
 */
export class GroupMessenger implements NotificationSink {
  constructor(
    private readonly sender: GroupMessageSender,
    private readonly recorder: Pick<GroupMessageRecorder, 'record'>,
    private readonly identity: BotIdentity,
    private readonly logger: Logger,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async notify(channelId: number, text: string, imageUrl?: string): Promise<void> {
    const messageId = await this.sender.sendGroupMessage(channelId, text, imageUrl);

    const parts = [{ kind: 'text', payload: text }];
    if (imageUrl) parts.push({ kind: 'image', payload: imageUrl });
    try {
      await this.recorder.record({
        platform: 'qq',
        channelId,
        messageId: messageId ?? 0,
        senderId: this.identity.selfId,
        timestamp: Math.floor(this.now().getTime() / 1000),
        parts,
        rawText: text,
        selfId: this.identity.selfId,
      });
    } catch (error) {
      // Delivery already happened; recording our own message is secondary
      this.logger.error('messenger', `Record sent message failed: ${errorMessage(error)}`);
    }
  }
}
