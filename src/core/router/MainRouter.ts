import type { ChatEvent } from '../events/ChatEvent.js';
import type { Logger } from '../../infra/logger/logger.js';
import type { CommandRouter } from '../command/CommandRouter.js';
import type { BotIdentity } from '../messaging/GroupMessenger.js';
import type { NoticeDispatcher } from '../notice/NoticeDispatcher.js';
import type { GroupMessageRecorder } from '../segment/GroupMessageRecorder.js';
import { errorMessage } from '../errors.js';

/**
 * Main event router - handles all incoming group events.
 * Flow: message → record segments → command handler; notice → notice dispatcher
 */
export class MainRouter {
  constructor(
    private logger: Logger,
    private recorder: Pick<GroupMessageRecorder, 'record'>,
    private commandRouter: Pick<CommandRouter, 'handle'>,
    private notices: Pick<NoticeDispatcher, 'handleRaw'>,
    private identity: BotIdentity,
  ) {}

  /**
   * Handle incoming group message.
   */
  async handleEvent(event: ChatEvent): Promise<void> {
    this.identity.observe(event.selfId);
    this.logger.debug(
      'router',
      `Received message ${event.messageId} from ${event.senderId} in ${event.channelId}: "${event.rawText.substring(0, 30)}"`,
    );

    // Storage first: every message is recorded, commands included
    try {
      await this.recorder.record(event);
    } catch (error) {
      this.logger.error('router', `Record message ${event.messageId} failed: ${errorMessage(error)}`);
    }

    await this.commandRouter.handle(event);
  }

  async handleNotice(raw: unknown, selfId?: number): Promise<void> {
    this.identity.observe(selfId);
    await this.notices.handleRaw(raw);
  }
}
