import type { Logger } from '../../infra/logger/logger.js';
import { assertNever, errorMessage } from '../errors.js';
import type { MemberNameResolver } from '../members/MemberDirectory.js';
import type { NotificationSink } from '../messaging/MessageSender.js';
import type { RecallReconciler } from './RecallReconciler.js';
import { parseNotice, type GroupNotice } from './types.js';

/**
 * Routes OneBot notices: recalls go to the reconciler, membership changes
 * become short announcements in the group.
 */
export class NoticeDispatcher {
  constructor(
    private readonly reconciler: Pick<RecallReconciler, 'reconcile'>,
    private readonly members: MemberNameResolver,
    private readonly sink: NotificationSink,
    private readonly logger: Logger,
  ) {}

  /** Entry point for raw notice frames; undecodable notices are dropped with a warning. */
  async handleRaw(raw: unknown): Promise<void> {
    const parsed = parseNotice(raw);
    if (!parsed.ok) {
      this.logger.warn(
        'notice',
        `Notice deserialize failed, skip: ${parsed.error}\nraw: ${JSON.stringify(raw)}`,
      );
      return;
    }
    await this.handle(parsed.notice);
  }

  async handle(notice: GroupNotice): Promise<void> {
    try {
      const announcement = await this.dispatch(notice);
      if (announcement) {
        await this.sink.notify(announcement.channelId, announcement.text);
      }
    } catch (error) {
      this.logger.error('notice', `Handle ${notice.kind} notice failed: ${errorMessage(error)}`);
    }
  }

  private names(channelId: number, ...userIds: number[]): Promise<string[]> {
    return Promise.all(userIds.map((id) => this.members.resolveName(channelId, id)));
  }

  private async dispatch(
    notice: GroupNotice,
  ): Promise<{ channelId: number; text: string } | null> {
    switch (notice.kind) {
      case 'recall':
        await this.reconciler.reconcile(notice);
        return null;

      case 'admin': {
        const [user] = await this.names(notice.channelId, notice.userId);
        const text =
          notice.change === 'set'
            ? `${user}被群主赐予了管理员之力!`
            : `${user}被群主剥夺了管理员之力!`;
        return { channelId: notice.channelId, text };
      }

      case 'member_decrease': {
        if (notice.reason === 'kick_me') {
          this.logger.warn('notice', `Bot was removed from group ${notice.channelId}`);
          return null;
        }
        const [user, operator] = await this.names(notice.channelId, notice.userId, notice.operatorId);
        const text =
          notice.reason === 'leave'
            ? `${user}忍一时越想越气,退一步越想越亏,怒发冲冠下将所有人踢出了群聊!`
            : `${user}由于讨厌${operator}选择将所有人踢出群聊!`;
        return { channelId: notice.channelId, text };
      }

      case 'member_increase': {
        const [user, operator] = await this.names(notice.channelId, notice.userId, notice.operatorId);
        const text =
          notice.reason === 'approve'
            ? `${user}大发慈悲、勉为其难地允许了${operator}通过ta的入群申请~`
            : `${user}在${operator}的苦苦哀求下加入了我们~`;
        return { channelId: notice.channelId, text };
      }

      case 'ban': {
        const [user, operator] = await this.names(notice.channelId, notice.userId, notice.operatorId);
        const text =
          notice.action === 'ban'
            ? `${user}因为讨厌${operator}决定在${notice.durationSec}秒内冷暴力大家!`
            : `${operator}哄好了${user},TA现在愿意和我们说话了!`;
        return { channelId: notice.channelId, text };
      }

      case 'honor': {
        if (notice.honor !== 'talkative') {
          this.logger.debug('notice', `Ignore ${notice.honor} honor in ${notice.channelId}`);
          return null;
        }
        const [user] = await this.names(notice.channelId, notice.userId);
        return { channelId: notice.channelId, text: `恭喜龙王${user}登基!` };
      }

      case 'poke':
        // Replies to pokes come from the chat agent, which lives outside this bot
        this.logger.debug('notice', `Poke from ${notice.userId} to ${notice.targetId}`);
        return null;

      case 'upload':
      case 'friend_add':
        this.logger.debug('notice', `Ignore ${notice.kind} notice`);
        return null;

      default:
        return assertNever(notice, 'notice');
    }
  }
}
