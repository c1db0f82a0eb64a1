import type { Logger } from '../../infra/logger/logger.js';
import { storeTimeFromUnix } from '../../infra/time/storeTime.js';
import { errorMessage } from '../errors.js';
import type { MemberNameResolver } from '../members/MemberDirectory.js';
import { RECALL_INDICATOR, type Segment } from '../model/Segment.js';
import type { SegmentStore } from '../storage/SegmentStore.js';
import type { RecallNotice } from './types.js';

export type ReconcileOutcome =
  | { outcome: 'missing' }
  | { outcome: 'invalid_time' }
  | { outcome: 'replayed'; inserted: number; failed: number };

/**
 * Handles a retraction by appending a tombstone followed by a replay of the original
 * segments. Nothing is ever removed from the store.
 */
export class RecallReconciler {
  constructor(
    private readonly store: Pick<SegmentStore, 'findByMessageId' | 'insert'>,
    private readonly members: MemberNameResolver,
    private readonly logger: Logger,
    private readonly utcOffsetHours: number,
  ) {}

  /**
   * Lookup failures propagate; insert failures are logged per segment and skipped.
   * Safe to run again for the same notice (the tombstone is then duplicated).
   */
  async reconcile(notice: RecallNotice): Promise<ReconcileOutcome> {
    const { channelId, messageId } = notice;
    const originals = await this.store.findByMessageId(channelId, messageId);
    if (originals.length === 0) {
      this.logger.warn(
        'recall',
        `Recalled message not found.\ngroup_id=${channelId}, msg_id=${messageId}`,
      );
      return { outcome: 'missing' };
    }

    const time = storeTimeFromUnix(notice.timestamp, this.utcOffsetHours);
    if (time === null) {
      this.logger.error('recall', `Recall notice timestamp error, value = ${notice.timestamp}`);
      return { outcome: 'invalid_time' };
    }

    const [retractor, author] = await Promise.all([
      this.members.resolveName(channelId, notice.retractorId),
      this.members.resolveName(channelId, notice.retractedUserId),
    ]);
    const tombstone: Segment = {
      messageId: 0,
      timestamp: time,
      senderId: notice.selfId,
      senderName: RECALL_INDICATOR,
      kind: 'text',
      content: `${retractor} 撤回了 ${author} 的消息, id=${messageId}`,
      interpretation: RECALL_INDICATOR,
    };

    let inserted = 0;
    let failed = 0;
    for (const segment of [tombstone, ...originals]) {
      try {
        await this.store.insert(channelId, segment);
        inserted++;
      } catch (error) {
        failed++;
        this.logger.error(
          'recall',
          `Store segment failed: ${errorMessage(error)}\nContent: ${JSON.stringify(segment)}`,
        );
      }
    }
    this.logger.info(
      'recall',
      `Replayed recalled message ${messageId} in ${channelId} (${inserted} written, ${failed} failed)`,
    );
    return { outcome: 'replayed', inserted, failed };
  }
}
