import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { StoreError } from '../../../src/core/errors.js';
import type { MemberNameResolver } from '../../../src/core/members/MemberDirectory.js';
import { RECALL_INDICATOR, type Segment } from '../../../src/core/model/Segment.js';
import { RecallReconciler } from '../../../src/core/notice/RecallReconciler.js';
import type { RecallNotice } from '../../../src/core/notice/types.js';
import { SegmentStore } from '../../../src/core/storage/SegmentStore.js';
import { openDatabase, type SqliteDatabase } from '../../../src/infra/storage/database.js';
import { createMockLogger, messages } from '../helpers.js';

const KNOWN = new Map([
  [10001, 'Alice'],
  [10002, 'Bob'],
]);

const names: MemberNameResolver = {
  resolveName: async (_groupId, userId) => KNOWN.get(userId) ?? String(userId),
};

function original(overrides: Partial<Segment>): Segment {
  return {
    messageId: 77,
    timestamp: '2024-05-01 12:00:00',
    senderId: 10002,
    senderName: 'Bob',
    kind: 'text',
    content: 'oops',
    interpretation: 'text',
    ...overrides,
  };
}

function recall(overrides: Partial<RecallNotice> = {}): RecallNotice {
  return {
    kind: 'recall',
    selfId: 999,
    // 2024-05-01 04:01:00 UTC
    timestamp: 1714536060,
    channelId: 1,
    messageId: 77,
    retractorId: 10001,
    retractedUserId: 10002,
    ...overrides,
  };
}

describe('RecallReconciler', () => {
  let db: SqliteDatabase;
  let store: SegmentStore;

  beforeEach(() => {
    db = openDatabase(':memory:');
    store = new SegmentStore(db, createMockLogger());
  });

  afterEach(() => {
    db.close();
  });

  it('should append a tombstone and replay the originals in order', async () => {
    await store.insert(1, original({ content: 'oops' }));
    await store.insert(1, original({ kind: 'image', content: 'pic.jpg', interpretation: '' }));
    const reconciler = new RecallReconciler(store, names, createMockLogger(), 8);

    const outcome = await reconciler.reconcile(recall());

    expect(outcome).toEqual({ outcome: 'replayed', inserted: 3, failed: 0 });
    // Replayed rows keep their original timestamp, so they sort before the tombstone
    const rows = await store.loadRecent(1, 10);
    expect(rows).toEqual([
      original({ content: 'oops' }),
      original({ kind: 'image', content: 'pic.jpg', interpretation: '' }),
      original({ content: 'oops' }),
      original({ kind: 'image', content: 'pic.jpg', interpretation: '' }),
      {
        messageId: 0,
        timestamp: '2024-05-01 12:01:00',
        senderId: 999,
        senderName: RECALL_INDICATOR,
        kind: 'text',
        content: 'Alice 撤回了 Bob 的消息, id=77',
        interpretation: RECALL_INDICATOR,
      },
    ]);
    const byId = await store.findByMessageId(1, 77);
    expect(byId).toHaveLength(4);
  });

  it('should store the tombstone ahead of the replayed rows', async () => {
    await store.insert(1, original({ content: 'oops' }));
    await store.insert(1, original({ kind: 'image', content: 'pic.jpg', interpretation: '' }));
    const reconciler = new RecallReconciler(store, names, createMockLogger(), 8);

    await reconciler.reconcile(recall());

    const rows = db
      .prepare<[], { auto_id: number; kind: string; content: string; interpretation: string }>(
        'SELECT auto_id, kind, content, interpretation FROM message1 ORDER BY auto_id',
      )
      .all();
    expect(rows).toEqual([
      { auto_id: 1, kind: 'text', content: 'oops', interpretation: 'text' },
      { auto_id: 2, kind: 'image', content: 'pic.jpg', interpretation: '' },
      {
        auto_id: 3,
        kind: 'text',
        content: 'Alice 撤回了 Bob 的消息, id=77',
        interpretation: RECALL_INDICATOR,
      },
      { auto_id: 4, kind: 'text', content: 'oops', interpretation: 'text' },
      { auto_id: 5, kind: 'image', content: 'pic.jpg', interpretation: '' },
    ]);
  });

  it('should leave the store untouched when the message is unknown', async () => {
    const logger = createMockLogger();
    const reconciler = new RecallReconciler(store, names, logger, 8);

    expect(await reconciler.reconcile(recall({ messageId: 5 }))).toEqual({ outcome: 'missing' });
    expect(messages(logger.warn)).toEqual(['Recalled message not found.\ngroup_id=1, msg_id=5']);
    expect(await store.loadRecent(1, 10)).toEqual([]);
  });

  it('should refuse a notice with an unusable timestamp', async () => {
    await store.insert(1, original({}));
    const reconciler = new RecallReconciler(store, names, createMockLogger(), 8);

    expect(await reconciler.reconcile(recall({ timestamp: -5 }))).toEqual({
      outcome: 'invalid_time',
    });
    expect(await store.loadRecent(1, 10)).toHaveLength(1);
  });

  it('should keep going when one insert fails', async () => {
    const logger = createMockLogger();
    const written: Segment[] = [];
    let calls = 0;
    const flaky = {
      findByMessageId: async () => [original({ content: 'a' }), original({ content: 'b' })],
      insert: async (_channelId: number, segment: Segment) => {
        calls++;
        if (calls === 2) throw new StoreError('insert', 'disk full');
        written.push(segment);
      },
    };
    const reconciler = new RecallReconciler(flaky, names, logger, 0);

    const outcome = await reconciler.reconcile(recall());

    expect(outcome).toEqual({ outcome: 'replayed', inserted: 2, failed: 1 });
    expect(written.map((s) => s.content)).toEqual(['Alice 撤回了 Bob 的消息, id=77', 'b']);
    expect(logger.error).toHaveBeenCalledTimes(1);
  });

  it('should propagate lookup failures', async () => {
    const broken = {
      findByMessageId: async (): Promise<Segment[]> => {
        throw new StoreError('findByMessageId', 'locked');
      },
      insert: async () => {},
    };
    const reconciler = new RecallReconciler(broken, names, createMockLogger(), 8);

    await expect(reconciler.reconcile(recall())).rejects.toThrow('findByMessageId: locked');
  });
});
