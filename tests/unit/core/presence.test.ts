import { afterEach, describe, expect, it, vi } from 'vitest';
import type { NotificationSink } from '../../../src/core/messaging/MessageSender.js';
import {
  LiveRoomClient,
  describeLiveRoom,
  liveRoomImage,
  type LiveRoomMetadata,
  type LiveRoomStatus,
  type LivenessSource,
} from '../../../src/core/presence/LiveRoomClient.js';
import {
  PresenceMonitor,
  PresenceWatcher,
  type WatchedRoom,
} from '../../../src/core/presence/PresenceWatcher.js';
import { decodePresenceState, nextPresence } from '../../../src/core/presence/presenceState.js';
import { createMockLogger, messages } from '../helpers.js';

const metadata: LiveRoomMetadata = {
  title: 'Late night stream',
  areaName: 'Music',
  description: 'hi',
  online: 321,
  attention: 45,
  keyframe: '',
  userCover: 'https://example.com/cover.jpg',
};

const room: WatchedRoom = {
  channelId: 100,
  roomId: '2233',
  onlineMsg: 'on air',
  offlineMsg: 'bye',
  pollIntervalSec: 1,
};

function status(isLive: boolean): LiveRoomStatus {
  return { exists: true, isLive, metadata };
}

/** Source replaying scripted answers; an Error entry makes that query fail. */
function scripted(answers: Array<LiveRoomStatus | Error>): LivenessSource & { calls: number } {
  const source = {
    calls: 0,
    async query(): Promise<LiveRoomStatus> {
      const answer = answers[Math.min(source.calls, answers.length - 1)];
      source.calls++;
      if (answer instanceof Error) throw answer;
      return answer;
    },
  };
  return source;
}

function sink() {
  return { notify: vi.fn<NotificationSink['notify']>(async () => {}) };
}

describe('nextPresence', () => {
  it('should only record the first observation', () => {
    expect(nextPresence('init', true)).toEqual({ next: 'on', notification: null });
    expect(nextPresence('init', false)).toEqual({ next: 'off', notification: null });
  });

  it('should notify on edges only', () => {
    expect(nextPresence('off', true)).toEqual({ next: 'on', notification: 'went_live' });
    expect(nextPresence('on', false)).toEqual({ next: 'off', notification: 'went_offline' });
    expect(nextPresence('on', true)).toEqual({ next: 'on', notification: null });
    expect(nextPresence('off', false)).toEqual({ next: 'off', notification: null });
  });

  it('should never leave trap', () => {
    expect(nextPresence('trap', true)).toEqual({ next: 'trap', notification: null });
    expect(nextPresence('trap', false)).toEqual({ next: 'trap', notification: null });
  });

  it('should decode unknown states as trap', () => {
    expect(decodePresenceState('on')).toBe('on');
    expect(decodePresenceState('streaming')).toBe('trap');
    expect(decodePresenceState(3)).toBe('trap');
  });
});

describe('PresenceMonitor', () => {
  it('should notify once per edge over a tick sequence', async () => {
    const source = scripted([status(false), status(true), status(true), status(false), status(false)]);
    const target = sink();
    const monitor = new PresenceMonitor(room, source, target, createMockLogger());

    for (let i = 0; i < 5; i++) await monitor.tick();

    expect(monitor.currentState).toBe('off');
    expect(target.notify.mock.calls).toEqual([
      [
        100,
        'on air\n链接:https://live.bilibili.com/2233\n分区:Music\n标题:Late night stream\n简介:hi\n热度:321, 关注:45',
        'https://example.com/cover.jpg',
      ],
      [100, 'bye', undefined],
    ]);
  });

  it('should stay silent when the first observation is live', async () => {
    const target = sink();
    const monitor = new PresenceMonitor(room, scripted([status(true)]), target, createMockLogger());

    expect(await monitor.tick()).toEqual({
      outcome: 'observed',
      from: 'init',
      to: 'on',
      notification: null,
      delivered: false,
    });
    expect(target.notify).not.toHaveBeenCalled();
  });

  it('should keep its state when the query fails', async () => {
    const logger = createMockLogger();
    const source = scripted([status(false), new Error('timeout'), status(true)]);
    const target = sink();
    const monitor = new PresenceMonitor(room, source, target, logger);

    await monitor.tick();
    expect(await monitor.tick()).toEqual({ outcome: 'skipped', reason: 'query_failed' });
    expect(monitor.currentState).toBe('off');
    expect(messages(logger.error)).toEqual(['Query live room 2233 failed: timeout']);

    await monitor.tick();
    expect(target.notify).toHaveBeenCalledTimes(1);
  });

  it('should report a missing room without changing state', async () => {
    const logger = createMockLogger();
    const monitor = new PresenceMonitor(
      room,
      scripted([{ exists: false, isLive: false, metadata: null }]),
      sink(),
      logger,
    );

    expect(await monitor.tick()).toEqual({ outcome: 'skipped', reason: 'room_missing' });
    expect(monitor.currentState).toBe('init');
    expect(messages(logger.error)).toEqual(['直播间2233不存在']);
  });

  it('should not repeat a notification whose delivery failed', async () => {
    const target = sink();
    target.notify.mockRejectedValueOnce(new Error('socket closed'));
    const monitor = new PresenceMonitor(
      room,
      scripted([status(true)]),
      target,
      createMockLogger(),
      'off',
    );

    expect(await monitor.tick()).toEqual({
      outcome: 'observed',
      from: 'off',
      to: 'on',
      notification: 'went_live',
      delivered: false,
    });
    await monitor.tick();

    expect(monitor.currentState).toBe('on');
    expect(target.notify).toHaveBeenCalledTimes(1);
  });

  it('should log and do nothing while trapped', async () => {
    const logger = createMockLogger();
    const target = sink();
    const monitor = new PresenceMonitor(room, scripted([status(true)]), target, logger, 'trap');

    expect(await monitor.tick()).toEqual({ outcome: 'trapped' });
    expect(monitor.currentState).toBe('trap');
    expect(target.notify).not.toHaveBeenCalled();
    expect(messages(logger.error)).toEqual(['Presence watcher in trap state: room 2233, group 100']);
  });
});

describe('PresenceWatcher', () => {
  it('should tick each room immediately and stop on request', async () => {
    const source = scripted([status(false)]);
    const watcher = new PresenceWatcher(
      [room, { ...room, roomId: '4455', channelId: 200 }],
      source,
      sink(),
      createMockLogger(),
    );

    watcher.start();
    await vi.waitFor(() => expect(source.calls).toBe(2));
    watcher.stop();
    await watcher.settled();

    expect(watcher.getMonitors().map((m) => m.currentState)).toEqual(['off', 'off']);
    expect(source.calls).toBe(2);
  });

  it('should abort a hung query on stop', async () => {
    const signals: Array<AbortSignal | undefined> = [];
    const source: LivenessSource = {
      query: (_roomId, signal) => {
        signals.push(signal);
        return new Promise<LiveRoomStatus>(() => {});
      },
    };
    const logger = createMockLogger();
    const watcher = new PresenceWatcher([room], source, sink(), logger);

    watcher.start();
    await vi.waitFor(() => expect(signals).toHaveLength(1));
    watcher.stop();
    await watcher.settled();

    expect(signals[0]?.aborted).toBe(true);
    expect(watcher.getMonitors()[0].currentState).toBe('init');
    expect(messages(logger.error)).toEqual([]);
  });

  it('should not wait for a notification stuck in flight', async () => {
    const source = scripted([status(false), status(true)]);
    const target = { notify: vi.fn<NotificationSink['notify']>(() => new Promise<void>(() => {})) };
    const watcher = new PresenceWatcher(
      [{ ...room, pollIntervalSec: 0.01 }],
      source,
      target,
      createMockLogger(),
    );

    watcher.start();
    await vi.waitFor(() => expect(target.notify).toHaveBeenCalledTimes(1));
    watcher.stop();
    await watcher.settled();

    expect(watcher.getMonitors()[0].currentState).toBe('on');
    expect(source.calls).toBe(2);
  });
});

describe('LiveRoomClient', () => {
  function clientReturning(body: unknown, httpStatus = 200) {
    const fetchImpl = vi.fn<typeof fetch>(
      async () => new Response(JSON.stringify(body), { status: httpStatus }),
    );
    return { fetchImpl, client: new LiveRoomClient(createMockLogger(), { fetchImpl }) };
  }

  it('should map a live room', async () => {
    const { client, fetchImpl } = clientReturning({
      code: 0,
      data: {
        live_status: 1,
        online: 10,
        attention: 2,
        keyframe: 'https://example.com/k.jpg',
        user_cover: '',
        area_name: 'Chat',
        description: 'd',
        title: 't',
      },
    });

    expect(await client.query('2233')).toEqual({
      exists: true,
      isLive: true,
      metadata: {
        title: 't',
        areaName: 'Chat',
        description: 'd',
        online: 10,
        attention: 2,
        keyframe: 'https://example.com/k.jpg',
        userCover: '',
      },
    });
    expect(fetchImpl.mock.calls[0][0]).toBe(
      'https://api.live.bilibili.com/room/v1/Room/get_info?room_id=2233',
    );
  });

  it('should treat a non-zero code as a missing room', async () => {
    const { client } = clientReturning({ code: 1, message: 'not found', data: [] });
    expect(await client.query('1')).toEqual({ exists: false, isLive: false, metadata: null });
  });

  it('should fail on HTTP errors', async () => {
    const { client } = clientReturning({}, 503);
    await expect(client.query('1')).rejects.toThrow('live-room: HTTP 503 for room 1');
  });

  describe('timeouts', () => {
    afterEach(() => {
      vi.useRealTimers();
    });

    /** fetch that only settles when its signal aborts */
    const hangingFetch = () =>
      vi.fn<typeof fetch>(
        (_input, init) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener('abort', () => reject(new Error('This operation was aborted')));
          }),
      );

    it('should give up on a stalled request after the timeout', async () => {
      vi.useFakeTimers();
      const fetchImpl = hangingFetch();
      const client = new LiveRoomClient(createMockLogger(), { fetchImpl, timeoutMs: 50 });

      const pending = client.query('2233');
      const assertion = expect(pending).rejects.toThrow('live-room: room 2233: timed out after 50ms');
      await vi.advanceTimersByTimeAsync(50);
      await assertion;
    });

    it('should reject as cancelled when the caller aborts', async () => {
      const client = new LiveRoomClient(createMockLogger(), { fetchImpl: hangingFetch() });
      const controller = new AbortController();

      const pending = client.query('2233', controller.signal);
      controller.abort();

      await expect(pending).rejects.toThrow('live-room: room 2233: cancelled');
    });
  });

  it('should prefer the key frame over the cover', () => {
    expect(liveRoomImage({ ...metadata, keyframe: 'k' })).toBe('k');
    expect(liveRoomImage(metadata)).toBe('https://example.com/cover.jpg');
    expect(liveRoomImage({ ...metadata, userCover: '' })).toBeUndefined();
    expect(describeLiveRoom(metadata).split('\n')).toHaveLength(4);
  });
});
