/**
 * PresenceWatcher: one independent polling loop per watched live room.
 *
 * Each loop queries the liveness source, advances its room's state machine and
 * notifies only on an edge. Loops share nothing, so a slow room never delays another.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import type { Logger } from '../../infra/logger/logger.js';
import { errorMessage } from '../errors.js';
import type { NotificationSink } from '../messaging/MessageSender.js';
import {
  describeLiveRoom,
  liveRoomImage,
  liveRoomUrl,
  type LiveRoomStatus,
  type LivenessSource,
} from './LiveRoomClient.js';
import {
  nextPresence,
  type PresenceNotification,
  type PresenceState,
} from './presenceState.js';

export interface WatchedRoom {
  /** Group that receives the notifications */
  channelId: number;
  roomId: string;
  onlineMsg: string;
  offlineMsg: string;
  pollIntervalSec: number;
}

export type TickResult =
  | { outcome: 'skipped'; reason: 'query_failed' | 'room_missing' | 'cancelled' }
  | { outcome: 'trapped' }
  | {
      outcome: 'observed';
      from: PresenceState;
      to: PresenceState;
      notification: PresenceNotification | null;
      delivered: boolean;
    };

/**
 * State machine of one room. The owning loop is the only writer of `state`.
 */
export class PresenceMonitor {
  private state: PresenceState;

  constructor(
    readonly room: WatchedRoom,
    private readonly source: LivenessSource,
    private readonly sink: NotificationSink,
    private readonly logger: Logger,
    initialState: PresenceState = 'init',
  ) {
    this.state = initialState;
  }

  get currentState(): PresenceState {
    return this.state;
  }

  async tick(signal?: AbortSignal): Promise<TickResult> {
    const { roomId, channelId } = this.room;
    let status: LiveRoomStatus;
    try {
      status = await this.source.query(roomId, signal);
    } catch (error) {
      if (signal?.aborted) return { outcome: 'skipped', reason: 'cancelled' };
      this.logger.error('presence', `Query live room ${roomId} failed: ${errorMessage(error)}`);
      return { outcome: 'skipped', reason: 'query_failed' };
    }
    if (!status.exists) {
      this.logger.error('presence', `直播间${roomId}不存在`);
      return { outcome: 'skipped', reason: 'room_missing' };
    }

    if (this.state === 'trap') {
      this.logger.error(
        'presence',
        `Presence watcher in trap state: room ${roomId}, group ${channelId}`,
      );
      return { outcome: 'trapped' };
    }

    if (signal?.aborted) return { outcome: 'skipped', reason: 'cancelled' };

    const from = this.state;
    const { next, notification } = nextPresence(from, status.isLive);
    // Commit before notifying: a failed delivery is dropped, never repeated
    this.state = next;
    if (from === 'init') {
      this.logger.info('presence', `Room ${roomId} initial state: ${next}`);
    }
    if (!notification) {
      return { outcome: 'observed', from, to: next, notification: null, delivered: false };
    }

    const delivered = await this.deliver(notification, status);
    return { outcome: 'observed', from, to: next, notification, delivered };
  }

  private async deliver(notification: PresenceNotification, status: LiveRoomStatus): Promise<boolean> {
    const { roomId, channelId } = this.room;
    let text: string;
    let image: string | undefined;
    if (notification === 'went_live') {
      this.logger.info('presence', `Room ${roomId} streaming, online notification`);
      text = `${this.room.onlineMsg}\n链接:${liveRoomUrl(roomId)}`;
      if (status.metadata) {
        text += `\n${describeLiveRoom(status.metadata)}`;
        image = liveRoomImage(status.metadata);
      }
    } else {
      this.logger.info('presence', `Room ${roomId} not streaming, offline notification`);
      text = this.room.offlineMsg;
    }

    try {
      await this.sink.notify(channelId, text, image);
      return true;
    } catch (error) {
      this.logger.error(
        'presence',
        `Deliver ${notification} notification to ${channelId} failed: ${errorMessage(error)}`,
      );
      return false;
    }
  }
}

export class PresenceWatcher {
  private readonly monitors: PresenceMonitor[];
  private controller: AbortController | null = null;
  private loops: Promise<void>[] = [];

  constructor(
    rooms: readonly WatchedRoom[],
    source: LivenessSource,
    sink: NotificationSink,
    private readonly logger: Logger,
  ) {
    this.monitors = rooms.map((room) => new PresenceMonitor(room, source, sink, logger));
  }

  getMonitors(): readonly PresenceMonitor[] {
    return this.monitors;
  }

  /** Start one loop per room. The first tick runs immediately. */
  start(): void {
    if (this.controller) return;
    const controller = new AbortController();
    this.controller = controller;
    this.loops = this.monitors.map((monitor) =>
      this.runLoop(monitor, controller.signal).catch((error: unknown) => {
        this.logger.error(
          'presence',
          `Loop for room ${monitor.room.roomId} stopped: ${errorMessage(error)}`,
        );
      }),
    );
    this.logger.info('presence', `Watching ${this.monitors.length} live room(s)`);
  }

  /**
   * Cancel every loop. Pending queries are aborted and in-flight notifications
   * are left to finish on their own; `settled()` resolves once the loops have exited.
   */
  stop(): void {
    if (!this.controller) return;
    this.controller.abort();
    this.controller = null;
    this.logger.info('presence', 'Presence watcher stopped');
  }

  async settled(): Promise<void> {
    await Promise.all(this.loops);
  }

  private async runLoop(monitor: PresenceMonitor, signal: AbortSignal): Promise<void> {
    const intervalMs = monitor.room.pollIntervalSec * 1000;
    const aborted = whenAborted(signal);
    while (!signal.aborted) {
      const startedAt = Date.now();
      // A notification stuck in flight must not hold the loop past stop()
      await Promise.race([monitor.tick(signal), aborted]);
      if (signal.aborted) return;
      const wait = Math.max(0, intervalMs - (Date.now() - startedAt));
      try {
        await sleep(wait, undefined, { signal });
      } catch (error) {
        if (signal.aborted) return;
        throw error;
      }
    }
  }
}

function whenAborted(signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    signal.addEventListener('abort', () => resolve(), { once: true });
  });
}
