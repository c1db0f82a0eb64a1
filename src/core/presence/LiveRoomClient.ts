import { z } from 'zod';
import type { Logger } from '../../infra/logger/logger.js';
import { UpstreamError, errorMessage } from '../errors.js';

export interface LiveRoomMetadata {
  title: string;
  areaName: string;
  description: string;
  online: number;
  attention: number;
  keyframe: string;
  userCover: string;
}

export interface LiveRoomStatus {
  exists: boolean;
  isLive: boolean;
  metadata: LiveRoomMetadata | null;
}

/**
 * Liveness collaborator: one query per tick, rejects on transport or decode failure.
 * An aborted `signal` rejects the pending query.
 */
export interface LivenessSource {
  query(roomId: string, signal?: AbortSignal): Promise<LiveRoomStatus>;
}

const RoomInfoSchema = z.object({
  code: z.number(),
  data: z
    .object({
      live_status: z.number().default(0),
      online: z.number().default(0),
      attention: z.number().default(0),
      keyframe: z.string().default(''),
      user_cover: z.string().default(''),
      area_name: z.string().default(''),
      description: z.string().default(''),
      title: z.string().default(''),
    })
    .nullish()
    .catch(null),
});

export function liveRoomUrl(roomId: string): string {
  return `https://live.bilibili.com/${roomId}`;
}

/**
 * Bilibili live room API client.
 */
export class LiveRoomClient implements LivenessSource {
  private baseUrl: string;
  private fetchImpl: typeof fetch;
  private timeoutMs: number;

  constructor(
    private logger: Logger,
    options: { baseUrl?: string; fetchImpl?: typeof fetch; timeoutMs?: number } = {},
  ) {
    this.baseUrl = options.baseUrl ?? 'https://api.live.bilibili.com';
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.timeoutMs = options.timeoutMs ?? 10_000;
  }

  async query(roomId: string, signal?: AbortSignal): Promise<LiveRoomStatus> {
    const url = `${this.baseUrl}/room/v1/Room/get_info?room_id=${encodeURIComponent(roomId)}`;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);
    const forwardAbort = () => controller.abort();
    if (signal?.aborted) controller.abort();
    signal?.addEventListener('abort', forwardAbort, { once: true });

    let body: unknown;
    try {
      const response = await this.fetchImpl(url, { signal: controller.signal });
      if (!response.ok) {
        throw new UpstreamError('live-room', `HTTP ${response.status} for room ${roomId}`);
      }
      body = await response.json();
    } catch (error) {
      if (error instanceof UpstreamError) throw error;
      if (controller.signal.aborted) {
        const reason = signal?.aborted ? 'cancelled' : `timed out after ${this.timeoutMs}ms`;
        throw new UpstreamError('live-room', `room ${roomId}: ${reason}`, { cause: error });
      }
      throw new UpstreamError('live-room', errorMessage(error), { cause: error });
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', forwardAbort);
    }

    const parsed = RoomInfoSchema.safeParse(body);
    if (!parsed.success) {
      throw new UpstreamError('live-room', `unexpected response: ${parsed.error.message}`);
    }
    const { code, data } = parsed.data;
    this.logger.debug('live-room', `Room ${roomId}: code=${code}, live_status=${data?.live_status}`);
    if (code !== 0 || !data) {
      return { exists: false, isLive: false, metadata: null };
    }
    return {
      exists: true,
      isLive: data.live_status === 1,
      metadata: {
        title: data.title,
        areaName: data.area_name,
        description: data.description,
        online: data.online,
        attention: data.attention,
        keyframe: data.keyframe,
        userCover: data.user_cover,
      },
    };
  }
}

/** Multi-line room summary used by notifications and the /live command. */
export function describeLiveRoom(metadata: LiveRoomMetadata): string {
  return [
    `分区:${metadata.areaName}`,
    `标题:${metadata.title}`,
    `简介:${metadata.description}`,
    `热度:${metadata.online}, 关注:${metadata.attention}`,
  ].join('\n');
}

/** Key frame when present, otherwise the streamer's cover. */
export function liveRoomImage(metadata: LiveRoomMetadata): string | undefined {
  return [metadata.keyframe, metadata.userCover].find((url) => url.length > 0);
}
