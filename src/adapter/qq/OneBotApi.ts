import { z } from 'zod';
import type { OneBotCaller } from '../../core/messaging/MessageSender.js';
import { UpstreamError } from '../../core/errors.js';
import type { Logger } from '../../infra/logger/logger.js';

/** The part of a ws WebSocket the API needs. */
export interface ApiSocket {
  readonly readyState: number;
  send(data: string, cb?: (err?: Error) => void): void;
}

const SOCKET_OPEN = 1;

const ResponseSchema = z.object({
  status: z.string().optional(),
  retcode: z.number().optional(),
  data: z.unknown().optional(),
  message: z.string().optional(),
  wording: z.string().optional(),
  echo: z.union([z.string(), z.number()]).transform(String),
});

interface PendingCall {
  action: string;
  resolve: (data: unknown) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

/**
 * OneBot API over the reverse WebSocket. Each request carries a unique `echo`;
 * the matching response settles it, or the call times out.
 */
export class OneBotApi implements OneBotCaller {
  private socket: ApiSocket | null = null;
  private pending = new Map<string, PendingCall>();
  private seq = 0;

  constructor(
    private logger: Logger,
    private timeoutMs: number = 10_000,
  ) {}

  attach(socket: ApiSocket): void {
    this.socket = socket;
  }

  /** Forget the socket and fail every call still waiting on it. */
  detach(socket: ApiSocket): void {
    if (this.socket !== socket) return;
    this.socket = null;
    for (const [echo, call] of this.pending) {
      clearTimeout(call.timer);
      call.reject(new UpstreamError('onebot', `${call.action}: connection closed`));
      this.pending.delete(echo);
    }
  }

  call(action: string, params: Record<string, unknown>): Promise<unknown> {
    const socket = this.socket;
    if (!socket || socket.readyState !== SOCKET_OPEN) {
      return Promise.reject(new UpstreamError('onebot', `${action}: no open connection`));
    }
    const echo = `${action}:${++this.seq}`;

    return new Promise<unknown>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending.delete(echo);
        reject(new UpstreamError('onebot', `${action}: timed out after ${this.timeoutMs}ms`));
      }, this.timeoutMs);
      this.pending.set(echo, { action, resolve, reject, timer });

      socket.send(JSON.stringify({ action, params, echo }), (err) => {
        if (!err) return;
        clearTimeout(timer);
        this.pending.delete(echo);
        reject(new UpstreamError('onebot', `${action}: send failed: ${err.message}`, { cause: err }));
      });
    });
  }

  /**
   * Settle the call a response frame belongs to. Returns false for unknown echoes.
   */
  handleResponse(raw: unknown): boolean {
    const parsed = ResponseSchema.safeParse(raw);
    if (!parsed.success) return false;
    const response = parsed.data;
    const call = this.pending.get(response.echo);
    if (!call) {
      this.logger.debug('onebot', `Response for unknown echo ${response.echo}`);
      return false;
    }
    this.pending.delete(response.echo);
    clearTimeout(call.timer);

    const ok = response.status === 'ok' || (response.status === undefined && response.retcode === 0);
    if (ok) {
      call.resolve(response.data ?? null);
    } else {
      const reason = response.wording ?? response.message ?? `retcode ${response.retcode ?? '?'}`;
      call.reject(new UpstreamError('onebot', `${call.action}: ${reason}`));
    }
    return true;
  }
}
