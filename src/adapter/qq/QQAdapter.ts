import { WebSocketServer, WebSocket, type RawData } from 'ws';
import { URL } from 'node:url';
import type { Logger } from '../../infra/logger/logger.js';
import type { MainRouter } from '../../core/router/MainRouter.js';
import { errorMessage } from '../../core/errors.js';
import type { OneBotApi } from './OneBotApi.js';
import { classifyFrame } from './qqEventMapper.js';

export interface QQAdapterOptions {
  wsPort: number;
  wsPath?: string;
  token?: string;
}

/**
 * QQ/NapCat adapter - handles OneBot11 over a reverse WebSocket.
 * Events go to MainRouter, API responses go back to OneBotApi.
 */
export class QQAdapter {
  private wss: WebSocketServer | null = null;
  private connections: Set<WebSocket> = new Set();
  private readonly wsPath: string;

  constructor(
    private router: Pick<MainRouter, 'handleEvent' | 'handleNotice'>,
    private api: OneBotApi,
    private logger: Logger,
    private options: QQAdapterOptions,
  ) {
    this.wsPath = options.wsPath ?? '/';
  }

  /**
   * Start reverse WebSocket server to accept connections from NapCat.
   */
  public start(): void {
    this.wss = new WebSocketServer({
      port: this.options.wsPort,
      path: this.wsPath,
    });

    this.logger.info('qq-adapter', `Listening on ws://localhost:${this.options.wsPort}${this.wsPath}`);

    this.wss.on('connection', (ws: WebSocket, req) => {
      if (this.options.token) {
        const providedToken = extractToken(req.headers['authorization'], req.url);
        if (providedToken !== this.options.token) {
          this.logger.warn('qq-adapter', 'Connection rejected: invalid token');
          ws.close(4401, 'Unauthorized');
          return;
        }
      } else {
        this.logger.warn('qq-adapter', 'Token not configured - accepting connection (dev mode)');
      }

      this.logger.info('qq-adapter', 'New connection established');
      this.connections.add(ws);
      // Latest connection carries outbound API calls
      this.api.attach(ws);

      ws.on('message', (data: RawData) => {
        this.handleFrame(data).catch((err: unknown) => {
          this.logger.error('qq-adapter', `Handle frame failed: ${errorMessage(err)}`);
        });
      });

      ws.on('close', () => {
        this.logger.info('qq-adapter', 'Connection closed');
        this.connections.delete(ws);
        this.api.detach(ws);
      });

      ws.on('error', (err: Error) => {
        this.logger.error('qq-adapter', `WebSocket error: ${err.message}`);
        this.connections.delete(ws);
        this.api.detach(ws);
      });
    });

    this.wss.on('error', (err: Error) => {
      this.logger.error('qq-adapter', `Server error: ${err.message}`);
    });
  }

  private async handleFrame(data: RawData): Promise<void> {
    let raw: unknown;
    try {
      raw = JSON.parse(data.toString());
    } catch (err) {
      this.logger.error('qq-adapter', `Parse error: ${errorMessage(err)}`);
      return;
    }

    const frame = classifyFrame(raw, this.logger);
    switch (frame.type) {
      case 'message':
        await this.router.handleEvent(frame.event);
        return;
      case 'notice':
        await this.router.handleNotice(frame.raw, frame.selfId);
        return;
      case 'response':
        this.api.handleResponse(frame.raw);
        return;
      case 'ignored':
        return;
    }
  }

  /**
   * Stop the reverse WebSocket server.
   */
  public stop(): Promise<void> {
    const wss = this.wss;
    if (!wss) return Promise.resolve();
    this.wss = null;
    for (const ws of this.connections) {
      ws.close();
    }
    return new Promise((resolve) => {
      wss.close(() => {
        this.logger.info('qq-adapter', 'Server stopped');
        resolve();
      });
    });
  }
}

/** Bearer token from the Authorization header, or `?access_token=` on the URL. */
export function extractToken(
  authHeader: string | string[] | undefined,
  url?: string,
): string | undefined {
  const header = Array.isArray(authHeader) ? authHeader[0] : authHeader;
  if (header) {
    return header.startsWith('Bearer ') ? header.substring(7) : header;
  }
  if (url) {
    try {
      const parsed = new URL(url, 'http://localhost');
      const t = parsed.searchParams.get('access_token');
      if (t) return t;
    } catch {
      return undefined;
    }
  }
  return undefined;
}
