import WebSocket from 'ws';
import { AppError, Result, safeCall } from '@optiontape/shared';
import { Logger } from '../utils/logger';
import { ReconnectPolicy } from '../utils/reconnect-policy';
import { sleep } from '../utils/sleep';

export interface StreamHealthStatus {
  label: string;
  connected: boolean;
  connectedSince: Date | null;
  lastMessageReceived: Date | null;
  totalMessages: number;
  totalParseErrors: number;
  totalErrors: number;
  consecutiveFailures: number;
  totalReconnects: number;
  uptime: number;
}

export interface StreamConnectionOptions {
  label: string;
  url: string;
  reconnectPolicy: ReconnectPolicy;
  onMessage: (message: unknown) => void;
  logger: Logger;
  // Terminate a socket that has been silent this long; 0 disables
  staleTimeoutMs?: number;
}

interface SessionOutcome {
  opened: boolean;
  code?: number;
  reason: string;
}

/**
 * One long-lived websocket that reopens itself after every failure until stopped.
 *
 * `run()` settles only after `stop()`, or when the reconnect policy gives up.
 */
export class StreamConnection {
  readonly label: string;
  readonly url: string;

  private ws: WebSocket | null = null;
  private stopped = false;
  private runPromise: Promise<void> | null = null;
  private readonly abortController = new AbortController();
  private readonly reconnectPolicy: ReconnectPolicy;
  private readonly onMessage: (message: unknown) => void;
  private readonly logger: Logger;
  private readonly staleTimeoutMs: number;
  private watchdog: NodeJS.Timeout | null = null;

  private startTime = Date.now();
  private connectedSince: Date | null = null;
  private lastMessageReceived: Date | null = null;
  private totalMessages = 0;
  private totalParseErrors = 0;
  private totalErrors = 0;
  private consecutiveFailures = 0;
  private totalReconnects = 0;

  constructor(options: StreamConnectionOptions) {
    this.label = options.label;
    this.url = options.url;
    this.reconnectPolicy = options.reconnectPolicy;
    this.onMessage = options.onMessage;
    this.logger = options.logger;
    this.staleTimeoutMs = options.staleTimeoutMs ?? 0;
  }

  run(): Promise<void> {
    if (!this.runPromise) {
      this.runPromise = this.loop();
    }
    return this.runPromise;
  }

  private async loop(): Promise<void> {
    while (!this.stopped) {
      const outcome = await this.openSession();
      if (this.stopped) {
        break;
      }

      this.consecutiveFailures++;
      const delay = this.reconnectPolicy.nextDelay(this.consecutiveFailures);
      if (delay === null) {
        this.logger.error(`Stream ${this.label} gave up reconnecting`, {
          stream: this.label,
          attempts: this.consecutiveFailures,
          policy: this.reconnectPolicy.name,
        });
        break;
      }

      this.logger.error(`Stream ${this.label} disconnected, reconnecting in ${delay}ms`, {
        stream: this.label,
        wasOpen: outcome.opened,
        code: outcome.code,
        reason: outcome.reason,
        attempt: this.consecutiveFailures,
      });

      await sleep(delay, this.abortController.signal);
      if (!this.stopped) {
        this.totalReconnects++;
      }
    }

    this.logger.websocketEvent('stopped', { stream: this.label });
  }

  private openSession(): Promise<SessionOutcome> {
    return new Promise(resolve => {
      let opened = false;
      let settled = false;
      let ws: WebSocket;

      try {
        ws = new WebSocket(this.url);
      } catch (error) {
        this.totalErrors++;
        resolve({ opened, reason: error instanceof Error ? error.message : String(error) });
        return;
      }
      this.ws = ws;

      const settle = (outcome: SessionOutcome) => {
        if (settled) {
          return;
        }
        settled = true;
        this.stopWatchdog();
        this.connectedSince = null;
        if (this.ws === ws) {
          this.ws = null;
        }
        resolve(outcome);
      };

      ws.on('open', () => {
        opened = true;
        this.consecutiveFailures = 0;
        this.connectedSince = new Date();
        this.lastMessageReceived = null;
        this.logger.websocketEvent('connected', { stream: this.label });
        this.startWatchdog(ws);
      });

      ws.on('message', (data: WebSocket.RawData) => {
        this.handleFrame(data);
      });

      ws.on('error', (error: Error) => {
        this.totalErrors++;
        settle({ opened, reason: error.message });
        ws.terminate();
      });

      ws.on('close', (code: number, reason: Buffer) => {
        settle({ opened, code, reason: reason.toString() || 'connection closed' });
      });
    });
  }

  private handleFrame(data: WebSocket.RawData): void {
    // A closing socket can still flush buffered frames
    if (this.stopped) {
      return;
    }
    this.lastMessageReceived = new Date();

    const parsed: Result<unknown, AppError> = safeCall((): unknown => JSON.parse(data.toString()));
    if (parsed.isErr()) {
      this.totalParseErrors++;
      this.logger.warn('Dropped unparsable frame', { stream: this.label, error: parsed.error.message });
      return;
    }

    this.totalMessages++;
    try {
      this.onMessage(parsed.value);
    } catch (error) {
      this.totalErrors++;
      this.logger.error(
        'Stream message handler failed',
        { stream: this.label },
        error instanceof Error ? error : new Error(String(error))
      );
    }
  }

  private startWatchdog(ws: WebSocket): void {
    if (this.staleTimeoutMs <= 0) {
      return;
    }

    const openedAt = Date.now();
    this.watchdog = setInterval(() => {
      const lastActivity = this.lastMessageReceived?.getTime() ?? openedAt;
      if (Date.now() - lastActivity >= this.staleTimeoutMs) {
        this.logger.warn('No messages within stale timeout, forcing reconnect', {
          stream: this.label,
          staleTimeoutMs: this.staleTimeoutMs,
        });
        ws.terminate();
      }
    }, Math.min(this.staleTimeoutMs, 30000));
  }

  private stopWatchdog(): void {
    if (this.watchdog) {
      clearInterval(this.watchdog);
      this.watchdog = null;
    }
  }

  stop(): void {
    if (this.stopped) {
      return;
    }
    this.stopped = true;
    this.abortController.abort();
    this.ws?.close(1000, 'Normal closure');
  }

  isConnected(): boolean {
    return this.ws?.readyState === WebSocket.OPEN;
  }

  getHealthStatus(): StreamHealthStatus {
    return {
      label: this.label,
      connected: this.isConnected(),
      connectedSince: this.connectedSince,
      lastMessageReceived: this.lastMessageReceived,
      totalMessages: this.totalMessages,
      totalParseErrors: this.totalParseErrors,
      totalErrors: this.totalErrors,
      consecutiveFailures: this.consecutiveFailures,
      totalReconnects: this.totalReconnects,
      uptime: Date.now() - this.startTime,
    };
  }
}
