import WebSocket from 'ws';
import { ConnectError, emptyCounters, errorMessage } from '@riverwatch/shared';
import type { ConnectionState, Logger, StationCounters } from '@riverwatch/shared';
import { parseMessage } from './parser.js';
import { sleep } from './timing.js';
import type { WindowAccumulator } from './window.js';

export type SocketFactory = (url: string) => WebSocket;

export interface ConnectionOptions {
  stationCode: string;
  url: string;
  accumulator: WindowAccumulator;
  logger: Logger;
  baseDelayMs: number;
  maxDelayMs: number;
  /** A link with no frame for this long is treated as failed */
  idleTimeoutMs: number;
  counters?: StationCounters;
  createSocket?: SocketFactory;
  onStateChange?: (state: ConnectionState) => void;
}

/** Reconnect delay after `failures` consecutive failures: base * 2^(n-1), capped. */
export function backoffDelay(failures: number, baseDelayMs: number, maxDelayMs: number): number {
  if (failures < 1) return 0;
  // 2^31 already exceeds any sane cap; avoid Infinity for long outages
  const exponent = Math.min(failures - 1, 31);
  return Math.min(maxDelayMs, baseDelayMs * 2 ** exponent);
}

const defaultSocketFactory: SocketFactory = url => new WebSocket(url, { handshakeTimeout: 15_000 });

/**
 * Owns the live link to one station's feed. Reconnects with exponential
 * backoff until the shutdown signal fires; only then does it settle in
 * `disconnected`.
 */
export class ConnectionManager {
  private currentState: ConnectionState = { kind: 'disconnected' };
  private consecutiveFailures = 0;
  readonly counters: StationCounters;
  private readonly createSocket: SocketFactory;
  private readonly log: Logger;

  constructor(private readonly opts: ConnectionOptions) {
    this.counters = opts.counters ?? emptyCounters();
    this.createSocket = opts.createSocket ?? defaultSocketFactory;
    this.log = opts.logger;
  }

  get state(): ConnectionState {
    return this.currentState;
  }

  get failures(): number {
    return this.consecutiveFailures;
  }

  private setState(state: ConnectionState) {
    this.currentState = state;
    this.opts.onStateChange?.(state);
  }

  /** Runs until `signal` aborts. */
  async run(signal: AbortSignal): Promise<void> {
    let attempt = 0;
    while (!signal.aborted) {
      if (attempt++ > 0) this.counters.reconnects++;
      this.setState({ kind: 'connecting' });

      const failure = await this.session(signal);
      if (signal.aborted) break;

      this.consecutiveFailures++;
      const delayMs = backoffDelay(this.consecutiveFailures, this.opts.baseDelayMs, this.opts.maxDelayMs);
      this.log.warn(`${failure.message}; retry #${this.consecutiveFailures} in ${delayMs}ms`);
      this.setState({ kind: 'backoff', failures: this.consecutiveFailures, delayMs });
      await sleep(delayMs, signal);
    }
    this.setState({ kind: 'disconnected' });
  }

  /**
   * One connection from handshake to teardown. Resolves with the reason the
   * link ended; the socket is always closed before it resolves.
   */
  private session(signal: AbortSignal): Promise<ConnectError> {
    const { url } = this.opts;

    return new Promise(resolve => {
      let socket: WebSocket;
      try {
        socket = this.createSocket(url);
      } catch (err) {
        resolve(new ConnectError(`Cannot open ${url}: ${errorMessage(err)}`, { cause: err }));
        return;
      }

      let settled = false;
      let opened = false;
      let metaCaptured = false;
      let idleTimer: ReturnType<typeof setTimeout> | null = null;

      const finish = (reason: ConnectError) => {
        if (settled) return;
        settled = true;
        if (idleTimer) clearTimeout(idleTimer);
        signal.removeEventListener('abort', onAbort);
        if (socket.readyState === WebSocket.OPEN) {
          socket.close(1000);
        } else if (socket.readyState !== WebSocket.CLOSED) {
          socket.terminate();
        }
        resolve(reason);
      };

      const armIdleTimer = () => {
        if (idleTimer) clearTimeout(idleTimer);
        idleTimer = setTimeout(() => {
          finish(new ConnectError(`No frame from ${url} for ${this.opts.idleTimeoutMs}ms`));
        }, this.opts.idleTimeoutMs);
      };

      const onAbort = () => finish(new ConnectError('Shutdown requested'));
      signal.addEventListener('abort', onAbort, { once: true });

      socket.on('open', () => {
        opened = true;
        this.log.info(`Connected to ${url}`);
        this.setState({ kind: 'streaming' });
        armIdleTimer();
      });

      socket.on('message', (data: WebSocket.RawData) => {
        if (settled) return;
        armIdleTimer();
        if (this.handleFrame(rawDataToString(data), metaCaptured)) metaCaptured = true;
      });

      socket.on('error', (err: Error) => {
        if (settled) {
          this.log.debug(`Socket error after teardown: ${err.message}`);
          return;
        }
        const phase = opened ? 'Read error' : 'Handshake failed';
        finish(new ConnectError(`${phase} on ${url}: ${err.message}`, { cause: err }));
      });

      socket.on('close', (code: number, reason: Buffer) => {
        const detail = reason.length > 0 ? ` (${reason.toString()})` : '';
        finish(new ConnectError(
          opened ? `Remote closed ${url} with code ${code}${detail}` : `Connection to ${url} closed during handshake`,
        ));
      });
    });
  }

  /** Parse one frame into the window. Returns true once station metadata was captured. */
  private handleFrame(raw: string, metaCaptured: boolean): boolean {
    const { stationCode, accumulator } = this.opts;
    const result = parseMessage(raw);
    if (!result.ok) {
      this.counters.parseErrors++;
      this.log.warn(`Dropped frame: ${result.error.message}`);
      return metaCaptured;
    }

    const { meta, records, droppedSamples } = result.batch;
    if (!metaCaptured) accumulator.setMeta(stationCode, meta);
    if (droppedSamples > 0) {
      this.counters.droppedSamples += droppedSamples;
      this.log.warn(`Dropped ${droppedSamples} sample(s) with unreadable timestamps`);
    }

    const outcome = accumulator.acceptBatch(stationCode, records);
    this.counters.recordsAccepted += outcome.accepted;
    this.counters.duplicates += outcome.duplicates;
    this.counters.outOfOrder += outcome.outOfOrder;
    if (records.length > 0) this.consecutiveFailures = 0;

    this.log.debug(
      `Frame: ${records.length} record(s), ${outcome.accepted} new, ` +
        `${outcome.duplicates} duplicate, ${outcome.outOfOrder} out of order`,
    );
    return true;
  }
}

function rawDataToString(data: WebSocket.RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8');
  return data.toString('utf8');
}
