import { WebSocketServer } from 'ws';
import type { WebSocket } from 'ws';
import type { IncomingMessage } from 'node:http';
import { Logger } from '@riverwatch/shared';
import { SimulatedStation, defaultProfile } from './station-series.js';
import type { Random, StationProfile } from './station-series.js';

export { SimulatedStation, defaultProfile } from './station-series.js';
export type { SimulatedSample, StationProfile } from './station-series.js';

export interface FeedServerOptions {
  /** 0 picks a free port */
  port?: number;
  host?: string;
  /** Publish a new sample to every connected station this often; 0 disables the timer */
  intervalMs?: number;
  /** Samples kept and sent per frame */
  historySize?: number;
  /** Samples generated when a station is first requested */
  backfill?: number;
  /** Spacing of generated samples, seconds */
  stepSeconds?: number;
  profiles?: Record<string, StationProfile>;
  /** JSON-encode frames twice, as the production feed sometimes does */
  doubleEncode?: boolean;
  random?: Random;
  clock?: () => number;
  logger?: Logger;
}

const STATION_PATH = /^\/ws\/station\/([A-Za-z0-9_-]+)\/?$/;

/**
 * Local stand-in for the station feed: serves `/ws/station/{id}/`, sends the
 * station's full history on connect and one more sample per interval.
 */
export class StationFeedServer {
  private wss: WebSocketServer | null = null;
  private readonly stations = new Map<string, SimulatedStation>();
  private readonly clients = new Map<string, Set<WebSocket>>();
  private publishTimer: ReturnType<typeof setInterval> | null = null;
  private readonly opts: Required<Omit<FeedServerOptions, 'profiles'>> & { profiles: Record<string, StationProfile> };
  /** Total connections accepted since start */
  connectionsAccepted = 0;

  constructor(options: FeedServerOptions = {}) {
    this.opts = {
      port: options.port ?? 8765,
      host: options.host ?? '127.0.0.1',
      intervalMs: options.intervalMs ?? 60_000,
      historySize: options.historySize ?? 288,
      backfill: options.backfill ?? 48,
      stepSeconds: options.stepSeconds ?? 300,
      profiles: options.profiles ?? {},
      doubleEncode: options.doubleEncode ?? false,
      random: options.random ?? Math.random,
      clock: options.clock ?? (() => Math.floor(Date.now() / 1000)),
      logger: options.logger ?? new Logger('simulator'),
    };
  }

  /** Resolves with the bound port */
  start(): Promise<number> {
    return new Promise((resolve, reject) => {
      const wss = new WebSocketServer({ port: this.opts.port, host: this.opts.host });
      this.wss = wss;

      wss.once('error', reject);
      wss.on('listening', () => {
        const address = wss.address();
        const port = typeof address === 'string' ? this.opts.port : address.port;
        this.opts.logger.info(`Station feed running on ws://${this.opts.host}:${port}/ws/station/{id}/`);
        if (this.opts.intervalMs > 0) {
          this.publishTimer = setInterval(() => this.publishAll(), this.opts.intervalMs);
        }
        resolve(port);
      });

      wss.on('connection', (socket, req) => this.handleConnection(socket, req));
    });
  }

  private handleConnection(socket: WebSocket, req: IncomingMessage) {
    const match = STATION_PATH.exec(req.url ?? '');
    if (!match) {
      socket.close(4404, 'Unknown station path');
      return;
    }
    const id = match[1];
    this.connectionsAccepted++;

    let sockets = this.clients.get(id);
    if (!sockets) {
      sockets = new Set();
      this.clients.set(id, sockets);
    }
    sockets.add(socket);
    this.opts.logger.info(`Client connected to station ${id} (${sockets.size} open)`);

    socket.on('close', () => {
      this.clients.get(id)?.delete(socket);
    });
    socket.on('error', err => {
      this.opts.logger.warn(`Client socket error on station ${id}: ${err.message}`);
    });

    socket.send(this.encode(this.station(id)));
  }

  /** The station's series, created (and back-filled) on first use */
  station(id: string): SimulatedStation {
    let station = this.stations.get(id);
    if (!station) {
      const profile = this.opts.profiles[id] ?? defaultProfile(id);
      station = new SimulatedStation(id, profile, this.opts.historySize, this.opts.random);
      if (this.opts.backfill > 0) {
        station.backfill(this.opts.backfill, this.opts.stepSeconds, this.opts.clock());
      }
      this.stations.set(id, station);
    }
    return station;
  }

  private encode(station: SimulatedStation): string {
    const json = JSON.stringify(station.frame());
    return this.opts.doubleEncode ? JSON.stringify(json) : json;
  }

  /** Send the station's current frame to its clients; returns the number reached */
  publish(id: string): number {
    const sockets = this.clients.get(id);
    if (!sockets || sockets.size === 0) return 0;
    const frame = this.encode(this.station(id));
    let sent = 0;
    for (const socket of sockets) {
      if (socket.readyState === socket.OPEN) {
        socket.send(frame);
        sent++;
      }
    }
    return sent;
  }

  /** Send arbitrary text to a station's clients */
  sendRaw(id: string, data: string): number {
    let sent = 0;
    for (const socket of this.clients.get(id) ?? []) {
      if (socket.readyState === socket.OPEN) {
        socket.send(data);
        sent++;
      }
    }
    return sent;
  }

  private publishAll() {
    const now = this.opts.clock();
    for (const [id, sockets] of this.clients) {
      if (sockets.size === 0) continue;
      const station = this.station(id);
      const latest = station.history[station.history.length - 1];
      station.step(latest && latest.time >= now ? latest.time + this.opts.stepSeconds : now);
      this.publish(id);
    }
  }

  /** Cut every client link without a close handshake */
  dropConnections(id?: string) {
    for (const [stationId, sockets] of this.clients) {
      if (id !== undefined && stationId !== id) continue;
      for (const socket of sockets) socket.terminate();
      sockets.clear();
    }
  }

  openConnections(id: string): number {
    return this.clients.get(id)?.size ?? 0;
  }

  close(): Promise<void> {
    if (this.publishTimer) clearInterval(this.publishTimer);
    this.publishTimer = null;
    const wss = this.wss;
    this.wss = null;
    if (!wss) return Promise.resolve();
    for (const client of wss.clients) client.terminate();
    return new Promise((resolve, reject) => {
      wss.close(err => (err ? reject(err) : resolve()));
    });
  }
}
