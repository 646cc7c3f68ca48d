import { describe, it, expect, afterEach } from 'vitest';
import WebSocket from 'ws';
import { Logger } from '@riverwatch/shared';
import { StationFeedServer } from '../feed-server.js';
import type { FeedServerOptions } from '../feed-server.js';

const quiet = new Logger('simulator', 'error', {
  debug: () => undefined,
  log: () => undefined,
  warn: () => undefined,
  error: () => undefined,
});

function nextMessage(socket: WebSocket): Promise<string> {
  return new Promise((resolve, reject) => {
    socket.once('message', data => resolve(data.toString()));
    socket.once('error', reject);
  });
}

function closeCode(socket: WebSocket): Promise<number> {
  return new Promise(resolve => socket.once('close', code => resolve(code)));
}

describe('StationFeedServer', () => {
  const sockets: WebSocket[] = [];
  let server: StationFeedServer | null = null;

  afterEach(async () => {
    for (const socket of sockets.splice(0)) socket.terminate();
    await server?.close();
    server = null;
  });

  async function start(options: FeedServerOptions = {}) {
    const feed = new StationFeedServer({ port: 0, intervalMs: 0, backfill: 0, logger: quiet, ...options });
    server = feed;
    const port = await feed.start();
    const connect = (path: string) => {
      const socket = new WebSocket(`ws://127.0.0.1:${port}${path}`);
      sockets.push(socket);
      return socket;
    };
    return { feed, connect };
  }

  it('sends the station history on connect', async () => {
    const { feed, connect } = await start();
    feed.station('703').push({ time: 1000, waterLevel: 1.5, rainfall: 0 });

    const frame = JSON.parse(await nextMessage(connect('/ws/station/703/')));

    expect(frame.message.code).toBe('STN703');
    expect(frame.message.values.water_level_graph['0']).toEqual({ time: [1000], value: [1.5] });
    expect(feed.connectionsAccepted).toBe(1);
    expect(feed.openConnections('703')).toBe(1);
  });

  it('double-encodes frames on request', async () => {
    const { feed, connect } = await start({ doubleEncode: true });
    feed.station('703').push({ time: 1000, waterLevel: 1.5, rainfall: 0 });

    const outer = JSON.parse(await nextMessage(connect('/ws/station/703')));

    expect(typeof outer).toBe('string');
    expect(JSON.parse(outer).message.code).toBe('STN703');
  });

  it('closes connections to unknown paths', async () => {
    const { feed, connect } = await start();

    await expect(closeCode(connect('/ws/other/703/'))).resolves.toBe(4404);
    expect(feed.connectionsAccepted).toBe(0);
  });

  it('publishes new samples to connected clients only', async () => {
    const { feed, connect } = await start();
    const station = feed.station('703');
    station.push({ time: 1000, waterLevel: 1.5, rainfall: 0 });

    const socket = connect('/ws/station/703/');
    await nextMessage(socket);
    expect(feed.publish('704')).toBe(0);

    station.push({ time: 1300, waterLevel: 1.6, rainfall: 0 });
    const update = nextMessage(socket);
    expect(feed.publish('703')).toBe(1);
    expect(JSON.parse(await update).message.values.rain_graph.time).toEqual([1000, 1300]);
  });

  it('back-fills a new station up to the clock', async () => {
    const { feed } = await start({ backfill: 4, stepSeconds: 60, clock: () => 10_000 });
    expect(feed.station('703').history.map(s => s.time)).toEqual([9820, 9880, 9940, 10_000]);
  });

  it('drops client links without a close handshake', async () => {
    const { feed, connect } = await start();
    const socket = connect('/ws/station/703/');
    await nextMessage(socket);

    const closed = closeCode(socket);
    feed.dropConnections('703');

    await expect(closed).resolves.toBe(1006);
    expect(feed.openConnections('703')).toBe(0);
  });
});
