/**
 * Shared builders and in-process fakes for the test suites
 */

import { createServer } from 'http';
import { createSnapshot } from '../src/polling/snapshot';
import { Fill, MonitorEvent, Notifier, Position, Snapshot, SnapshotFetcher } from '../src/types';
import { DeliveryError } from '../src/utils/errors';
import { createLogger } from '../src/utils/logger';

export const ADDRESS = '0x1234567890abcdef1234567890abcdef12345678';

export const silentLogger = createLogger({ silent: true });

export function pos(asset: string, size: number, overrides: Partial<Position> = {}): Position {
  return {
    asset,
    side: 'LONG',
    size,
    entryPrice: 100,
    leverage: 5,
    positionValue: size * 100,
    unrealizedPnl: 0,
    ...overrides,
  };
}

export function fill(id: string, timestampMillis: number, overrides: Partial<Fill> = {}): Fill {
  return {
    id,
    asset: 'BTC',
    side: 'BUY',
    price: 65000,
    size: 0.1,
    fee: 1.5,
    timestampMillis,
    ...overrides,
  };
}

export function snap(positions: Position[], fills: Fill[] = []): Snapshot {
  return createSnapshot(positions, fills, new Date(0));
}

/**
 * Fetcher whose answers are scripted per call
 */
export class FakeFetcher implements SnapshotFetcher {
  positions: Position[] = [];
  fills: Fill[] = [];
  failWith: Error | null = null;
  positionCalls = 0;
  fillCalls: Array<{ address: string; limit: number }> = [];
  closed = false;
  closeCalls: boolean[] = [];

  async fetchPositions(_address: string): Promise<Position[]> {
    this.positionCalls++;
    if (this.failWith) throw this.failWith;
    return [...this.positions];
  }

  async fetchFills(address: string, limit: number): Promise<Fill[]> {
    this.fillCalls.push({ address, limit });
    if (this.failWith) throw this.failWith;
    return [...this.fills];
  }

  async close(force = false): Promise<void> {
    this.closed = true;
    this.closeCalls.push(force);
  }
}

/**
 * Notifier that records every event it was asked to deliver
 */
export class RecordingNotifier implements Notifier {
  events: MonitorEvent[] = [];
  failKinds: Set<MonitorEvent['kind']> = new Set();
  closed = false;
  closeCalls: boolean[] = [];

  async notify(event: MonitorEvent): Promise<void> {
    this.events.push(event);
    if (this.failKinds.has(event.kind)) {
      throw new DeliveryError(`Telegram send failed: 502 Bad Gateway`);
    }
  }

  async close(force = false): Promise<void> {
    this.closed = true;
    this.closeCalls.push(force);
  }

  kinds(): Array<MonitorEvent['kind']> {
    return this.events.map(e => e.kind);
  }
}

export interface SilentServer {
  url: string;
  requests: string[];
  close(): Promise<void>;
}

/**
 * Local HTTP server that accepts requests and never answers them
 */
export async function startSilentServer(onRequest: () => void = () => undefined): Promise<SilentServer> {
  const requests: string[] = [];
  const server = createServer((req) => {
    requests.push(`${req.method} ${req.url}`);
    onRequest();
  });

  await new Promise<void>(resolve => server.listen(0, '127.0.0.1', () => resolve()));
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Server is not listening on a TCP port');
  }

  return {
    url: `http://127.0.0.1:${address.port}`,
    requests,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close(error => (error ? reject(error) : resolve()));
      }),
  };
}
