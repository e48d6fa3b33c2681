import { WebSocket, WebSocketServer } from 'ws';

import type { TimeSeriesRecord } from '../encoding/timeSeries.js';

export type BroadcastOptions = {
  port?: number;
  host?: string;
  path?: string;
};

export type BroadcastFrame =
  | { type: 'record'; run: string; record: TimeSeriesRecord }
  | { type: 'done'; run: string; steps: number; digest: string };

/**
 * WebSocket fan-out for a running series. Plotting clients connect to
 * `ws://host:port/records` and receive one JSON frame per record.
 */
export class RecordBroadcaster {
  private constructor(
    private readonly server: WebSocketServer,
    readonly port: number,
    readonly url: string,
  ) {}

  static start(options: BroadcastOptions = {}): Promise<RecordBroadcaster> {
    const host = options.host ?? '127.0.0.1';
    const path = options.path ?? '/records';
    const server = new WebSocketServer({ port: options.port ?? 8090, host, path });

    server.on('connection', (socket) => {
      console.log('[broadcast] client connected');
      socket.on('close', () => {
        console.log('[broadcast] client disconnected');
      });
    });

    return new Promise((resolve, reject) => {
      const onError = (error: Error) => {
        server.close();
        reject(error);
      };
      server.once('error', onError);
      server.once('listening', () => {
        server.off('error', onError);
        server.on('error', (error) => {
          console.error('[broadcast] server error', error);
        });
        const address = server.address();
        const port = typeof address === 'object' && address ? address.port : options.port ?? 8090;
        const url = `ws://${host}:${port}${path}`;
        console.log(`[broadcast] listening on ${url}`);
        resolve(new RecordBroadcaster(server, port, url));
      });
    });
  }

  get clientCount(): number {
    return this.server.clients.size;
  }

  send(frame: BroadcastFrame): void {
    const payload = JSON.stringify(frame);
    for (const client of this.server.clients) {
      if (client.readyState === WebSocket.OPEN) {
        client.send(payload);
      }
    }
  }

  publish(run: string, record: TimeSeriesRecord): void {
    this.send({ type: 'record', run, record });
  }

  close(): Promise<void> {
    for (const client of this.server.clients) {
      client.close(1000, 'run finished');
    }
    return new Promise((resolve, reject) => {
      this.server.close((error) => (error ? reject(error) : resolve()));
    });
  }
}

export const startRecordBroadcaster = (options: BroadcastOptions = {}): Promise<RecordBroadcaster> =>
  RecordBroadcaster.start(options);
