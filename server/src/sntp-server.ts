import createDebug from 'debug';
import { createSocket, RemoteInfo, Socket } from 'dgram';
import { AddressInfo, isIPv6 } from 'net';
import { PACKET_SIZE, Precision, ReferenceSource, Stratum } from './ntp-types';
import type { TimeSource } from './ntp-timestamp';
import { RateLimiter, RateLimiterOptions } from './rate-limiter';
import { RemoteEndpoint, ReplySender, RequestHandler } from './request-handler';
import { filterError, timeStamp, unref } from './util';

const debug = createDebug('sntp:server');

export const DEFAULT_NTP_PORT = 123;

export type ServerState = 'idle' | 'running' | 'stopped';

export interface SntpServerOptions {
  now: TimeSource;
  precision: Precision;
  rateLimit: Partial<Omit<RateLimiterOptions, 'now'>>;
  referenceSource: ReferenceSource;
  referenceTime: TimeSource;
  stratum: Stratum;
  sweepInterval: number; // Milliseconds between idle-client sweeps, 0 for none
}

const DEFAULT_SWEEP_INTERVAL = 60_000;

interface Waiter {
  resolve: () => void;
  reject: (err: Error) => void;
}

export class SntpServer implements ReplySender {
  private static allOpenServers = new Set<SntpServer>();

  static async closeAll(): Promise<void> {
    await Promise.all(Array.from(SntpServer.allOpenServers).map(server => server.stop()));
  }

  private handler: RequestHandler;
  private limiter: RateLimiter;
  private now: TimeSource;
  protected socket: Socket | undefined;
  private _state: ServerState = 'idle';
  private sweepInterval: number;
  private sweepTimer: ReturnType<typeof setInterval> | undefined;
  private waiters: Waiter[] = [];

  constructor(options: Partial<SntpServerOptions> = {}) {
    this.now = options.now ?? Date.now;
    this.sweepInterval = options.sweepInterval ?? DEFAULT_SWEEP_INTERVAL;
    this.limiter = new RateLimiter({ ...options.rateLimit, now: this.now });
    this.handler = new RequestHandler(this, {
      now: this.now,
      precision: options.precision,
      referenceTime: options.referenceTime,
      referenceSource: options.referenceSource,
      stratum: options.stratum
    });
  }

  get state(): ServerState { return this._state; }

  get trackedClients(): number { return this.limiter.size; }

  start(host = '0.0.0.0', port = DEFAULT_NTP_PORT): Promise<AddressInfo> {
    if (this._state !== 'idle')
      return Promise.reject(new Error(`Cannot start server in ${this._state} state`));

    const socket = createSocket(isIPv6(host) ? 'udp6' : 'udp4');

    return new Promise<AddressInfo>((resolve, reject) => {
      const onBindError = (err: Error): void => {
        this._state = 'stopped';
        socket.close();
        reject(err);
      };

      socket.once('error', onBindError);
      socket.bind(port, host, () => {
        socket.off('error', onBindError);
        socket.on('error', err => this.handleError(err));
        socket.on('message', (msg, remoteInfo) => this.handleMessage(msg, remoteInfo));
        this.socket = socket;
        this._state = 'running';
        SntpServer.allOpenServers.add(this);

        if (this.sweepInterval > 0)
          this.sweepTimer = unref(setInterval(() => this.sweep(), this.sweepInterval));

        resolve(socket.address());
      });
    });
  }

  /**
   * Resolves once the server has stopped, or rejects with the transport error that stopped it.
   */
  waitForStop(): Promise<void> {
    if (this._state === 'stopped')
      return Promise.resolve();

    return new Promise<void>((resolve, reject) => this.waiters.push({ resolve, reject }));
  }

  /**
   * Start serving and keep going until `signal` aborts (resolving) or the socket fails (rejecting).
   */
  async serve(host: string, port: number, signal?: AbortSignal): Promise<void> {
    const onAbort = (): void => {
      this.stop().catch(err => console.error('%s -- Error stopping server: %s', timeStamp(), filterError(err)));
    };

    await this.start(host, port);

    if (signal?.aborted)
      onAbort();
    else
      signal?.addEventListener('abort', onAbort, { once: true });

    try {
      await this.waitForStop();
    }
    finally {
      signal?.removeEventListener('abort', onAbort);
    }
  }

  /** Close the socket. Requests already being handled are left to finish (or fail) on their own. */
  stop(): Promise<void> {
    return this.shutDown();
  }

  private shutDown(err?: Error): Promise<void> {
    const socket = this.socket;
    const waiters = this.waiters;

    this._state = 'stopped';
    this.socket = undefined;
    this.waiters = [];
    SntpServer.allOpenServers.delete(this);

    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = undefined;
    }

    this.limiter.clear();

    const settle = (): void => waiters.forEach(waiter => err ? waiter.reject(err) : waiter.resolve());

    if (!socket) {
      settle();
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      try {
        socket.close(() => {
          settle();
          resolve();
        });
      }
      catch (closeErr) {
        settle();
        reject(closeErr);
      }
    });
  }

  send(msg: Buffer, remote: RemoteEndpoint): Promise<void> {
    const socket = this.socket;

    if (!socket)
      return Promise.reject(new Error('Server socket is closed'));

    return new Promise<void>((resolve, reject) => {
      socket.send(msg, remote.port, remote.address, err => err ? reject(err) : resolve());
    });
  }

  private handleMessage(msg: Buffer, remoteInfo: RemoteInfo): void {
    const receivedAt = this.now();

    if (this._state !== 'running')
      return;

    if (msg.length < PACKET_SIZE) {
      debug('Received undersized packet (%d bytes) from %s', msg.length, remoteInfo.address);
      return;
    }

    if (!this.limiter.admit(remoteInfo.address)) {
      // TODO: Answer with a "RATE" kiss-of-death packet instead of dropping the request.
      debug('Rate limited client %s', remoteInfo.address);
      return;
    }

    const remote = { address: remoteInfo.address, port: remoteInfo.port };

    this.handler.handle(msg.subarray(0, PACKET_SIZE), remote, receivedAt).catch(err =>
      console.error('%s -- Request handler failed for %s: %s', timeStamp(), remote.address, filterError(err)));
  }

  private handleError(err: Error): void {
    console.error('%s -- UDP socket error: %s', timeStamp(), filterError(err));
    this.shutDown(err).catch(closeErr =>
      console.error('%s -- Error closing socket: %s', timeStamp(), filterError(closeErr)));
  }

  private sweep(): void {
    const evicted = this.limiter.sweep();

    if (evicted)
      debug('Forgot %d idle clients', evicted);
  }
}
