import { createSocket, RemoteInfo, Socket } from 'dgram';
import { isIPv6 } from 'net';
import { processMillis } from '@tubular/util';
import { NtpPacket } from './ntp-packet';
import { fromNtpTimestamp, NtpTimestamp, TimeSource, toNtpTimestamp } from './ntp-timestamp';
import { LeapIndicator, Mode, PACKET_SIZE, PollInterval, Stratum, Version } from './ntp-types';
import { splitIpAndPort } from './util';

const MAX_RESPONSE_WAIT = 3000;
const DEFAULT_MAX_RETRIES = 2;

export const DEFAULT_NTP_SERVER = 'pool.ntp.org';

export interface NtpResult {
  address: string; // from socket
  packet: NtpPacket;
  refId: string;
  origTm: number; // Client send time, epoch millis
  rxTm: number; // Server receive time
  txTm: number; // Server transmit time
  destTm: number; // Client receive time
  offset: number; // Estimated server clock minus local clock
  roundTripDelay: number;
  roundTripTime: number; // Elapsed process time, for comparison with roundTripDelay
}

export interface NtpClientOptions {
  maxRetries: number;
  now: TimeSource;
  responseWait: number;
}

interface PendingQuery {
  pollProcTime: number;
  pollTm: NtpTimestamp;
  resolve: (result: NtpResult) => void;
  reject: (err: Error) => void;
  retries: number;
}

function sameTimestamp(a: NtpTimestamp, b: NtpTimestamp): boolean {
  return a.seconds === b.seconds && a.fraction === b.fraction;
}

/**
 * Minimal SNTP client: one outstanding client-mode request at a time, retried on timeout.
 */
export class NtpClient {
  private static allOpenClients = new Set<NtpClient>();

  static closeAll(): void {
    NtpClient.allOpenClients.forEach(client => client.close());
  }

  private currentPromise: Promise<NtpResult> | undefined;
  private options: NtpClientOptions;
  private pending: PendingQuery | undefined;
  private port: number;
  private responseTimer: ReturnType<typeof setTimeout> | undefined;
  private server: string;
  private socket: Socket | undefined;

  constructor(server = DEFAULT_NTP_SERVER, port = 123, options: Partial<NtpClientOptions> = {}) {
    const [host, hostPort] = splitIpAndPort(server, port);

    this.server = host ?? DEFAULT_NTP_SERVER;
    this.port = hostPort ?? port;
    this.options = {
      maxRetries: options.maxRetries ?? DEFAULT_MAX_RETRIES,
      now: options.now ?? Date.now,
      responseWait: options.responseWait ?? MAX_RESPONSE_WAIT
    };

    const socket = createSocket(isIPv6(this.server) ? 'udp6' : 'udp4');

    this.socket = socket;
    NtpClient.allOpenClients.add(this);
    socket.on('error', err => this.fail(err));
    socket.on('message', (msg, remoteInfo) => this.handleMessage(msg, remoteInfo));
  }

  query(): Promise<NtpResult> {
    if (!this.currentPromise) {
      this.currentPromise = new Promise<NtpResult>((resolve, reject) => {
        this.poll({ pollProcTime: 0, pollTm: { seconds: 0, fraction: 0 }, resolve, reject, retries: 0 });
      });
    }

    return this.currentPromise;
  }

  close(): void {
    if (this.socket) {
      this.socket.close();
      this.socket = undefined;
      NtpClient.allOpenClients.delete(this);
    }

    this.fail(new Error('NTP client closed'));
  }

  private poll(pending: PendingQuery): void {
    if (!this.socket) {
      pending.reject(new Error('NTP client closed'));
      return;
    }

    const request = new NtpPacket();

    request.mode = Mode.Client;
    request.version = Version.V4;
    request.poll = PollInterval.Minimum;
    request.txTm = toNtpTimestamp(this.options.now());
    pending.pollTm = request.txTm;
    pending.pollProcTime = processMillis();
    this.pending = pending;

    this.socket.send(request.encode(), this.port, this.server, err => {
      if (err)
        this.fail(err);
    });

    this.responseTimer = setTimeout(() => {
      this.responseTimer = undefined;

      if (pending.retries < this.options.maxRetries)
        this.poll({ ...pending, retries: pending.retries + 1 });
      else
        this.fail(new Error('NTP failed: no response from ' + this.server));
    }, this.options.responseWait);
  }

  private fail(err: Error): void {
    const pending = this.pending;

    this.clearResponseTimer();

    if (pending)
      pending.reject(err);
  }

  private clearResponseTimer(): void {
    this.currentPromise = undefined;
    this.pending = undefined;

    if (this.responseTimer) {
      clearTimeout(this.responseTimer);
      this.responseTimer = undefined;
    }
  }

  private handleMessage(msg: Buffer, remoteInfo: RemoteInfo): void {
    const destTm = this.options.now();
    const pending = this.pending;

    if (!pending || msg.length < PACKET_SIZE)
      return;

    const response = NtpPacket.decode(msg);

    // Not an answer to the latest request: stale, or spoofed.
    if (response.mode !== Mode.Server || !sameTimestamp(response.origTm, pending.pollTm))
      return;

    this.clearResponseTimer();

    let refId: string;

    if (response.stratum < Stratum.Secondary)
      refId = response.referenceCode.trim(); // As short ID string
    else if (remoteInfo.family === 'IPv4')
      refId = msg.subarray(12, 16).join('.'); // As IPv4 address
    else
      refId = response.referenceId.toString(16).padStart(8, '0'); // As hash

    if (response.stratum === Stratum.Unspecified) {
      pending.reject(new Error('NTP "kiss of death": ' + refId));
      return;
    }
    else if (response.leapIndicator === LeapIndicator.AlarmCondition) {
      pending.reject(new Error('NTP unsynchronized'));
      return;
    }

    const origTm = fromNtpTimestamp(response.origTm);
    const rxTm = fromNtpTimestamp(response.rxTm);
    const txTm = fromNtpTimestamp(response.txTm);

    pending.resolve({
      address: remoteInfo.address,
      packet: response,
      refId,
      origTm,
      rxTm,
      txTm,
      destTm,
      offset: ((rxTm - origTm) + (txTm - destTm)) / 2,
      roundTripDelay: (destTm - origTm) - (txTm - rxTm),
      roundTripTime: processMillis() - pending.pollProcTime
    });
  }
}
