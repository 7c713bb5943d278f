import createDebug from 'debug';
import { MalformedPacketError, NtpPacket, writeTimestamp } from './ntp-packet';
import { TimeSource, toNtpTimestamp } from './ntp-timestamp';
import { Mode, Precision, ReferenceSource, Stratum, Version } from './ntp-types';
import { filterError, timeStamp } from './util';

const debug = createDebug('sntp:handler');

export interface RemoteEndpoint {
  address: string;
  port: number;
}

export interface ReplySender {
  send(msg: Buffer, remote: RemoteEndpoint): Promise<void>;
}

export interface RequestHandlerOptions {
  now: TimeSource;
  /** When the local clock was last set or corrected. There's no clock discipline here, so "now" by default. */
  referenceTime: TimeSource;
  referenceSource: ReferenceSource;
  /**
   * Advertised clock resolution. `Date.now()` only ticks in milliseconds, so with the default time
   * source the fraction bits below 2^-10 seconds carry no real information; a deployment with a
   * finer `now` may keep the microsecond claim, others can lower it to `Precision.OneMillisecond`.
   */
  precision: Precision;
  stratum: Stratum;
}

export class RequestHandler {
  private options: RequestHandlerOptions;

  constructor(private sender: ReplySender, options: Partial<RequestHandlerOptions> = {}) {
    const now = options.now ?? Date.now;

    this.options = {
      now,
      referenceTime: options.referenceTime ?? now,
      referenceSource: options.referenceSource ?? ReferenceSource.Local,
      precision: options.precision ?? Precision.OneMicrosecond,
      stratum: options.stratum ?? Stratum.Primary
    };
  }

  /**
   * Build the encoded response to a request, or return `undefined` if the request isn't an
   * NTPv4 client request. The transmit timestamp is left zeroed for `handle()` to fill in.
   */
  buildResponse(msg: Buffer, receivedAt: number): Buffer | undefined {
    const request = NtpPacket.decode(msg);

    if (request.mode !== Mode.Client || request.version !== Version.V4) {
      debug('Ignoring request with mode %d, version %d', request.mode, request.version);
      return undefined;
    }

    const response = new NtpPacket();

    response.stratum = this.options.stratum;
    response.poll = request.poll;
    response.precision = this.options.precision;
    response.refTm = toNtpTimestamp(this.options.referenceTime());
    response.origTm = request.txTm;
    response.rxTm = toNtpTimestamp(receivedAt);
    response.mode = Mode.Server;
    response.version = Version.V4;
    response.setReferenceSource(this.options.referenceSource);

    return response.encode();
  }

  async handle(msg: Buffer, remote: RemoteEndpoint, receivedAt: number): Promise<void> {
    let response: Buffer | undefined;

    try {
      response = this.buildResponse(msg, receivedAt);
    }
    catch (err) {
      if (err instanceof MalformedPacketError)
        console.error('%s -- Error decoding request from %s: %s', timeStamp(), remote.address, err.message);
      else
        console.error('%s -- Error encoding response to %s: %s', timeStamp(), remote.address, filterError(err));

      return;
    }

    if (!response)
      return;

    // Stamp the transmit time at the last possible moment.
    writeTimestamp(response, NtpPacket.TX_TM_OFFSET, toNtpTimestamp(this.options.now()));

    try {
      await this.sender.send(response, remote);
    }
    catch (err) {
      console.error('%s -- Error sending response to %s:%d: %s', timeStamp(), remote.address, remote.port, filterError(err));
    }
  }
}
