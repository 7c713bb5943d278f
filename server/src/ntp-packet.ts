import { KissCode, LeapIndicator, Mode, PACKET_SIZE, ReferenceSource, Stratum, Version } from './ntp-types';
import type { NtpTimestamp } from './ntp-timestamp';

export class MalformedPacketError extends Error {
  constructor(readonly size: number) {
    super(`Malformed NTP packet: ${size} bytes, expected at least ${PACKET_SIZE}`);
    this.name = 'MalformedPacketError';
  }
}

const LI_MASK = 0xC0;
const VN_MASK = 0x38;
const MODE_MASK = 0x07;

function zeroTimestamp(): NtpTimestamp {
  return { seconds: 0, fraction: 0 };
}

function readTimestamp(buf: Buffer, offset: number): NtpTimestamp {
  return { seconds: buf.readUInt32BE(offset), fraction: buf.readUInt32BE(offset + 4) };
}

export function writeTimestamp(buf: Buffer, offset: number, ts: NtpTimestamp): void {
  buf.writeUInt32BE(ts.seconds, offset);
  buf.writeUInt32BE(ts.fraction, offset + 4);
}

function packCode(code: string): number {
  const bytes = Buffer.alloc(4);

  bytes.write(code.substring(0, 4), 'ascii');

  return bytes.readUInt32BE(0);
}

/**
 * The fixed 48-byte SNTP/NTPv4 packet:
 *
 * ```
 *  0  LI(2) VN(3) Mode(3) | Stratum | Poll | Precision
 *  4  Root delay
 *  8  Root dispersion
 * 12  Reference ID
 * 16  Reference timestamp (8)
 * 24  Origin timestamp (8)
 * 32  Receive timestamp (8)
 * 40  Transmit timestamp (8)
 * ```
 */
export class NtpPacket {
  static readonly REF_TM_OFFSET = 16;
  static readonly ORIG_TM_OFFSET = 24;
  static readonly RX_TM_OFFSET = 32;
  static readonly TX_TM_OFFSET = 40;

  liVnMode = 0;
  stratum: number = Stratum.Unspecified;
  poll = 0;
  precision = 0;
  rootDelay = 0;
  rootDispersion = 0;
  referenceId = 0;
  refTm = zeroTimestamp(); // When the system clock was last set or corrected
  origTm = zeroTimestamp(); // Client time when the request departed
  rxTm = zeroTimestamp(); // Server time when the request arrived
  txTm = zeroTimestamp(); // Server time when the response departed

  static decode(buf: Buffer): NtpPacket {
    if (buf.length < PACKET_SIZE)
      throw new MalformedPacketError(buf.length);

    const packet = new NtpPacket();

    packet.liVnMode = buf.readUInt8(0);
    packet.stratum = buf.readUInt8(1);
    packet.poll = buf.readInt8(2);
    packet.precision = buf.readInt8(3);
    packet.rootDelay = buf.readUInt32BE(4);
    packet.rootDispersion = buf.readUInt32BE(8);
    packet.referenceId = buf.readUInt32BE(12);
    packet.refTm = readTimestamp(buf, NtpPacket.REF_TM_OFFSET);
    packet.origTm = readTimestamp(buf, NtpPacket.ORIG_TM_OFFSET);
    packet.rxTm = readTimestamp(buf, NtpPacket.RX_TM_OFFSET);
    packet.txTm = readTimestamp(buf, NtpPacket.TX_TM_OFFSET);

    return packet;
  }

  get leapIndicator(): LeapIndicator { return (this.liVnMode & LI_MASK) >> 6; }
  set leapIndicator(li: LeapIndicator) {
    this.liVnMode = (this.liVnMode & ~LI_MASK & 0xFF) | ((li & 0x03) << 6);
  }

  get version(): Version { return (this.liVnMode & VN_MASK) >> 3; }
  set version(vn: Version) {
    this.liVnMode = (this.liVnMode & ~VN_MASK & 0xFF) | ((vn & 0x07) << 3);
  }

  get mode(): Mode { return this.liVnMode & MODE_MASK; }
  set mode(mode: Mode) {
    this.liVnMode = (this.liVnMode & ~MODE_MASK & 0xFF) | (mode & MODE_MASK);
  }

  /** Reference identifier of a stratum 1 server's clock source. */
  setReferenceSource(code: ReferenceSource | string): void {
    this.referenceId = packCode(code);
  }

  /** Shares the reference ID field with `setReferenceSource()`, for stratum 0 responses. */
  setKissOfDeath(code: KissCode | string): void {
    this.referenceId = packCode(code);
  }

  /** The reference ID as ASCII text, without zero padding. */
  get referenceCode(): string {
    const bytes = Buffer.alloc(4);

    bytes.writeUInt32BE(this.referenceId, 0);

    return bytes.toString('ascii').replace(/\0+$/, '');
  }

  encode(): Buffer {
    const buf = Buffer.alloc(PACKET_SIZE);

    buf.writeUInt8(this.liVnMode, 0);
    buf.writeUInt8(this.stratum, 1);
    buf.writeInt8(this.poll, 2);
    buf.writeInt8(this.precision, 3);
    buf.writeUInt32BE(this.rootDelay, 4);
    buf.writeUInt32BE(this.rootDispersion, 8);
    buf.writeUInt32BE(this.referenceId, 12);
    writeTimestamp(buf, NtpPacket.REF_TM_OFFSET, this.refTm);
    writeTimestamp(buf, NtpPacket.ORIG_TM_OFFSET, this.origTm);
    writeTimestamp(buf, NtpPacket.RX_TM_OFFSET, this.rxTm);
    writeTimestamp(buf, NtpPacket.TX_TM_OFFSET, this.txTm);

    return buf;
  }
}
