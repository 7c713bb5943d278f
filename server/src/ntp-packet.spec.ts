import { expect } from 'chai';
import { describe, it } from 'mocha';
import { MalformedPacketError, NtpPacket } from './ntp-packet';
import { KissCode, LeapIndicator, Mode, PACKET_SIZE, ReferenceSource, Stratum, Version } from './ntp-types';

function samplePacket(): NtpPacket {
  const packet = new NtpPacket();

  packet.leapIndicator = LeapIndicator.AddSecond;
  packet.version = Version.V4;
  packet.mode = Mode.Server;
  packet.stratum = Stratum.Secondary;
  packet.poll = -6;
  packet.precision = -20;
  packet.rootDelay = 0x00012345;
  packet.rootDispersion = 0xFEDCBA98;
  packet.referenceId = 0xC0A80001;
  packet.refTm = { seconds: 3908988800, fraction: 0x80000ABC };
  packet.origTm = { seconds: 1, fraction: 2 };
  packet.rxTm = { seconds: 0xFFFFFFFF, fraction: 0xFFFFFFFF };
  packet.txTm = { seconds: 3908988801, fraction: 0x00000123 };

  return packet;
}

describe('ntp-packet', () => {
  it('should encode to exactly 48 bytes in network byte order', () => {
    const buf = samplePacket().encode();

    expect(buf.length).to.equal(PACKET_SIZE);
    expect(buf[0]).to.equal(0x64); // LI 1, VN 4, mode 4
    expect(buf[1]).to.equal(2);
    expect(buf[2]).to.equal(0xFA);
    expect(buf[3]).to.equal(0xEC);
    expect(buf.subarray(4, 8).toString('hex')).to.equal('00012345');
    expect(buf.subarray(8, 12).toString('hex')).to.equal('fedcba98');
    expect(buf.subarray(12, 16).toString('hex')).to.equal('c0a80001');
    expect(buf.subarray(16, 24).toString('hex')).to.equal('e8fe6f8080000abc');
    expect(buf.subarray(40, 48).toString('hex')).to.equal('e8fe6f8100000123');
  });

  it('should decode what it encodes', () => {
    const packet = samplePacket();
    const decoded = NtpPacket.decode(packet.encode());

    expect(decoded).to.eql(packet);
    expect(decoded.leapIndicator).to.equal(LeapIndicator.AddSecond);
    expect(decoded.version).to.equal(Version.V4);
    expect(decoded.mode).to.equal(Mode.Server);
    expect(decoded.poll).to.equal(-6);
  });

  it('should reject input shorter than a packet', () => {
    expect(() => NtpPacket.decode(Buffer.alloc(47))).to.throw(MalformedPacketError, '47 bytes');
    expect(() => NtpPacket.decode(Buffer.alloc(0))).to.throw(MalformedPacketError);
  });

  it('should ignore bytes past the end of the packet', () => {
    const buf = Buffer.concat([samplePacket().encode(), Buffer.from([1, 2, 3, 4])]);

    expect(NtpPacket.decode(buf)).to.eql(samplePacket());
  });

  it('should pack header fields independently of one another', () => {
    const packet = new NtpPacket();

    for (let li = 0; li < 4; ++li) {
      for (let vn = 0; vn < 8; ++vn) {
        for (let mode = 0; mode < 8; ++mode) {
          for (const prior of [0x00, 0xFF]) {
            packet.liVnMode = prior;
            packet.leapIndicator = li;
            packet.version = vn;
            packet.mode = mode;

            expect(packet.leapIndicator).to.equal(li);
            expect(packet.version).to.equal(vn);
            expect(packet.mode).to.equal(mode);
            expect(packet.liVnMode).to.equal((li << 6) | (vn << 3) | mode);
          }
        }
      }
    }
  });

  it('should leave the other header fields alone when setting one', () => {
    const packet = new NtpPacket();

    packet.liVnMode = 0xFF;
    packet.version = Version.V4;
    expect(packet.liVnMode).to.equal(0xE7);
    packet.mode = Mode.Client;
    expect(packet.liVnMode).to.equal(0xE3);
    packet.leapIndicator = LeapIndicator.NoAdjustment;
    expect(packet.liVnMode).to.equal(0x23);
  });

  it('should mask an out-of-range version to 3 bits', () => {
    const packet = new NtpPacket();
    const outOfRange: number = 12;

    packet.version = outOfRange;
    expect(packet.version).to.equal(4);
    expect(packet.mode).to.equal(0);
    expect(packet.leapIndicator).to.equal(0);
  });

  it('should pack reference and kiss codes as zero-padded ASCII', () => {
    const packet = new NtpPacket();
    const rawId = (): string => packet.encode().subarray(12, 16).toString('hex');

    packet.setReferenceSource(ReferenceSource.Local);
    expect(rawId()).to.equal('4c4f434c');
    expect(packet.referenceCode).to.equal('LOCL');

    packet.setReferenceSource(ReferenceSource.GPS);
    expect(rawId()).to.equal('47505300');
    expect(packet.referenceCode).to.equal('GPS');

    packet.setKissOfDeath(KissCode.RateExceeded);
    expect(rawId()).to.equal('52415445');
    expect(packet.referenceCode).to.equal('RATE');

    packet.setKissOfDeath('PTB');
    expect(rawId()).to.equal('50544200');
  });
});
