import { expect } from 'chai';
import { beforeEach, describe, it } from 'mocha';
import { RateLimiter } from './rate-limiter';

describe('rate-limiter', () => {
  let time: number;
  const now = (): number => time;

  beforeEach(() => {
    time = 1_700_000_000_000;
  });

  it('should admit a new address once, then again after the interval', () => {
    const limiter = new RateLimiter({ now });

    expect(limiter.admit('192.0.2.1')).to.equal(true);
    expect(limiter.admit('192.0.2.1')).to.equal(false);
    time += 5_000;
    expect(limiter.admit('192.0.2.1')).to.equal(false);
    time += 5_000;
    expect(limiter.admit('192.0.2.1')).to.equal(true);
    expect(limiter.admit('192.0.2.1')).to.equal(false);
  });

  it('should not let denied requests drain the bucket', () => {
    const limiter = new RateLimiter({ now, minInterval: 1000 });

    expect(limiter.admit('192.0.2.1')).to.equal(true);

    for (let i = 0; i < 3; ++i) {
      time += 250;
      expect(limiter.admit('192.0.2.1')).to.equal(false);
    }

    time += 250;
    expect(limiter.admit('192.0.2.1')).to.equal(true);
  });

  it('should allow bursts up to the bucket capacity', () => {
    const limiter = new RateLimiter({ now, burst: 3, minInterval: 1000 });

    expect([1, 2, 3, 4].map(() => limiter.admit('192.0.2.1'))).to.eql([true, true, true, false]);
    time += 10_000;
    expect([1, 2, 3, 4].map(() => limiter.admit('192.0.2.1'))).to.eql([true, true, true, false]);
  });

  it('should track each address independently', () => {
    const limiter = new RateLimiter({ now });

    expect(limiter.admit('192.0.2.1')).to.equal(true);
    expect(limiter.admit('192.0.2.2')).to.equal(true);
    expect(limiter.admit('2001:db8::1')).to.equal(true);
    expect(limiter.admit('192.0.2.1')).to.equal(false);
    expect(limiter.admit('2001:db8::1')).to.equal(false);
    expect(limiter.size).to.equal(3);
  });

  it('should evict the least recently used address past capacity', () => {
    const limiter = new RateLimiter({ now, maxClients: 3 });

    limiter.admit('192.0.2.1');
    time += 1;
    limiter.admit('192.0.2.2');
    time += 1;
    limiter.admit('192.0.2.3');
    time += 1;
    expect(limiter.admit('192.0.2.1')).to.equal(false); // Now most recently used
    time += 1;
    expect(limiter.admit('192.0.2.4')).to.equal(true);

    expect(limiter.size).to.equal(3);
    expect(limiter.has('192.0.2.2')).to.equal(false);
    expect(limiter.has('192.0.2.1')).to.equal(true);
    expect(limiter.has('192.0.2.3')).to.equal(true);
    expect(limiter.has('192.0.2.4')).to.equal(true);

    // Forgotten, so treated as new
    expect(limiter.admit('192.0.2.2')).to.equal(true);
    expect(limiter.has('192.0.2.3')).to.equal(false);
  });

  it('should forget addresses idle for longer than the idle timeout', () => {
    const limiter = new RateLimiter({ now, idleTimeout: 60_000, minInterval: 1000 });

    limiter.admit('192.0.2.1');
    time += 30_000;
    limiter.admit('192.0.2.2');
    time += 30_000;
    expect(limiter.sweep()).to.equal(0);
    time += 1;
    expect(limiter.sweep()).to.equal(1);
    expect(limiter.has('192.0.2.1')).to.equal(false);
    expect(limiter.has('192.0.2.2')).to.equal(true);
    time += 30_000;
    expect(limiter.admit('192.0.2.3')).to.equal(true);
    expect(limiter.size).to.equal(1);
  });

  it('should count a denied request as activity for idle eviction', () => {
    const limiter = new RateLimiter({ now, idleTimeout: 60_000, minInterval: 120_000 });

    limiter.admit('192.0.2.1');
    time += 50_000;
    expect(limiter.admit('192.0.2.1')).to.equal(false);
    time += 50_000;
    expect(limiter.sweep()).to.equal(0);
    expect(limiter.admit('192.0.2.1')).to.equal(false);
  });

  it('should clear all state', () => {
    const limiter = new RateLimiter({ now });

    limiter.admit('192.0.2.1');
    limiter.clear();
    expect(limiter.size).to.equal(0);
    expect(limiter.admit('192.0.2.1')).to.equal(true);
  });

  it('should reject unusable settings', () => {
    expect(() => new RateLimiter({ burst: 0 })).to.throw('burst');
    expect(() => new RateLimiter({ minInterval: 0 })).to.throw('minInterval');
    expect(() => new RateLimiter({ maxClients: 0 })).to.throw('maxClients');
  });
});
