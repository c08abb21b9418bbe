import { InMemoryTokenStore } from '../services/token-store.service';
import { TokenExpiredError, TokenNotFoundError } from '../errors/relay.errors';

const HOUR = 60 * 60 * 1000;
const T0 = Date.UTC(2026, 0, 1, 12, 0, 0);

describe('InMemoryTokenStore', () => {
  let clock: number;
  let store: InMemoryTokenStore;

  beforeEach(() => {
    clock = T0;
    store = new InMemoryTokenStore({ now: () => clock });
  });

  afterEach(() => {
    store.stop();
  });

  it('issues a record that expires one hour after issuance', () => {
    const record = store.issue('blob');
    expect(record.issuedAt).toBe(T0);
    expect(record.expiresAt).toBe(T0 + HOUR);
    expect(record.token).toMatch(/^[A-Za-z0-9_-]{43}$/);
    expect(store.lookup(record.token)).toBe('blob');
  });

  it('issues distinct tokens', () => {
    const tokens = new Set(Array.from({ length: 100 }, () => store.issue('blob').token));
    expect(tokens.size).toBe(100);
  });

  it('honours a token one second before expiry', () => {
    const { token, expiresAt } = store.issue('blob');
    clock = expiresAt - 1000;
    expect(store.lookup(token)).toBe('blob');
  });

  it('rejects a token one second after expiry and forgets it', () => {
    const { token, expiresAt } = store.issue('blob');
    clock = expiresAt + 1000;
    expect(() => store.lookup(token)).toThrow(TokenExpiredError);
    expect(store.size()).toBe(0);
    expect(() => store.lookup(token)).toThrow(TokenNotFoundError);
  });

  it('re-evaluates expiry on every lookup', () => {
    const { token, expiresAt } = store.issue('blob');
    expect(store.lookup(token)).toBe('blob');
    clock = expiresAt + 1;
    expect(() => store.lookup(token)).toThrow(TokenExpiredError);
  });

  it('rejects unknown tokens', () => {
    expect(() => store.lookup('nope')).toThrow(TokenNotFoundError);
  });

  it('revokes tokens', () => {
    const { token } = store.issue('blob');
    expect(store.revoke(token)).toBe(true);
    expect(store.revoke(token)).toBe(false);
    expect(() => store.lookup(token)).toThrow(TokenNotFoundError);
  });

  it('does not report an expired token as revoked', () => {
    const { token, expiresAt } = store.issue('blob');
    clock = expiresAt + 1000;
    expect(store.revoke(token)).toBe(false);
    expect(store.size()).toBe(0);
  });

  it('sweeps only expired records', () => {
    store.issue('old');
    clock = T0 + 30 * 60 * 1000;
    const fresh = store.issue('fresh');
    clock = T0 + HOUR + 1;
    expect(store.sweep()).toBe(1);
    expect(store.size()).toBe(1);
    expect(store.lookup(fresh.token)).toBe('fresh');
  });

  it('honours a custom ttl', () => {
    const shortLived = new InMemoryTokenStore({ ttlHours: 2, now: () => clock });
    expect(shortLived.issue('blob').expiresAt).toBe(T0 + 2 * HOUR);
  });

  describe('lifecycle', () => {
    beforeEach(() => {
      jest.useFakeTimers();
    });

    afterEach(() => {
      jest.useRealTimers();
    });

    it('sweeps periodically once started and clears everything on stop', () => {
      const timed = new InMemoryTokenStore({ sweepIntervalMs: 1000, now: () => clock });
      timed.issue('a');
      timed.start();
      clock = T0 + HOUR + 1;
      jest.advanceTimersByTime(1000);
      expect(timed.size()).toBe(0);

      timed.issue('b');
      timed.stop();
      expect(timed.size()).toBe(0);
      expect(jest.getTimerCount()).toBe(0);
    });
  });
});
