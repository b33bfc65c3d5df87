import { Backend } from '../backend';
import { BackendPool, createBackendPool } from '../balancer/backendPool';

const A = 'http://localhost:5001';
const B = 'http://localhost:5002';
const C = 'http://localhost:5003';

const pick = (pool: BackendPool, times: number): Array<string | null> =>
  Array.from({ length: times }, () => pool.selectNext()?.address ?? null);

describe('Backend', () => {
  it('starts healthy', () => {
    const backend = new Backend(A);
    expect(backend.isHealthy()).toBe(true);
    expect(backend.url.port).toBe('5001');
  });

  it('reports whether setHealthy changed the flag', () => {
    const backend = new Backend(A);
    expect(backend.setHealthy(true)).toBe(false);
    expect(backend.setHealthy(false)).toBe(true);
    expect(backend.setHealthy(false)).toBe(false);
    expect(backend.getStatus()).toEqual({ address: A, healthy: false });
  });

  it('rejects an unparsable address', () => {
    expect(() => new Backend('not a url')).toThrow();
  });
});

describe('BackendPool', () => {
  describe('selectNext', () => {
    it('returns every healthy member once per cycle, in order', () => {
      const pool = createBackendPool([A, B, C]);

      expect(pick(pool, 3)).toEqual([A, B, C]);
      expect(pool.selectNext()?.address).toBe(A);
    });

    it('never returns an unhealthy member and keeps the others in order', () => {
      const pool = createBackendPool([A, B, C]);
      pool.getBackends()[1].setHealthy(false);

      expect(pick(pool, 6)).toEqual([A, C, A, C, A, C]);
    });

    it('returns null while every member is unhealthy', () => {
      const pool = createBackendPool([A, B]);
      pool.getBackends().forEach(backend => backend.setHealthy(false));

      expect(pick(pool, 4)).toEqual([null, null, null, null]);

      pool.getBackends()[1].setHealthy(true);
      expect(pick(pool, 2)).toEqual([B, B]);
    });

    it('advances the cursor past skipped members', () => {
      const pool = createBackendPool([A, B, C]);
      const [a] = pool.getBackends();

      a.setHealthy(false);
      expect(pool.selectNext()?.address).toBe(B);

      a.setHealthy(true);
      // cursor now points at C
      expect(pick(pool, 3)).toEqual([C, A, B]);
    });

    it('sees a health flip on the very next selection', () => {
      const pool = createBackendPool([A, B]);
      expect(pool.selectNext()?.address).toBe(A);

      pool.getBackends()[1].setHealthy(false);
      expect(pool.selectNext()?.address).toBe(A);

      pool.getBackends()[1].setHealthy(true);
      expect(pool.selectNext()?.address).toBe(B);
    });

    it('returns null for an empty pool', () => {
      const pool = new BackendPool([]);
      expect(pool.size).toBe(0);
      expect(pool.selectNext()).toBeNull();
    });

    it('keeps the serialised order under concurrent callers', async () => {
      const pool = createBackendPool([A, B, C]);

      const picks = await Promise.all(
        Array.from({ length: 300 }, async () => {
          await Promise.resolve();
          return pool.selectNext()?.address;
        })
      );

      picks.forEach((address, index) => {
        expect(address).toBe([A, B, C][index % 3]);
      });
    });

    it('never returns a member that is unhealthy at selection time while flags flip concurrently', async () => {
      const pool = createBackendPool([A, B, C]);
      const [a, b, c] = pool.getBackends();
      const violations: string[] = [];

      const flipper = async () => {
        for (let i = 0; i < 200; i++) {
          b.setHealthy(i % 2 === 0);
          await Promise.resolve();
        }
      };

      const selector = async () => {
        for (let i = 0; i < 200; i++) {
          const selected = pool.selectNext();
          if (selected && !selected.isHealthy()) {
            violations.push(selected.address);
          }
          await Promise.resolve();
        }
      };

      await Promise.all([flipper(), selector(), selector()]);

      expect(violations).toEqual([]);
      expect(a.isHealthy() && c.isHealthy()).toBe(true);
    });
  });

  it('keeps membership fixed', () => {
    const backends = [new Backend(A), new Backend(B)];
    const pool = new BackendPool(backends);
    backends.push(new Backend(C));

    expect(pool.size).toBe(2);
    expect(Object.isFrozen(pool.getBackends())).toBe(true);
    expect(pool.getStatus()).toEqual([
      { address: A, healthy: true },
      { address: B, healthy: true }
    ]);
  });
});
