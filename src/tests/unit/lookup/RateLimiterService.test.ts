import { RateLimiterService } from '../../../services/lookup/RateLimiterService';
import { Logger } from '../../../services/core/Logger';

const logger = new Logger('RateLimiterServiceTest');

describe('RateLimiterService', () => {
  let clock: number;
  let sleeps: number[];
  let limiter: RateLimiterService;

  beforeEach(() => {
    clock = 1_000;
    sleeps = [];
    limiter = new RateLimiterService({
      minIntervalsMs: { pubchem: 200, 'wikidata-sparql': 300 },
      logger,
      now: () => clock,
      sleep: async (ms) => {
        sleeps.push(ms);
        clock += ms;
      },
    });
  });

  it('does not wait on the first call for a source', async () => {
    await limiter.acquire('pubchem');
    expect(sleeps).toEqual([]);
  });

  it('waits out the remaining interval on back-to-back calls', async () => {
    await limiter.acquire('pubchem');
    clock += 50;
    await limiter.acquire('pubchem');

    expect(sleeps).toEqual([150]);
  });

  it('does not wait once the interval has already passed', async () => {
    await limiter.acquire('pubchem');
    clock += 500;
    await limiter.acquire('pubchem');

    expect(sleeps).toEqual([]);
  });

  it('keeps one timestamp per source', async () => {
    await limiter.acquire('pubchem');
    await limiter.acquire('wikidata-sparql');
    await limiter.acquire('wikidata-sparql');

    expect(sleeps).toEqual([300]);
  });

  it('serves concurrent callers for one source in arrival order', async () => {
    const order: number[] = [];
    await Promise.all([
      limiter.acquire('pubchem').then(() => order.push(1)),
      limiter.acquire('pubchem').then(() => order.push(2)),
      limiter.acquire('pubchem').then(() => order.push(3)),
    ]);

    expect(order).toEqual([1, 2, 3]);
    expect(sleeps).toEqual([200, 200]);
  });

  it('uses the default interval for unknown sources', async () => {
    expect(limiter.minIntervalFor('pubchem')).toBe(200);
    expect(limiter.minIntervalFor('other')).toBe(0);

    await limiter.acquire('other');
    await limiter.acquire('other');
    expect(sleeps).toEqual([]);
  });
});
