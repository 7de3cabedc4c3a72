import { Logger, NotFoundException } from '@nestjs/common';
import { RepresentativeNotFoundError, UnknownCountryError } from '../../src/common/errors';
import { createServices, Services } from '../helpers';

describe('QueueService', () => {
  let s: Services;

  beforeAll(() => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
  });

  beforeEach(() => {
    s = createServices();
    s.queue.seedIfEmpty();
  });

  afterEach(() => s.close());

  afterAll(() => jest.restoreAllMocks());

  describe('seedIfEmpty', () => {
    it('should load every roster in file order, capped and without nameless rows', () => {
      const queued = s.queue.listQueued();
      expect(queued.map((r) => r.personName)).toEqual(['Ada Example', 'Ben Example', 'Dee Sample', 'Eve Sample', 'Fay Sample']);
      expect(queued.every((r) => r.status === 'queued' && r.prayedAt === null)).toBe(true);
    });

    it('should assign seats only for random-placement countries', () => {
      expect(s.queue.listQueued('alpha').map((r) => r.hexId)).toEqual(['A1', 'A2']);
      expect(s.queue.listQueued('beta').map((r) => r.hexId)).toEqual([null, null, null]);
    });

    it('should normalise blank roster cells', () => {
      const ben = s.queue.listQueued('alpha')[1];
      expect(ben.postLabel).toBeNull();
      expect(ben.thumbnail).toBe('https://example.org/ben.png');
      expect(s.queue.listQueued('beta')[1].party).toBe('Other');
    });

    it('should do nothing while something is queued', () => {
      expect(s.queue.seedIfEmpty()).toBe(0);
      expect(s.queue.listQueued()).toHaveLength(5);
    });

    it('should skip identities already prayed for', () => {
      for (const rep of s.queue.listQueued()) s.queue.markPrayed(rep.id);
      expect(s.queue.seedIfEmpty()).toBe(0);
      expect(s.queue.countPrayed()).toBe(5);
      expect(s.queue.nextInQueue()).toBeNull();
    });
  });

  describe('nextInQueue', () => {
    it('should return the earliest queued representative', () => {
      expect(s.queue.nextInQueue()?.personName).toBe('Ada Example');
      expect(s.queue.nextInQueue('beta')?.personName).toBe('Dee Sample');
    });

    it('should never return a prayed representative', () => {
      const seen: number[] = [];
      let next = s.queue.nextInQueue();
      while (next) {
        expect(next.status).toBe('queued');
        expect(seen).not.toContain(next.id);
        seen.push(next.id);
        s.queue.markPrayed(next.id);
        next = s.queue.nextInQueue();
      }
      expect(seen).toHaveLength(5);
    });
  });

  describe('markPrayed', () => {
    it('should record the time and the prayer order', () => {
      const ada = s.queue.markPrayed(1);
      s.clock.advance(60_000);
      const ben = s.queue.markPrayed(2);

      expect(ada).toMatchObject({ status: 'prayed', prayedAt: '2024-03-10T10:00:00.000Z', prayedSeq: 1 });
      expect(ben).toMatchObject({ status: 'prayed', prayedAt: '2024-03-10T10:01:00.000Z', prayedSeq: 2 });
    });

    it('should fail for an unknown or already prayed id', () => {
      s.queue.markPrayed(1);
      expect(() => s.queue.markPrayed(1)).toThrow(RepresentativeNotFoundError);
      expect(() => s.queue.markPrayed(999)).toThrow(NotFoundException);
      expect(() => s.queue.markPrayed(1)).toThrow('Representative 1 not found or already prayed for');
    });
  });

  describe('putBack', () => {
    it('should restore queued status and clear the timestamp', () => {
      s.queue.markPrayed(1);
      const rep = s.queue.putBack(1);

      expect(rep).toMatchObject({ status: 'queued', prayedAt: null, prayedSeq: null, hexId: 'A1' });
      expect(s.queue.nextInQueue()?.id).toBe(1);
    });

    it('should fail on a queued representative', () => {
      expect(() => s.queue.putBack(2)).toThrow(RepresentativeNotFoundError);
      expect(() => s.queue.putBack(2)).toThrow('Representative 2 not found or still in the queue');
    });

    it('should find the prayed row by identity, treating a blank label as none', () => {
      s.queue.markPrayed(2);
      expect(s.queue.putBackByIdentity('Ben Example', '', 'alpha').status).toBe('queued');
      expect(() => s.queue.putBackByIdentity('Ben Example', null, 'alpha')).toThrow(RepresentativeNotFoundError);
    });
  });

  describe('purgeAndReload', () => {
    it('should requeue everyone with the same seats', () => {
      s.queue.markPrayed(1);
      s.queue.markPrayed(4);

      expect(s.queue.purgeAndReload()).toEqual({ purged: 5, loaded: 5 });
      const all = s.queue.listQueued();
      expect(all).toHaveLength(5);
      expect(s.queue.countPrayed()).toBe(0);
      expect(s.queue.listQueued('alpha').map((r) => r.hexId)).toEqual(['A1', 'A2']);
    });

    it('should leave no polygon with two representatives', () => {
      s.queue.purgeAndReload();
      const seats = s.queue.listQueued('alpha').map((r) => r.hexId);
      expect(new Set(seats).size).toBe(seats.length);
    });

    it('should only touch the given countries', () => {
      s.queue.markPrayed(3);
      expect(s.queue.purgeAndReload(['alpha'])).toEqual({ purged: 2, loaded: 2 });
      expect(s.queue.listPrayed('beta').map((r) => r.id)).toEqual([3]);
    });

    it('should reject unknown countries before deleting anything', () => {
      expect(() => s.queue.purgeAndReload(['alpha', 'nowhere'])).toThrow(UnknownCountryError);
      expect(s.queue.listQueued()).toHaveLength(5);
    });
  });

  describe('lists and summary', () => {
    it('should list prayed representatives by prayer order', () => {
      s.queue.markPrayed(4);
      s.queue.markPrayed(1);
      s.queue.markPrayed(3);

      expect(s.queue.listPrayed(undefined, 'asc').map((r) => r.id)).toEqual([4, 1, 3]);
      expect(s.queue.listPrayed().map((r) => r.id)).toEqual([3, 1, 4]);
      expect(s.queue.listPrayed('beta', 'asc').map((r) => r.id)).toEqual([4, 3]);
    });

    it('should summarise remaining, queued and prayed counts', () => {
      s.queue.markPrayed(1);
      s.queue.markPrayed(3);
      expect(s.queue.summary()).toEqual({ remaining: 3, queueSize: 3, totalPrayed: 2 });
      expect(s.queue.countPrayed('alpha')).toBe(1);
    });
  });
});
