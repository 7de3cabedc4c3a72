import { Logger } from '@nestjs/common';
import { UnknownCountryError } from '../../src/common/errors';
import { createServices, Services } from '../helpers';

describe('StatsService', () => {
  let s: Services;

  beforeEach(() => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    s = createServices();
    s.queue.seedIfEmpty();
  });

  afterEach(() => {
    s.close();
    jest.restoreAllMocks();
  });

  it('should count prayers per party short name, largest first', () => {
    s.queue.markPrayed(2);
    s.queue.markPrayed(1);
    s.queue.purgeAndReload(['beta']);
    s.queue.markPrayed(7);
    s.queue.markPrayed(6);

    expect(s.stats.partyStats('alpha').map((p) => [p.shortName, p.cssClass, p.count])).toEqual([
      ['Blue', 'blue', 1],
      ['Law & Order', 'law-and-order', 1],
    ]);
    const beta = s.stats.partyCounts('beta');
    expect(Object.keys(beta)).toEqual(['Green', 'Other']);
    expect(beta).toEqual({ Green: 1, Other: 1 });
  });

  it('should sort by count descending', () => {
    s.queue.markPrayed(3);
    s.queue.markPrayed(4);
    s.queue.markPrayed(5);
    expect(Object.entries(s.stats.partyCounts('beta'))).toEqual([
      ['Green', 2],
      ['Other', 1],
    ]);
  });

  it('should total everything for overall', () => {
    s.queue.markPrayed(1);
    s.queue.markPrayed(3);
    expect(s.stats.partyCounts('overall')).toEqual({ Overall: 2 });
  });

  it('should return the timeline in the order prayers were recorded', () => {
    s.queue.markPrayed(2);
    s.clock.advance(60_000);
    s.queue.markPrayed(1);
    s.clock.advance(60_000);
    s.queue.putBack(2);
    s.queue.markPrayed(2);

    expect(s.stats.timeline('alpha')).toEqual({
      timestamps: ['2024-03-10T10:01:00.000Z', '2024-03-10T10:02:00.000Z'],
      values: [
        { place: 'Seat One', person: 'Ada Example', party: 'Blue Party' },
        { place: null, person: 'Ben Example', party: 'Law & Order' },
      ],
      country_name: 'Alphaland',
    });
  });

  it('should name the country of each entry in the overall timeline', () => {
    s.queue.markPrayed(3);
    s.queue.markPrayed(1);
    const timeline = s.stats.timeline('overall');
    expect(timeline.country_name).toBe('Overall');
    expect(timeline.values.map((v) => v.country)).toEqual(['Betaland', 'Alphaland']);
  });

  it('should reject unknown countries', () => {
    expect(() => s.stats.partyCounts('nowhere')).toThrow(UnknownCountryError);
    expect(() => s.stats.timeline('nowhere')).toThrow(UnknownCountryError);
  });
});
