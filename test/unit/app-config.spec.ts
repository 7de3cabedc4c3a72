import * as path from 'path';
import { ConfigError, loadAppConfig, parseCountriesFile } from '../../src/config/app-config';
import { fixtureConfig, FIXTURES } from '../helpers';

describe('App config', () => {
  const country = {
    code: 'gamma',
    name: 'Gammaland',
    rosterPath: 'gamma.csv',
    geometryPath: 'maps/gamma.geojson',
    placement: 'random',
    parties: [{ name: 'Other', shortName: 'Other', color: '#CCCCCC' }],
  };

  it('should resolve paths against the config directory and apply defaults', () => {
    const [parsed] = parseCountriesFile({ countries: [country] }, '/srv/config');
    expect(parsed).toEqual({
      code: 'gamma',
      name: 'Gammaland',
      flag: '',
      rosterPath: path.resolve('/srv/config', 'gamma.csv'),
      geometryPath: path.resolve('/srv/config', 'maps/gamma.geojson'),
      labelMappingPath: null,
      placement: 'random',
      totalRepresentatives: null,
      mapPadding: 0.1,
      parties: [{ name: 'Other', shortName: 'Other', color: '#CCCCCC' }],
    });
  });

  it('should reject duplicate country codes', () => {
    expect(() => parseCountriesFile({ countries: [country, country] }, '/srv')).toThrow('Duplicate country code in config: gamma');
  });

  it('should report the path of invalid fields', () => {
    const bad = { ...country, parties: [{ name: 'Other', shortName: 'Other', color: 'grey' }] };
    expect(() => parseCountriesFile({ countries: [bad] }, '/srv')).toThrow(ConfigError);
    expect(() => parseCountriesFile({ countries: [bad] }, '/srv')).toThrow(/countries\.0\.parties\.0\.color/);
  });

  it('should reject an unknown placement mode', () => {
    expect(() => parseCountriesFile({ countries: [{ ...country, placement: 'grid' }] }, '/srv')).toThrow(/countries\.0\.placement/);
  });

  it('should reject a file without countries', () => {
    expect(() => parseCountriesFile([], '/srv')).toThrow(ConfigError);
    expect(() => parseCountriesFile({ countries: [] }, '/srv')).toThrow(ConfigError);
  });

  it('should read the environment with defaults', () => {
    const config = fixtureConfig({ THROTTLE_TTL: '30' });
    expect(config.databasePath).toBe(':memory:');
    expect(config.throttle).toEqual({ ttl: 30_000, limit: 1000 });
    expect(config.map).toEqual({ size: 200, iconScale: 0.6 });
    expect(config.port).toBe(3000);
    expect(config.countries.map((c) => c.code)).toEqual(['alpha', 'beta']);
    expect(config.countries[1].labelMappingPath).toBe(path.join(FIXTURES, 'beta-labels.csv'));
  });

  it('should fail on an unreadable countries file', () => {
    expect(() => loadAppConfig({ COUNTRIES_CONFIG: path.join(FIXTURES, 'absent.json') })).toThrow(ConfigError);
  });
});
