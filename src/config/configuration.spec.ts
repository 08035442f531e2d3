import * as path from 'path';

import configuration, { logLevelsUpTo } from './configuration';

describe('configuration', () => {
  const env = { ...process.env };

  afterEach(() => {
    process.env = { ...env };
  });

  it('lists log levels up to the chosen one', () => {
    expect(logLevelsUpTo('error')).toEqual(['error']);
    expect(logLevelsUpTo('debug')).toEqual(['error', 'warn', 'log', 'debug']);
  });

  it('defaults to the bundled dataset and warnings', () => {
    delete process.env.COUNTRIES_PATH;
    delete process.env.LOG_LEVEL;

    expect(configuration()).toEqual({
      countriesPath: path.resolve(process.cwd(), 'data/countries.json'),
      logLevels: ['error', 'warn'],
    });
  });

  it('reads the environment', () => {
    process.env.COUNTRIES_PATH = 'fixtures/countries.json';
    process.env.LOG_LEVEL = 'verbose';

    expect(configuration()).toEqual({
      countriesPath: path.resolve(process.cwd(), 'fixtures/countries.json'),
      logLevels: ['error', 'warn', 'log', 'debug', 'verbose'],
    });
  });

  it('rejects unknown log levels', () => {
    process.env.LOG_LEVEL = 'loud';

    expect(() => configuration()).toThrow();
  });
});
