import { describe, it, expect } from 'vitest';
import { parseFormArgs, readSettings } from '../settings.js';

describe('readSettings', () => {
  it('uses defaults when nothing is set', () => {
    expect(readSettings({})).toEqual({ logLevel: 'info', pollIntervalMs: 100, killGraceMs: 1000 });
  });

  it('reads overrides from the environment', () => {
    expect(readSettings({ LOG_LEVEL: 'debug', WFRUN_POLL_MS: '25', WFRUN_GRACE_MS: '300' })).toEqual({
      logLevel: 'debug',
      pollIntervalMs: 25,
      killGraceMs: 300
    });
  });

  it('falls back on invalid values', () => {
    expect(readSettings({ LOG_LEVEL: 'loud', WFRUN_POLL_MS: 'soon', WFRUN_GRACE_MS: '-5' })).toEqual({
      logLevel: 'info',
      pollIntervalMs: 100,
      killGraceMs: 1000
    });
  });
});

describe('parseFormArgs', () => {
  it('splits on the first equals sign', () => {
    expect(parseFormArgs(['name=api', 'query=a=b', 'empty='])).toEqual({ name: 'api', query: 'a=b', empty: '' });
  });
});
