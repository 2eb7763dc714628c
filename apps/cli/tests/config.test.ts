import { describe, it, expect } from 'vitest';
import { resolveConfig, DEFAULT_OWNER } from '../src/config.js';

describe('resolveConfig', () => {
  it('falls back to defaults', () => {
    expect(resolveConfig({}, {})).toEqual({ owner: DEFAULT_OWNER, caller: DEFAULT_OWNER, verbose: false });
  });

  it('reads the environment', () => {
    expect(resolveConfig({}, { TASKREG_OWNER: 'ops', TASKREG_CALLER: 'dev' })).toEqual({
      owner: 'ops',
      caller: 'dev',
      verbose: false,
    });
  });

  it('prefers flags over the environment', () => {
    const config = resolveConfig({ owner: 'root', as: 'alice', verbose: true }, { TASKREG_OWNER: 'ops', TASKREG_CALLER: 'dev' });
    expect(config).toEqual({ owner: 'root', caller: 'alice', verbose: true });
  });

  it('acts as the owner when no caller is given', () => {
    expect(resolveConfig({ owner: 'root' }, {}).caller).toBe('root');
  });

  it('ignores blank values', () => {
    expect(resolveConfig({ owner: '  ' }, { TASKREG_OWNER: '' }).owner).toBe(DEFAULT_OWNER);
  });
});
