import { describe, it, expect } from 'vitest';
import { resolve } from 'path';
import { envCandidates } from '../../../src/server/env.js';

describe('envCandidates', () => {
  it('should put an explicit env file first, then the working directory', () => {
    const candidates = envCandidates({ DUPLEX_SEQUENCER_ENV_FILE: '/etc/duplex/.env' });

    expect(candidates[0]).toBe('/etc/duplex/.env');
    expect(candidates[1]).toBe(resolve(process.cwd(), '.env'));
    expect(candidates).toHaveLength(4);
  });

  it('should skip the override when unset', () => {
    const candidates = envCandidates({});
    expect(candidates[0]).toBe(resolve(process.cwd(), '.env'));
    expect(candidates).toHaveLength(3);
  });
});
