import { loadShrineEnv, sessionTtlMs } from '../schemas/env.schema';
import { DEFAULT_KDF_ITERATIONS, DEFAULT_LOCK_TIMEOUT_MS, DEFAULT_SESSION_TTL_MS, MAX_SESSION_TTL_SECONDS } from '../constants';
import { ValidationError } from '../errors';

describe('loadShrineEnv', () => {
  it('falls back to defaults', () => {
    const env = loadShrineEnv({});
    expect(env).toEqual({
      runtimeDir: undefined,
      agentTtl: undefined,
      logLevel: 'warn',
      kdfIterations: DEFAULT_KDF_ITERATIONS,
      lockTimeoutMs: DEFAULT_LOCK_TIMEOUT_MS,
    });
    expect(sessionTtlMs(env)).toBe(DEFAULT_SESSION_TTL_MS);
  });

  it('coerces numeric variables', () => {
    const env = loadShrineEnv({
      SHRINE_AGENT_TTL: '30',
      SHRINE_KDF_ITERATIONS: '1000',
      SHRINE_LOCK_TIMEOUT_MS: '250',
      SHRINE_LOG_LEVEL: 'debug',
      SHRINE_RUNTIME_DIR: '/tmp/shrine-test',
    });
    expect(env.agentTtl).toBe(30);
    expect(env.kdfIterations).toBe(1000);
    expect(env.lockTimeoutMs).toBe(250);
    expect(env.logLevel).toBe('debug');
    expect(env.runtimeDir).toBe('/tmp/shrine-test');
    expect(sessionTtlMs(env)).toBe(30_000);
  });

  it('treats blank values as unset', () => {
    expect(loadShrineEnv({ SHRINE_AGENT_TTL: '  ' }).agentTtl).toBeUndefined();
  });

  it('names the offending variable', () => {
    expect(() => loadShrineEnv({ SHRINE_AGENT_TTL: 'soon' })).toThrow(ValidationError);
    expect(() => loadShrineEnv({ SHRINE_AGENT_TTL: 'soon' })).toThrow(/^Invalid SHRINE_AGENT_TTL: /);
  });

  it('caps the agent TTL at the longest timer delay', () => {
    expect(loadShrineEnv({ SHRINE_AGENT_TTL: String(MAX_SESSION_TTL_SECONDS) }).agentTtl).toBe(2_147_483);
    expect(() => loadShrineEnv({ SHRINE_AGENT_TTL: '2592000' })).toThrow(/^Invalid SHRINE_AGENT_TTL: /);
  });
});
