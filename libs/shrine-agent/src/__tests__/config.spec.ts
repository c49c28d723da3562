/**
 * Agent path and configuration tests
 */

import * as os from 'node:os';
import * as path from 'node:path';
import { ValidationError } from '@shrine/ipc';
import { loadAgentConfig } from '../config';
import { getPidPath, getRuntimeDir, getSocketPath } from '../paths';

describe('getRuntimeDir', () => {
  it('prefers an explicit directory', () => {
    expect(getRuntimeDir({ runtimeDir: '/srv/run' }, { XDG_RUNTIME_DIR: '/run/user/1000' })).toBe('/srv/run');
  });

  it('falls back to XDG_RUNTIME_DIR', () => {
    expect(getRuntimeDir({}, { XDG_RUNTIME_DIR: '/run/user/1000' })).toBe('/run/user/1000');
  });

  it('falls back to a per-user tmp dir', () => {
    expect(path.dirname(getRuntimeDir({}, {}))).toBe(os.tmpdir());
    expect(path.basename(getRuntimeDir({}, {}))).toMatch(/^shrine-/);
  });
});

describe('getSocketPath', () => {
  it('gives each shrine file its own socket', () => {
    const first = getSocketPath('/run', '/home/a/shrine');
    const second = getSocketPath('/run', '/home/b/shrine');

    expect(first).toMatch(/^\/run\/shrine-[0-9a-f]{16}\.sock$/);
    expect(first).not.toBe(second);
  });

  it('resolves relative shrine paths first', () => {
    expect(getSocketPath('/run', 'shrine')).toBe(getSocketPath('/run', path.resolve('shrine')));
  });

  it('puts the pid file beside the socket', () => {
    expect(getPidPath('/run/shrine-0123456789abcdef.sock')).toBe('/run/shrine-0123456789abcdef.pid');
  });
});

describe('loadAgentConfig', () => {
  it('reads the lifetime and log level from the environment', () => {
    const config = loadAgentConfig('/data/shrine', {}, {
      SHRINE_RUNTIME_DIR: '/srv/run',
      SHRINE_AGENT_TTL: '90',
      SHRINE_LOG_LEVEL: 'debug',
    });

    expect(config.shrinePath).toBe('/data/shrine');
    expect(config.runtimeDir).toBe('/srv/run');
    expect(config.ttlMs).toBe(90_000);
    expect(config.logLevel).toBe('debug');
    expect(config.logPath).toBe('/srv/run/shrine-agent.log');
    expect(config.pidPath).toBe(config.socketPath.replace(/\.sock$/, '.pid'));
  });

  it('lets command line values override the environment', () => {
    const config = loadAgentConfig('/data/shrine', { ttl: 30, runtimeDir: '/tmp/other' }, { SHRINE_AGENT_TTL: '90' });

    expect(config.ttlMs).toBe(30_000);
    expect(config.runtimeDir).toBe('/tmp/other');
  });

  it('defaults the lifetime to fifteen minutes', () => {
    expect(loadAgentConfig('/data/shrine', { runtimeDir: '/srv/run' }, {}).ttlMs).toBe(15 * 60 * 1000);
  });

  it('rejects a malformed lifetime', () => {
    expect(() => loadAgentConfig('/data/shrine', {}, { SHRINE_AGENT_TTL: 'soon' })).toThrow(ValidationError);
  });
});
