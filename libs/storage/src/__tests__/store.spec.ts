import { ValidationError } from '@shrine/ipc';
import { inspect } from 'node:util';
import { SecretBytes } from '../secret-bytes';
import { SecretStore, compilePattern, validateSecretPath } from '../store';

describe('SecretStore', () => {
  const created = new Date('2026-03-01T10:00:00.000Z');
  const updated = new Date('2026-03-02T10:00:00.000Z');

  it('keeps creation metadata when a secret is overwritten', () => {
    const store = new SecretStore();
    store.set('db/password', SecretBytes.fromString('one'), 'text', 'alice@laptop', created);
    store.set('db/password', SecretBytes.fromString('two'), 'text', 'bob@desktop', updated);

    const secret = store.get('db/password');
    expect(secret?.value.toUtf8()).toBe('two');
    expect(secret?.createdBy).toBe('alice@laptop');
    expect(secret?.createdAt).toBe('2026-03-01T10:00:00.000Z');
    expect(secret?.updatedBy).toBe('bob@desktop');
    expect(secret?.updatedAt).toBe('2026-03-02T10:00:00.000Z');
    expect(store.size).toBe(1);
  });

  it('wipes the replaced value', () => {
    const store = new SecretStore();
    const first = SecretBytes.fromString('one');
    store.set('a', first, 'text', 'alice@laptop');
    store.set('a', SecretBytes.fromString('two'), 'text', 'alice@laptop');
    expect(first.isWiped).toBe(true);
  });

  it('lists sorted entries without values', () => {
    const store = new SecretStore();
    for (const path of ['b', 'a/z', 'a/b', 'C']) {
      store.set(path, SecretBytes.fromString(path), 'text', 'alice@laptop', created);
    }
    const entries = store.list();
    expect(entries.map((e) => e.path)).toEqual(['C', 'a/b', 'a/z', 'b']);
    expect(entries[0]).toEqual({ path: 'C', mode: 'text', createdBy: 'alice@laptop', createdAt: '2026-03-01T10:00:00.000Z' });
  });

  it('filters by an unanchored pattern', () => {
    const store = new SecretStore();
    for (const path of ['app/db', 'app/api', 'db/root']) {
      store.set(path, SecretBytes.fromString('x'), 'text', 'alice@laptop');
    }
    expect(store.list(compilePattern('db')).map((e) => e.path)).toEqual(['app/db', 'db/root']);
    expect(store.list(compilePattern('^db')).map((e) => e.path)).toEqual(['db/root']);
  });

  it('remove reports whether the path existed', () => {
    const store = new SecretStore();
    store.set('a', SecretBytes.fromString('x'), 'text', 'alice@laptop');
    expect(store.remove('a')).toBe(true);
    expect(store.remove('a')).toBe(false);
    expect(store.size).toBe(0);
  });

  it('survives a stored round trip', () => {
    const store = new SecretStore();
    store.set('bin', new SecretBytes(Buffer.from([0, 200])), 'binary', 'alice@laptop', created);
    const copy = SecretStore.fromStored(store.toStored());
    expect(copy.get('bin')?.mode).toBe('binary');
    expect(copy.get('bin')?.value.expose().equals(Buffer.from([0, 200]))).toBe(true);
  });

  it('wipe zeroes and forgets everything', () => {
    const store = new SecretStore();
    const value = SecretBytes.fromString('x');
    store.set('a', value, 'text', 'alice@laptop');
    store.wipe();
    expect(value.isWiped).toBe(true);
    expect(store.size).toBe(0);
  });
});

describe('validateSecretPath', () => {
  it.each(['a', 'a/b', 'A/b-c/d_e'])('accepts %s', (path) => {
    expect(() => validateSecretPath(path)).not.toThrow();
  });

  it.each(['', '/a', 'a/', 'a//b'])('rejects "%s"', (path) => {
    expect(() => validateSecretPath(path)).toThrow(ValidationError);
  });
});

describe('compilePattern', () => {
  it('rejects an invalid regular expression', () => {
    expect(() => compilePattern('(')).toThrow(ValidationError);
  });
});

describe('SecretBytes', () => {
  it('never prints its content', () => {
    const value = SecretBytes.fromString('hunter2');
    expect(String(value)).toBe('[REDACTED]');
    expect(JSON.stringify({ value })).toBe('{"value":"[REDACTED]"}');
    expect(inspect(value)).not.toContain('hunter2');
  });

  it('copies its input', () => {
    const input = Buffer.from('abc');
    const value = new SecretBytes(input);
    input.fill(0);
    expect(value.toUtf8()).toBe('abc');
  });
});
