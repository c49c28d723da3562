import { FormatError, IntegrityError } from '@shrine/ipc';
import { bytesToUuid, decode, encode, readHeader, uuidToBytes, verify, writeHeader } from '../codec';
import { deriveKey, generateSalt } from '../crypto';
import type { DerivedKey } from '../crypto';
import { SecretBytes } from '../secret-bytes';
import { SecretStore } from '../store';

const ITERATIONS = 1000;
const UUID = '0f8fad5b-d9cb-469f-a165-70867728950e';
const HEADER_LEN = 6 + 1 + 16 + 1 + 1 + 4 + 1 + 16;
const PLAIN_HEADER_LEN = 6 + 1 + 16 + 1;

function sampleStore(): SecretStore {
  const store = new SecretStore();
  store.set('secret', SecretBytes.fromString('password123'), 'text', 'alice@host', new Date('2026-01-02T03:04:05.000Z'));
  store.set('bin/blob', new SecretBytes(Buffer.from([0, 1, 2, 255])), 'binary', 'alice@host');
  return store;
}

describe('codec', () => {
  let key: DerivedKey;

  beforeAll(async () => {
    key = await deriveKey('test-secret', generateSalt(), ITERATIONS);
  });

  describe('uuid bytes', () => {
    it('converts both ways', () => {
      const bytes = uuidToBytes(UUID);
      expect(bytes.length).toBe(16);
      expect(bytesToUuid(bytes)).toBe(UUID);
    });

    it('rejects malformed uuids', () => {
      expect(() => uuidToBytes('not-a-uuid')).toThrow(FormatError);
    });
  });

  describe('header', () => {
    it('writes the documented layout', () => {
      const header = writeHeader({ version: 1, uuid: UUID, encryption: 'aes-256-gcm', kdf: key.params });
      expect(header.length).toBe(HEADER_LEN);
      expect(header.subarray(0, 6).toString('ascii')).toBe('shrine');
      expect(header[6]).toBe(1);
      expect(header[23]).toBe(1);
      expect(header[24]).toBe(1);
      expect(header.readUInt32BE(25)).toBe(ITERATIONS);
      expect(header[29]).toBe(16);
    });

    it('ends an unencrypted header at the cipher id', () => {
      const header = writeHeader({ version: 1, uuid: UUID, encryption: 'none' });
      expect(header.length).toBe(PLAIN_HEADER_LEN);
      expect(header[23]).toBe(0);
      expect(readHeader(header)).toEqual({ header: { version: 1, uuid: UUID, encryption: 'none' }, length: PLAIN_HEADER_LEN });
    });

    it('reads back what it wrote', () => {
      const written = writeHeader({ version: 1, uuid: UUID, encryption: 'aes-256-gcm', kdf: key.params });
      const { header, length } = readHeader(written);
      expect(length).toBe(HEADER_LEN);
      expect(header.uuid).toBe(UUID);
      if (header.encryption !== 'aes-256-gcm') throw new Error('expected an encrypted header');
      expect(header.kdf.iterations).toBe(ITERATIONS);
      expect(header.kdf.salt.equals(key.params.salt)).toBe(true);
    });

    it('rejects bad magic', () => {
      expect(() => readHeader(Buffer.from('nope'))).toThrow('Not a shrine file: bad magic');
    });

    it('rejects a truncated header', () => {
      const written = writeHeader({ version: 1, uuid: UUID, encryption: 'aes-256-gcm', kdf: key.params });
      expect(() => readHeader(written.subarray(0, 20))).toThrow('Not a shrine file: header is truncated');
    });

    it('rejects an unsupported version', () => {
      const written = writeHeader({ version: 1, uuid: UUID, encryption: 'aes-256-gcm', kdf: key.params });
      written[6] = 9;
      expect(() => readHeader(written)).toThrow('Unsupported shrine format version 9');
    });

    it('rejects an unknown kdf', () => {
      const written = writeHeader({ version: 1, uuid: UUID, encryption: 'aes-256-gcm', kdf: key.params });
      written[24] = 7;
      expect(() => readHeader(written)).toThrow('Unsupported key derivation function id 7');
    });

    it('rejects an unknown cipher', () => {
      const written = writeHeader({ version: 1, uuid: UUID, encryption: 'aes-256-gcm', kdf: key.params });
      written[23] = 5;
      expect(() => readHeader(written)).toThrow('Unsupported cipher id 5');
    });

    it('rejects a zero iteration count as a format error', () => {
      const written = writeHeader({ version: 1, uuid: UUID, encryption: 'aes-256-gcm', kdf: key.params });
      written.writeUInt32BE(0, 25);
      expect(() => readHeader(written)).toThrow(FormatError);
      expect(() => readHeader(written)).toThrow('Not a shrine file: key derivation iterations must be at least 1');
    });
  });

  describe('encode / decode', () => {
    it('restores secrets, metadata and config', () => {
      const blob = encode(sampleStore(), { 'git.enabled': true, editor: 'vim' }, key, UUID);
      const decoded = decode(blob, key);

      expect(decoded.header.uuid).toBe(UUID);
      expect(decoded.config).toEqual({ 'git.enabled': true, editor: 'vim' });
      expect(decoded.store.paths()).toEqual(['bin/blob', 'secret']);

      const secret = decoded.store.get('secret');
      expect(secret?.value.toUtf8()).toBe('password123');
      expect(secret?.mode).toBe('text');
      expect(secret?.createdBy).toBe('alice@host');
      expect(secret?.createdAt).toBe('2026-01-02T03:04:05.000Z');
      expect(decoded.store.get('bin/blob')?.value.expose().equals(Buffer.from([0, 1, 2, 255]))).toBe(true);
    });

    it('never writes values in clear', () => {
      const blob = encode(sampleStore(), {}, key, UUID);
      expect(blob.includes(Buffer.from('password123'))).toBe(false);
    });

    it('re-encrypts under a fresh nonce every time', () => {
      const a = encode(sampleStore(), {}, key, UUID);
      const b = encode(sampleStore(), {}, key, UUID);
      expect(a.subarray(HEADER_LEN, HEADER_LEN + 12).equals(b.subarray(HEADER_LEN, HEADER_LEN + 12))).toBe(false);
    });

    it('fails with IntegrityError under a wrong password', async () => {
      const blob = encode(sampleStore(), {}, key, UUID);
      const wrong = await deriveKey('wrong', key.params.salt, ITERATIONS);
      expect(() => decode(blob, wrong)).toThrow(IntegrityError);
    });

    it('fails with IntegrityError under a key derived from another salt', async () => {
      const blob = encode(sampleStore(), {}, key, UUID);
      const other = await deriveKey('test-secret', generateSalt(), ITERATIONS);
      expect(() => decode(blob, other)).toThrow(IntegrityError);
    });

    it('fails with IntegrityError when the header is tampered with', () => {
      const blob = encode(sampleStore(), {}, key, UUID);
      blob[10] ^= 0x01;
      expect(() => decode(blob, key)).toThrow(IntegrityError);
    });

    it('fails with IntegrityError when the ciphertext is tampered with', () => {
      const blob = encode(sampleStore(), {}, key, UUID);
      blob[blob.length - 1] ^= 0x01;
      expect(() => decode(blob, key)).toThrow(IntegrityError);
    });

    it('fails with FormatError when nonce and tag are missing', () => {
      const blob = encode(sampleStore(), {}, key, UUID);
      expect(() => decode(blob.subarray(0, HEADER_LEN + 4), key)).toThrow(FormatError);
    });
  });

  describe('unencrypted containers', () => {
    it('stores the payload in clear and reads it without a key', () => {
      const blob = encode(sampleStore(), { editor: 'vim' }, null, UUID);
      expect(blob.includes(Buffer.from('"value":"cGFzc3dvcmQxMjM="'))).toBe(true);
      expect(blob.subarray(PLAIN_HEADER_LEN).toString('utf8')).toContain('"config":{"editor":"vim"}');

      const decoded = decode(blob, null);
      expect(decoded.header).toEqual({ version: 1, uuid: UUID, encryption: 'none' });
      expect(decoded.store.get('secret')?.value.toUtf8()).toBe('password123');
      expect(decoded.config).toEqual({ editor: 'vim' });
    });

    it('requires a key for an encrypted container', () => {
      const blob = encode(sampleStore(), {}, key, UUID);
      expect(() => decode(blob, null)).toThrow(IntegrityError);
    });
  });

  describe('verify', () => {
    it('reports whether a key opens the container', async () => {
      const blob = encode(sampleStore(), {}, key, UUID);
      const wrong = await deriveKey('wrong', key.params.salt, ITERATIONS);
      expect(verify(key, blob)).toBe(true);
      expect(verify(wrong, blob)).toBe(false);
      expect(verify(key, Buffer.from('garbage'))).toBe(false);
    });
  });
});
