/**
 * Secret value holder
 *
 * Wraps the bytes of a secret so they can be overwritten when released and
 * never show up in logs or JSON.
 */

import { inspect } from 'node:util';

const REDACTED = '[REDACTED]';

export class SecretBytes {
  private readonly buffer: Buffer;
  private wiped = false;

  constructor(bytes: Uint8Array) {
    this.buffer = Buffer.from(bytes);
  }

  static fromString(value: string): SecretBytes {
    return new SecretBytes(Buffer.from(value, 'utf8'));
  }

  static fromBase64(value: string): SecretBytes {
    return new SecretBytes(Buffer.from(value, 'base64'));
  }

  get length(): number {
    return this.buffer.length;
  }

  get isWiped(): boolean {
    return this.wiped;
  }

  /**
   * The underlying bytes. The returned buffer is the live one; it is zeroed by
   * `wipe()`.
   */
  expose(): Buffer {
    return this.buffer;
  }

  toUtf8(): string {
    return this.buffer.toString('utf8');
  }

  toBase64(): string {
    return this.buffer.toString('base64');
  }

  clone(): SecretBytes {
    return new SecretBytes(this.buffer);
  }

  equals(other: SecretBytes): boolean {
    return this.buffer.equals(other.buffer);
  }

  wipe(): void {
    this.buffer.fill(0);
    this.wiped = true;
  }

  toString(): string {
    return REDACTED;
  }

  toJSON(): string {
    return REDACTED;
  }

  [inspect.custom](): string {
    return `SecretBytes(${REDACTED})`;
  }
}
