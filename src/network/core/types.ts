/**
 * Core network types
 *
 * An IPAddress here is always a network address: a 32-bit value together with
 * a prefix length, with every bit outside the prefix cleared. Host addresses
 * are simply /32 networks.
 *
 *   "192.168.1.5/24" → value 0xC0A80100, prefixLength 24 → "192.168.1.0/24"
 *   "10.1.2.3"       → value 0x0A010203, prefixLength 32 → "10.1.2.3/32"
 *   "0.0.0.0/0"      → the wildcard (default route) network
 */

import { InvalidPrefixError, ParseError } from './errors';

export const MAX_PREFIX_LENGTH = 32;

/** Network mask for a prefix length, as a 32-bit unsigned integer */
export function maskFromPrefix(prefixLength: number): number {
  if (!Number.isInteger(prefixLength) || prefixLength < 0 || prefixLength > MAX_PREFIX_LENGTH) {
    throw new InvalidPrefixError(String(prefixLength));
  }
  return prefixLength === 0 ? 0 : (0xffffffff << (MAX_PREFIX_LENGTH - prefixLength)) >>> 0;
}

// ─── IPv4 Address ────────────────────────────────────────────────────

export class IPAddress {
  private readonly value: number;
  private readonly prefixLength: number;

  /**
   * @param value - raw 32-bit address; host bits are cleared here
   * @param prefixLength - 0..32 (defaults to a host route)
   */
  constructor(value: number, prefixLength: number = MAX_PREFIX_LENGTH) {
    if (!Number.isInteger(value) || value < 0 || value > 0xffffffff) {
      throw new ParseError(`Invalid address value: ${value}`);
    }
    this.prefixLength = prefixLength;
    this.value = (value & maskFromPrefix(prefixLength)) >>> 0;
  }

  /**
   * Parse "a.b.c.d" or "a.b.c.d/n".
   *
   * @throws {ParseError} malformed dotted quad, bad octet or non-numeric prefix
   * @throws {InvalidPrefixError} prefix outside 0..32
   */
  static parse(text: string): IPAddress {
    const slash = text.indexOf('/');
    const ip = slash === -1 ? text : text.slice(0, slash);

    let prefixLength = MAX_PREFIX_LENGTH;
    if (slash !== -1) {
      const prefixText = text.slice(slash + 1);
      if (!/^-?\d+$/.test(prefixText)) {
        throw new ParseError(`Invalid prefix length format: ${text}`);
      }
      prefixLength = parseInt(prefixText, 10);
      if (prefixLength < 0 || prefixLength > MAX_PREFIX_LENGTH) {
        throw new InvalidPrefixError(prefixText);
      }
    }

    return new IPAddress(IPAddress.parseDottedQuad(ip), prefixLength);
  }

  private static parseDottedQuad(ip: string): number {
    const parts = ip.split('.');
    if (parts.length !== 4) {
      throw new ParseError(`Invalid IP address format: ${ip}. Valid example: 192.168.0.1`);
    }
    const octets = parts.map(p => {
      if (!/^\d{1,3}$/.test(p)) {
        throw new ParseError(`Invalid IP octet: ${p || '(empty)'} in ${ip}`);
      }
      const n = parseInt(p, 10);
      if (n > 255) throw new ParseError(`Invalid IP octet: ${p} in ${ip}`);
      return n;
    });
    return ((octets[0] << 24) | (octets[1] << 16) | (octets[2] << 8) | octets[3]) >>> 0;
  }

  getValue(): number {
    return this.value;
  }

  getPrefixLength(): number {
    return this.prefixLength;
  }

  getMask(): number {
    return maskFromPrefix(this.prefixLength);
  }

  getOctets(): number[] {
    return [
      (this.value >>> 24) & 0xff,
      (this.value >>> 16) & 0xff,
      (this.value >>> 8) & 0xff,
      this.value & 0xff,
    ];
  }

  /**
   * Does this network cover `other`? The probe is masked with this
   * network's mask, whatever its own prefix length is.
   */
  contains(other: IPAddress): boolean {
    return ((other.value & this.getMask()) >>> 0) === this.value;
  }

  equals(other: IPAddress): boolean {
    return this.value === other.value && this.prefixLength === other.prefixLength;
  }

  toString(): string {
    return `${this.getOctets().join('.')}/${this.prefixLength}`;
  }
}
