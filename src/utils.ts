import { hkdf } from '@noble/hashes/hkdf';
import { sha512 } from '@noble/hashes/sha512';
import * as ipaddr from 'ipaddr.js';
import {
  FAMILY_IPV4,
  FAMILY_IPV6,
  GNS_DERIVATION_CONTEXT,
  IPV4_ADDRESS_LENGTH,
  IPV6_ADDRESS_LENGTH,
  QUERY_HASH_LENGTH,
} from './constants';
import type { QueryHash, ResolvedAddress, ZoneKey } from './types';

// base32hex alphabet: 0-9, A-V (32 characters total)
const BASE32HEX_ALPHABET = '0123456789ABCDEFGHIJKLMNOPQRSTUV';

// convert a Buffer to uppercase base32hex encoding without padding
export function toBase32Hex(buffer: Buffer): string {
  let result = '';
  let bits = 0;
  let value = 0;
  for (let i = 0; i < buffer.length; i++) {
    // add 8 bits from current byte, keep at most 12 pending bits
    value = ((value << 8) | buffer[i]) & 0xfff;
    bits += 8;

    // extract 5-bit chunks and convert to base32hex
    while (bits >= 5) {
      bits -= 5;
      const index = (value >>> bits) & 0x1f;
      result += BASE32HEX_ALPHABET[index];
    }
  }
  // handle remaining bits (if any)
  if (bits > 0) {
    // pad with zeros to make a complete 5-bit chunk
    const index = (value << (5 - bits)) & 0x1f;
    result += BASE32HEX_ALPHABET[index];
  }
  return result;
}

// decode base32hex (case-insensitive), null on bad characters or non-zero padding
export function fromBase32Hex(input: string): Buffer | null {
  const bytes: number[] = [];
  let bits = 0;
  let value = 0;
  for (const char of input.toUpperCase()) {
    const index = BASE32HEX_ALPHABET.indexOf(char);
    if (index === -1) return null;
    value = ((value << 5) | index) & 0xfff;
    bits += 5;
    if (bits >= 8) {
      bits -= 8;
      bytes.push((value >>> bits) & 0xff);
    }
  }
  // leftover bits are padding and must be zero
  if ((value & ((1 << bits) - 1)) !== 0) return null;
  return Buffer.from(bytes);
}

// strip trailing dot from a string
export function stripTrailingDot(str: string): string {
  return str.endsWith('.') ? str.slice(0, -1) : str;
}

// trim spaces and leading/trailing periods, case is kept (labels are case-sensitive in GNS)
export function normalizeName(name: string): string {
  return String(name)
    .trim()
    .replace(/^[.]+|[.]+$/g, '');
}

// compare two DNS names, case-insensitive and ignoring a trailing dot
export function sameDnsName(a: string, b: string): boolean {
  return stripTrailingDot(a).toLowerCase() === stripTrailingDot(b).toLowerCase();
}

// query is an IPv4/IPv6 address
export function isValidIp(ip: string): boolean {
  return ipaddr.isValid(ip);
}

// textual IP to its binary form, null if it is not an address
export function addressToBytes(address: string): Buffer | null {
  if (!ipaddr.isValid(address)) return null;
  return Buffer.from(ipaddr.parse(address).toByteArray());
}

// binary IPv4/IPv6 address to its textual form, null on a wrong length
export function bytesToAddress(bytes: Buffer): ResolvedAddress | null {
  if (bytes.length !== IPV4_ADDRESS_LENGTH && bytes.length !== IPV6_ADDRESS_LENGTH) {
    return null;
  }
  return {
    address: ipaddr.fromByteArray([...bytes]).toString(),
    family: bytes.length === IPV4_ADDRESS_LENGTH ? FAMILY_IPV4 : FAMILY_IPV6,
  };
}

// key under which a label of a zone is stored in the namestore and the DHT
export function deriveQueryHash(zone: ZoneKey, label: string): QueryHash {
  const derived = hkdf(sha512, zone, GNS_DERIVATION_CONTEXT, label, QUERY_HASH_LENGTH);
  return Buffer.from(sha512(derived));
}

// hash identifying a service name on a VPN peer
export function hashServiceName(name: string): Buffer {
  return Buffer.from(sha512(name));
}
