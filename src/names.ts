import {
  GNS_RELATIVE_SUFFIX,
  GNS_TLD,
  ZKEY_TLD,
  ZONE_KEY_COORDINATE_LENGTH,
  ZONE_KEY_LENGTH,
} from './constants';
import type { ZoneKey } from './types';
import { fromBase32Hex, toBase32Hex } from './utils';

// how a name has to be resolved
export type NameKind = 'dns' | 'gns' | 'zkey';

// a name and the part of it that is not resolved yet
export interface NameCursor {
  name: string;
  position: number; // length of the unresolved prefix, 0 once every label is consumed
}

// check if name is `tld` itself or ends in `.tld`
export function isTld(name: string, tld: string): boolean {
  return name === tld || name.endsWith(`.${tld}`);
}

// decide which resolution path a name takes
export function classifyName(name: string): NameKind {
  if (isTld(name, ZKEY_TLD) && name !== ZKEY_TLD) return 'zkey';
  if (isTld(name, GNS_TLD)) return 'gns';
  return 'dns';
}

// consume the right-most label of the unresolved prefix, null if nothing is left
export function nextLabel(cursor: NameCursor): string | null {
  if (cursor.position === 0) return null;
  const dot = cursor.name.lastIndexOf('.', cursor.position - 1);
  if (dot === -1) {
    // done, this was the last one
    const label = cursor.name.slice(0, cursor.position);
    cursor.position = 0;
    return label;
  }
  // advance by one label
  const label = cursor.name.slice(dot + 1, cursor.position);
  cursor.position = dot;
  return label;
}

// the part of the name not resolved yet
export function unresolvedPrefix(cursor: NameCursor): string {
  return cursor.name.slice(0, cursor.position);
}

// render a zone key as "<y>.<x>.zkey", each coordinate in base32hex
export function encodeZoneKey(zone: ZoneKey): string {
  const x = toBase32Hex(zone.subarray(0, ZONE_KEY_COORDINATE_LENGTH));
  const y = toBase32Hex(zone.subarray(ZONE_KEY_COORDINATE_LENGTH, ZONE_KEY_LENGTH));
  return `${y}.${x}.${ZKEY_TLD}`;
}

// short form of a zone key for log lines
export function zoneToString(zone: ZoneKey): string {
  return toBase32Hex(zone.subarray(0, ZONE_KEY_COORDINATE_LENGTH)).slice(0, 8);
}

// decode the two coordinate labels of a zkey name, null if either is malformed
export function decodeZoneKey(x: string | null, y: string | null): ZoneKey | null {
  if (x === null || y === null) return null;
  const xBytes = fromBase32Hex(x);
  const yBytes = fromBase32Hex(y);
  if (!xBytes || xBytes.length !== ZONE_KEY_COORDINATE_LENGTH) return null;
  if (!yBytes || yBytes.length !== ZONE_KEY_COORDINATE_LENGTH) return null;
  return Buffer.concat([xBytes, yBytes]);
}

// consume "<y>.<x>.zkey" from the right of the cursor and decode the zone
export function consumeZkey(cursor: NameCursor): ZoneKey | null {
  nextLabel(cursor); // 'zkey'
  const x = nextLabel(cursor);
  const y = nextLabel(cursor);
  return decodeZoneKey(x, y);
}

// check if a name is relative to the zone it was found in ("foo.+")
export function isRelativeName(name: string): boolean {
  return name.length > GNS_RELATIVE_SUFFIX.length && name.endsWith(GNS_RELATIVE_SUFFIX);
}

// strip the relative suffix, "foo.+" => "foo"
export function stripRelativeSuffix(name: string): string {
  return isRelativeName(name) ? name.slice(0, -GNS_RELATIVE_SUFFIX.length) : name;
}

// expand "foo.+" into "foo.<zkey of zone>", other names are returned unchanged
export function translateDotPlus(name: string, zone: ZoneKey): string {
  if (!isRelativeName(name)) return name;
  return `${stripRelativeSuffix(name)}.${encodeZoneKey(zone)}`;
}
