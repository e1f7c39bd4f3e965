import {
  DNS_TYPE_A,
  DNS_TYPE_AAAA,
  FAMILY_IPV4,
  GNS_TYPE_VPN,
  PEER_IDENTITY_LENGTH,
  RECORD_FLAG_NONE,
} from './constants';
import { InvariantError } from './errors';
import type { VpnContext } from './handle';
import { deserializeRecords, serializeRecords } from './packets';
import type { GnsRecord, VpnRedirectRequest } from './types';

// value of a VPN record
export interface VpnRecordValue {
  peer: Buffer; // identity of the peer offering the service
  protocol: number; // IP protocol number, e.g. 6 for TCP
  serviceName: string;
}

// peer identity, then the protocol as u16
const VPN_RECORD_HEADER_LENGTH = PEER_IDENTITY_LENGTH + 2;

// parse VPN record data: peer, protocol, NUL-terminated service name
export function parseVpnRecord(data: Buffer): VpnRecordValue | null {
  // at least the header and the terminating NUL
  if (data.length <= VPN_RECORD_HEADER_LENGTH) return null;
  if (data[data.length - 1] !== 0) return null;
  const serviceName = data.subarray(VPN_RECORD_HEADER_LENGTH, data.length - 1).toString('utf8');
  if (serviceName.includes('\0')) return null;
  return {
    peer: Buffer.from(data.subarray(0, PEER_IDENTITY_LENGTH)),
    protocol: data.readUInt16BE(PEER_IDENTITY_LENGTH),
    serviceName,
  };
}

export function encodeVpnRecord(value: VpnRecordValue): Buffer {
  const header = Buffer.alloc(VPN_RECORD_HEADER_LENGTH);
  value.peer.copy(header, 0, 0, PEER_IDENTITY_LENGTH);
  header.writeUInt16BE(value.protocol, PEER_IDENTITY_LENGTH);
  return Buffer.concat([header, Buffer.from(value.serviceName, 'utf8'), Buffer.from([0])]);
}

// snapshot the whole record set, the allocation may complete long after the caller's buffers are gone
export function createVpnContext(records: readonly GnsRecord[]): VpnContext {
  return {
    recordCount: records.length,
    recordData: serializeRecords(records),
  };
}

// restore the snapshot and replace the first VPN record with the allocated address
export function applyVpnAllocation(
  context: VpnContext,
  family: VpnRedirectRequest['family'],
  address: Buffer,
  expirationTime: number
): GnsRecord[] {
  const records = deserializeRecords(context.recordData, context.recordCount);
  if (!records) {
    throw new InvariantError('VPN context holds a record set that does not deserialize');
  }
  const index = records.findIndex(record => record.type === GNS_TYPE_VPN);
  if (index === -1) {
    throw new InvariantError('VPN context lost the record that triggered the allocation');
  }
  records[index] = {
    type: family === FAMILY_IPV4 ? DNS_TYPE_A : DNS_TYPE_AAAA,
    data: Buffer.from(address),
    expirationTime,
    flags: RECORD_FLAG_NONE,
  };
  return records;
}
