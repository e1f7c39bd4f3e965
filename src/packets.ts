import * as dnsPacket from 'dns-packet';
import type { Answer } from 'dns-packet';
import {
  DNS_FLAG_RECURSION_DESIRED,
  DNS_FLAG_RESPONSE,
  DNS_HEADER_LENGTH,
  DNS_TYPE_A,
  DNS_TYPE_AAAA,
  DNS_TYPE_CNAME,
  DNS_TYPE_MX,
  DNS_TYPE_NAMES,
  DNS_TYPE_NS,
  DNS_TYPE_PTR,
  DNS_TYPE_SOA,
  DNS_TYPE_SRV,
  IPV4_ADDRESS_LENGTH,
  IPV6_ADDRESS_LENGTH,
  RECORD_FLAG_NONE,
} from './constants';
import { MalformedResponseError } from './errors';
import type { GnsRecord } from './types';
import { addressToBytes, sameDnsName } from './utils';

// a DNS type that can be put on the wire, e.g. 'A'
export type DnsTypeName = (typeof DNS_TYPE_NAMES)[keyof typeof DNS_TYPE_NAMES];

// structured record values, as found in record data
export interface SoaValue {
  mname: string;
  rname: string;
  serial: number;
  refresh: number;
  retry: number;
  expire: number;
  minimum: number;
}

export interface MxValue {
  preference: number;
  exchange: string;
}

export interface SrvValue {
  priority: number;
  weight: number;
  port: number;
  target: string;
}

// offset of the record data in a packet holding one answer owned by the root name
// header, root name (1), type (2), class (2), ttl (4), rdlength (2)
const SINGLE_ANSWER_RDATA_OFFSET = DNS_HEADER_LENGTH + 1 + 2 + 2 + 4 + 2;

// size of one record header in a serialized record set
// expiration (8), data size (4), type (4), flags (4)
const SERIALIZED_RECORD_HEADER_LENGTH = 8 + 4 + 4 + 4;

const DNS_TYPE_NAME_BY_CODE: ReadonlyMap<number, DnsTypeName> = new Map(
  Object.entries(DNS_TYPE_NAMES).map(([code, name]): [number, DnsTypeName] => [Number(code), name])
);

// dns-packet name for a numeric type, null if it cannot be asked over DNS
export function getDnsTypeName(type: number): DnsTypeName | null {
  return DNS_TYPE_NAME_BY_CODE.get(type) ?? null;
}

//--------------------------------
// record data codec
//--------------------------------

// encode one answer and cut its record data out of the packet
// dns-packet never compresses names, so the data is position independent
function encodeRecordData(answer: Answer): Buffer {
  const packet = dnsPacket.encode({
    type: 'response',
    id: 0,
    flags: DNS_FLAG_RESPONSE,
    questions: [],
    answers: [answer],
    authorities: [],
    additionals: [],
  });
  const length = packet.readUInt16BE(SINGLE_ANSWER_RDATA_OFFSET - 2);
  return Buffer.from(packet.subarray(SINGLE_ANSWER_RDATA_OFFSET, SINGLE_ANSWER_RDATA_OFFSET + length));
}

// wrap record data into a one-answer packet and let dns-packet parse it
// null if the data does not parse, or does not re-encode to exactly the same bytes
function decodeRecordData(type: number, data: Buffer): Answer | null {
  if (data.length > 0xffff) return null;
  const packet = Buffer.alloc(SINGLE_ANSWER_RDATA_OFFSET + data.length);
  packet.writeUInt16BE(DNS_FLAG_RESPONSE, 2); // flags
  packet.writeUInt16BE(1, 6); // one answer
  // root owner name is the zero byte at DNS_HEADER_LENGTH
  packet.writeUInt16BE(type, DNS_HEADER_LENGTH + 1);
  packet.writeUInt16BE(1, DNS_HEADER_LENGTH + 3); // class IN
  packet.writeUInt16BE(data.length, SINGLE_ANSWER_RDATA_OFFSET - 2);
  data.copy(packet, SINGLE_ANSWER_RDATA_OFFSET);

  let answer: Answer | undefined;
  try {
    answer = dnsPacket.decode(packet).answers?.[0];
  } catch {
    return null;
  }
  if (!answer) return null;

  // reject trailing garbage and truncated fields
  try {
    if (!encodeRecordData(answer).equals(data)) return null;
  } catch {
    return null;
  }
  return answer;
}

// encode a domain name as record data (CNAME, NS, PTR, GNS2DNS)
export function encodeName(name: string): Buffer {
  return encodeRecordData({ type: 'CNAME', name: '.', data: name });
}

// decode a domain name from record data, null if malformed
export function decodeName(data: Buffer): string | null {
  const answer = decodeRecordData(DNS_TYPE_CNAME, data);
  return answer?.type === 'CNAME' ? answer.data : null;
}

export function encodeSoa(soa: SoaValue): Buffer {
  return encodeRecordData({ type: 'SOA', name: '.', data: { ...soa } });
}

export function decodeSoa(data: Buffer): SoaValue | null {
  const answer = decodeRecordData(DNS_TYPE_SOA, data);
  if (answer?.type !== 'SOA') return null;
  return {
    mname: answer.data.mname,
    rname: answer.data.rname,
    serial: answer.data.serial ?? 0,
    refresh: answer.data.refresh ?? 0,
    retry: answer.data.retry ?? 0,
    expire: answer.data.expire ?? 0,
    minimum: answer.data.minimum ?? 0,
  };
}

export function encodeMx(mx: MxValue): Buffer {
  return encodeRecordData({ type: 'MX', name: '.', data: { ...mx } });
}

export function decodeMx(data: Buffer): MxValue | null {
  const answer = decodeRecordData(DNS_TYPE_MX, data);
  if (answer?.type !== 'MX') return null;
  return { preference: answer.data.preference ?? 0, exchange: answer.data.exchange };
}

export function encodeSrv(srv: SrvValue): Buffer {
  return encodeRecordData({ type: 'SRV', name: '.', data: { ...srv } });
}

export function decodeSrv(data: Buffer): SrvValue | null {
  const answer = decodeRecordData(DNS_TYPE_SRV, data);
  if (answer?.type !== 'SRV') return null;
  return {
    priority: answer.data.priority ?? 0,
    weight: answer.data.weight ?? 0,
    port: answer.data.port,
    target: answer.data.target,
  };
}

//--------------------------------
// record sets
//--------------------------------

// serialize a record set into one buffer
// per record: expiration u64, data size u32, type u32, flags u32, then the data
export function serializeRecords(records: readonly GnsRecord[]): Buffer {
  const size = records.reduce((sum, r) => sum + SERIALIZED_RECORD_HEADER_LENGTH + r.data.length, 0);
  const buffer = Buffer.alloc(size);
  let offset = 0;
  for (const record of records) {
    buffer.writeBigUInt64BE(BigInt(Math.max(0, Math.trunc(record.expirationTime))), offset);
    buffer.writeUInt32BE(record.data.length, offset + 8);
    buffer.writeUInt32BE(record.type, offset + 12);
    buffer.writeUInt32BE(record.flags, offset + 16);
    offset += SERIALIZED_RECORD_HEADER_LENGTH;
    record.data.copy(buffer, offset);
    offset += record.data.length;
  }
  return buffer;
}

// inverse of serializeRecords, null unless exactly count records fill the buffer
export function deserializeRecords(buffer: Buffer, count: number): GnsRecord[] | null {
  const records: GnsRecord[] = [];
  let offset = 0;
  for (let i = 0; i < count; i++) {
    if (offset + SERIALIZED_RECORD_HEADER_LENGTH > buffer.length) return null;
    const expirationTime = Number(buffer.readBigUInt64BE(offset));
    const dataSize = buffer.readUInt32BE(offset + 8);
    const type = buffer.readUInt32BE(offset + 12);
    const flags = buffer.readUInt32BE(offset + 16);
    offset += SERIALIZED_RECORD_HEADER_LENGTH;
    if (offset + dataSize > buffer.length) return null;
    // copy so the records do not alias the snapshot
    const data = Buffer.from(buffer.subarray(offset, offset + dataSize));
    offset += dataSize;
    records.push({ type, data, expirationTime, flags });
  }
  return offset === buffer.length ? records : null;
}

//--------------------------------
// DNS queries and replies
//--------------------------------

// create a recursive DNS query for one name and type
export function createDnsQuery(name: string, type: DnsTypeName, id: number): Buffer {
  return dnsPacket.encode({
    type: 'query',
    id,
    flags: DNS_FLAG_RECURSION_DESIRED,
    questions: [{ type, name, class: 'IN' }],
  });
}

// a decoded reply: either a CNAME to follow, or the records owned by the asked name
export type DnsReply =
  | { kind: 'cname'; target: string }
  | { kind: 'records'; records: GnsRecord[]; skipped: Answer[] };

// interpret a raw DNS reply for the name we asked about
// the CNAME redirect only applies when the caller does not want the CNAME itself
export function parseDnsReply(
  response: Buffer,
  owner: string,
  followCname: boolean,
  now: number = Date.now()
): DnsReply {
  let packet: dnsPacket.DecodedPacket;
  try {
    packet = dnsPacket.decode(response);
  } catch (error) {
    throw new MalformedResponseError(`Failed to parse DNS response: ${String(error)}`);
  }

  const answers = packet.answers ?? [];
  const first = answers[0];
  if (followCname && first?.type === 'CNAME') {
    return { kind: 'cname', target: first.data };
  }

  // TODO: follow DNAME answers like CNAME ones once the post-processor can splice them
  const records: GnsRecord[] = [];
  const skipped: Answer[] = [];
  const candidates = [...answers, ...(packet.authorities ?? []), ...(packet.additionals ?? [])];
  for (const answer of candidates) {
    // drop records for other owners (glue, referrals, ...)
    if (!sameDnsName(answer.name, owner)) continue;
    const record = dnsAnswerToRecord(answer, now);
    if (record) {
      records.push(record);
    } else {
      skipped.push(answer);
    }
  }
  return { kind: 'records', records, skipped };
}

// convert a parsed DNS answer into a GNS record, null for unsupported or malformed answers
export function dnsAnswerToRecord(answer: Answer, now: number = Date.now()): GnsRecord | null {
  const ttl = 'ttl' in answer && answer.ttl !== undefined ? answer.ttl : 0;
  const base = { expirationTime: now + ttl * 1000, flags: RECORD_FLAG_NONE };
  switch (answer.type) {
    case 'A': {
      const data = addressToBytes(answer.data);
      if (!data || data.length !== IPV4_ADDRESS_LENGTH) return null;
      return { ...base, type: DNS_TYPE_A, data };
    }
    case 'AAAA': {
      const data = addressToBytes(answer.data);
      if (!data || data.length !== IPV6_ADDRESS_LENGTH) return null;
      return { ...base, type: DNS_TYPE_AAAA, data };
    }
    case 'CNAME':
      return { ...base, type: DNS_TYPE_CNAME, data: encodeName(answer.data) };
    case 'PTR':
      return { ...base, type: DNS_TYPE_PTR, data: encodeName(answer.data) };
    case 'NS':
      return { ...base, type: DNS_TYPE_NS, data: encodeName(answer.data) };
    case 'SOA':
      return {
        ...base,
        type: DNS_TYPE_SOA,
        data: encodeSoa({
          mname: answer.data.mname,
          rname: answer.data.rname,
          serial: answer.data.serial ?? 0,
          refresh: answer.data.refresh ?? 0,
          retry: answer.data.retry ?? 0,
          expire: answer.data.expire ?? 0,
          minimum: answer.data.minimum ?? 0,
        }),
      };
    case 'MX':
      return {
        ...base,
        type: DNS_TYPE_MX,
        data: encodeMx({ preference: answer.data.preference ?? 0, exchange: answer.data.exchange }),
      };
    case 'SRV':
      return {
        ...base,
        type: DNS_TYPE_SRV,
        data: encodeSrv({
          priority: answer.data.priority ?? 0,
          weight: answer.data.weight ?? 0,
          port: answer.data.port,
          target: answer.data.target,
        }),
      };
    default:
      return null;
  }
}
