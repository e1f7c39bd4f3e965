import * as dnsPacket from 'dns-packet';
import {
  DNS_FLAG_RECURSION_DESIRED,
  DNS_TYPE_A,
  DNS_TYPE_CNAME,
  DNS_TYPE_NS,
  RECORD_FLAG_NONE,
  RECORD_FLAG_RELATIVE_EXPIRATION,
} from '../src/constants';
import { MalformedResponseError } from '../src/errors';
import {
  createDnsQuery,
  decodeMx,
  decodeName,
  decodeSoa,
  decodeSrv,
  deserializeRecords,
  dnsAnswerToRecord,
  encodeMx,
  encodeName,
  encodeSoa,
  encodeSrv,
  getDnsTypeName,
  parseDnsReply,
  serializeRecords,
} from '../src/packets';
import type { GnsRecord } from '../src/types';

describe('Packets', () => {
  describe('record data', () => {
    test('should encode names as uncompressed labels', () => {
      expect(encodeName('a.bc')).toEqual(Buffer.from([1, 97, 2, 98, 99, 0]));
      expect(decodeName(Buffer.from([1, 97, 2, 98, 99, 0]))).toBe('a.bc');
    });

    test('should reject names with trailing bytes', () => {
      expect(decodeName(Buffer.from([1, 97, 0, 7]))).toBeNull();
    });

    test('should reject truncated names', () => {
      expect(decodeName(Buffer.from([5, 97]))).toBeNull();
    });

    test('should encode and decode SOA values', () => {
      const soa = {
        mname: 'ns.example.com',
        rname: 'hostmaster.example.com',
        serial: 2024010101,
        refresh: 3600,
        retry: 600,
        expire: 86400,
        minimum: 300,
      };
      expect(decodeSoa(encodeSoa(soa))).toEqual(soa);
    });

    test('should encode MX values with the preference first', () => {
      const data = encodeMx({ preference: 10, exchange: 'mx.example.com' });
      expect(data.readUInt16BE(0)).toBe(10);
      expect(decodeMx(data)).toEqual({ preference: 10, exchange: 'mx.example.com' });
    });

    test('should encode SRV values', () => {
      const srv = { priority: 1, weight: 5, port: 5222, target: 'xmpp.example.com' };
      const data = encodeSrv(srv);
      expect(data.readUInt16BE(4)).toBe(5222);
      expect(decodeSrv(data)).toEqual(srv);
    });

    test('should not decode data of one type as another', () => {
      expect(decodeMx(encodeName('example.com'))).toBeNull();
    });

    test('getDnsTypeName should only name DNS types', () => {
      expect(getDnsTypeName(DNS_TYPE_A)).toBe('A');
      expect(getDnsTypeName(DNS_TYPE_CNAME)).toBe('CNAME');
      expect(getDnsTypeName(65536)).toBeNull();
    });
  });

  describe('record sets', () => {
    const records: GnsRecord[] = [
      { type: DNS_TYPE_A, data: Buffer.from([1, 2, 3, 4]), expirationTime: 1000, flags: RECORD_FLAG_NONE },
      { type: DNS_TYPE_CNAME, data: encodeName('a.b'), expirationTime: 0, flags: RECORD_FLAG_RELATIVE_EXPIRATION },
    ];

    test('should lay out each record header before its data', () => {
      const buffer = serializeRecords(records.slice(0, 1));
      expect(buffer).toHaveLength(24);
      expect(buffer.readBigUInt64BE(0)).toBe(1000n);
      expect(buffer.readUInt32BE(8)).toBe(4);
      expect(buffer.readUInt32BE(12)).toBe(DNS_TYPE_A);
      expect(buffer.readUInt32BE(16)).toBe(RECORD_FLAG_NONE);
      expect(buffer.subarray(20)).toEqual(Buffer.from([1, 2, 3, 4]));
    });

    test('should restore a serialized set', () => {
      expect(deserializeRecords(serializeRecords(records), 2)).toEqual(records);
    });

    test('should reject a wrong count or trailing bytes', () => {
      const buffer = serializeRecords(records);
      expect(deserializeRecords(buffer, 3)).toBeNull();
      expect(deserializeRecords(buffer, 1)).toBeNull();
      expect(deserializeRecords(Buffer.concat([buffer, Buffer.from([0])]), 2)).toBeNull();
    });

    test('should handle the empty set', () => {
      expect(serializeRecords([])).toHaveLength(0);
      expect(deserializeRecords(Buffer.alloc(0), 0)).toEqual([]);
    });
  });

  describe('DNS messages', () => {
    test('should create a recursive query', () => {
      const query = dnsPacket.decode(createDnsQuery('example.com', 'AAAA', 0x1234));
      expect(query.id).toBe(0x1234);
      expect((query.flags ?? 0) & DNS_FLAG_RECURSION_DESIRED).toBe(DNS_FLAG_RECURSION_DESIRED);
      expect(query.questions).toEqual([{ name: 'example.com', type: 'AAAA', class: 'IN' }]);
    });

    function response(packet: Partial<dnsPacket.Packet>): Buffer {
      return dnsPacket.encode({ type: 'response', id: 1, flags: dnsPacket.RECURSION_DESIRED, ...packet });
    }

    test('should collect records owned by the asked name from every section', () => {
      const reply = parseDnsReply(
        response({
          answers: [
            { type: 'A', name: 'example.com', ttl: 60, data: '192.0.2.1' },
            { type: 'A', name: 'other.example.com', ttl: 60, data: '192.0.2.2' },
          ],
          authorities: [{ type: 'NS', name: 'Example.COM', ttl: 120, data: 'ns.example.com' }],
          additionals: [{ type: 'TXT', name: 'example.com', ttl: 60, data: 'hello' }],
        }),
        'example.com.',
        true,
        1000
      );

      expect(reply.kind).toBe('records');
      if (reply.kind !== 'records') return;
      expect(reply.records).toEqual([
        { type: DNS_TYPE_A, data: Buffer.from([192, 0, 2, 1]), expirationTime: 61_000, flags: RECORD_FLAG_NONE },
        { type: DNS_TYPE_NS, data: encodeName('ns.example.com'), expirationTime: 121_000, flags: RECORD_FLAG_NONE },
      ]);
      expect(reply.skipped.map(answer => answer.type)).toEqual(['TXT']);
    });

    test('should report a leading CNAME when asked to follow it', () => {
      const packet = response({
        answers: [{ type: 'CNAME', name: 'www.example.com', ttl: 60, data: 'edge.example.net' }],
      });

      expect(parseDnsReply(packet, 'www.example.com', true)).toEqual({ kind: 'cname', target: 'edge.example.net' });

      const reply = parseDnsReply(packet, 'www.example.com', false, 0);
      expect(reply).toEqual({
        kind: 'records',
        records: [
          { type: DNS_TYPE_CNAME, data: encodeName('edge.example.net'), expirationTime: 60_000, flags: RECORD_FLAG_NONE },
        ],
        skipped: [],
      });
    });

    test('should throw on undecodable replies', () => {
      expect(() => parseDnsReply(Buffer.from([0, 1, 2]), 'example.com', true)).toThrow(MalformedResponseError);
    });

    test('should convert AAAA answers to raw addresses', () => {
      const record = dnsAnswerToRecord({ type: 'AAAA', name: 'example.com', ttl: 1, data: '2001:db8::1' }, 0);
      expect(record?.data).toHaveLength(16);
      expect(record?.data[15]).toBe(1);
      expect(record?.expirationTime).toBe(1000);
    });
  });
});
