import * as dnsPacket from 'dns-packet';
import { init, type GnsResolver } from '../src/index';
import type { ResolverConfigInput } from '../src/config';
import { DNS_TYPE_A, DNS_TYPE_AAAA, GNS_TYPE_GNS2DNS, GNS_TYPE_PKEY, GNS_TYPE_VPN, RECORD_FLAG_NONE } from '../src/constants';
import { deserializeRecords, encodeName, serializeRecords } from '../src/packets';
import type {
  AddressFamily,
  DhtClient,
  DhtGetOptions,
  DnsServerAddress,
  DnsStub,
  GnsBlock,
  GnsRecord,
  NamestoreClient,
  OperationHandle,
  QueryHash,
  ResolvedAddress,
  Shortener,
  StdResolver,
  VpnClient,
  VpnRedirectRequest,
  ZoneKey,
} from '../src/types';
import { addressToBytes, deriveQueryHash } from '../src/utils';
import { encodeVpnRecord } from '../src/vpn';

// one hour from now, for records and blocks that must not expire during a test
export const LATER = () => Date.now() + 3_600_000;

// let queued immediates (and the immediates they queue) run
export async function flush(rounds = 10): Promise<void> {
  for (let i = 0; i < rounds; i++) {
    await new Promise<void>(resolve => setImmediate(resolve));
  }
}

// deterministic 64-byte zone key
export function zoneKey(seed: number): ZoneKey {
  return Buffer.alloc(64, seed);
}

export function record(type: number, data: Buffer): GnsRecord {
  return { type, data, expirationTime: LATER(), flags: RECORD_FLAG_NONE };
}

export function addressRecord(address: string): GnsRecord {
  const data = addressToBytes(address);
  if (!data) throw new Error(`not an address: ${address}`);
  return record(data.length === 4 ? DNS_TYPE_A : DNS_TYPE_AAAA, data);
}

export function pkeyRecord(zone: ZoneKey): GnsRecord {
  return record(GNS_TYPE_PKEY, zone);
}

export function gns2dnsRecord(nameserver: string): GnsRecord {
  return record(GNS_TYPE_GNS2DNS, encodeName(nameserver));
}

export function vpnRecord(peerSeed: number, protocol: number, serviceName: string): GnsRecord {
  return record(GNS_TYPE_VPN, encodeVpnRecord({ peer: Buffer.alloc(32, peerSeed), protocol, serviceName }));
}

// block "encryption" for tests: record count, then the serialized records
export function makeBlock(
  zone: ZoneKey,
  label: string,
  records: GnsRecord[],
  expirationTime: number = LATER()
): GnsBlock {
  const count = Buffer.alloc(4);
  count.writeUInt32BE(records.length);
  return {
    derivedKey: deriveQueryHash(zone, label),
    signature: Buffer.alloc(64),
    expirationTime,
    payload: Buffer.concat([count, serializeRecords(records)]),
  };
}

function queueHandle(fn: () => void): OperationHandle {
  let cancelled = false;
  setImmediate(() => {
    if (!cancelled) fn();
  });
  return {
    cancel: () => {
      cancelled = true;
    },
  };
}

//--------------------------------
// namestore
//--------------------------------

export class FakeNamestore implements NamestoreClient {
  readonly blocks = new Map<string, GnsBlock>();
  readonly lookups: QueryHash[] = [];
  readonly cached: GnsBlock[] = [];
  cacheError: Error | null = null;
  cancelledWrites = 0;

  // store records as the authoritative block for a label of a zone
  publish(zone: ZoneKey, label: string, records: GnsRecord[], expirationTime?: number): void {
    const block = makeBlock(zone, label, records, expirationTime);
    this.blocks.set(block.derivedKey.toString('hex'), block);
  }

  // store a block that does not decrypt under its own key
  corrupt(zone: ZoneKey, label: string): void {
    const block = makeBlock(zone, label, []);
    this.blocks.set(block.derivedKey.toString('hex'), { ...block, derivedKey: Buffer.alloc(64) });
  }

  lookupBlock(query: QueryHash, callback: (block: GnsBlock | null) => void): OperationHandle {
    this.lookups.push(query);
    return queueHandle(() => callback(this.blocks.get(query.toString('hex')) ?? null));
  }

  cacheBlock(block: GnsBlock, callback: (error: Error | null) => void): OperationHandle {
    const handle = queueHandle(() => {
      this.cached.push(block);
      if (!this.cacheError) this.blocks.set(block.derivedKey.toString('hex'), block);
      callback(this.cacheError);
    });
    return {
      cancel: () => {
        this.cancelledWrites++;
        handle.cancel();
      },
    };
  }

  decryptBlock(block: GnsBlock, zone: ZoneKey, label: string): GnsRecord[] | null {
    if (!block.derivedKey.equals(deriveQueryHash(zone, label))) return null;
    if (block.payload.length < 4) return null;
    return deserializeRecords(block.payload.subarray(4), block.payload.readUInt32BE(0));
  }
}

//--------------------------------
// DHT
//--------------------------------

interface DhtGet {
  query: QueryHash;
  options: DhtGetOptions;
  callback: (block: GnsBlock) => void;
  stopped: boolean;
}

// answers from its blocks, GETs for unknown keys stay open until stopped
export class FakeDht implements DhtClient {
  readonly blocks = new Map<string, GnsBlock>();
  readonly gets: DhtGet[] = [];
  stopped = 0;
  // deliver known blocks before getStart returns
  synchronous = false;

  publish(zone: ZoneKey, label: string, records: GnsRecord[], expirationTime?: number): void {
    const block = makeBlock(zone, label, records, expirationTime);
    this.blocks.set(block.derivedKey.toString('hex'), block);
  }

  getStart(query: QueryHash, options: DhtGetOptions, callback: (block: GnsBlock) => void): OperationHandle {
    const get: DhtGet = { query, options, callback, stopped: false };
    this.gets.push(get);
    const handle = {
      cancel: () => {
        if (get.stopped) return;
        get.stopped = true;
        this.stopped++;
      },
    };
    const block = this.blocks.get(query.toString('hex'));
    if (block && this.synchronous) {
      callback(block);
    } else if (block) {
      setImmediate(() => {
        if (!get.stopped) callback(block);
      });
    }
    return handle;
  }

  get open(): number {
    return this.gets.filter(get => !get.stopped).length;
  }
}

//--------------------------------
// DNS
//--------------------------------

export interface DnsRequest {
  server: DnsServerAddress;
  packet: dnsPacket.DecodedPacket;
}

// answers every query through a handler, null leaves the query unanswered
export class FakeDnsStub implements DnsStub {
  readonly requests: DnsRequest[] = [];
  cancelled = 0;
  closed = false;

  constructor(private handler: (request: DnsRequest) => Buffer | null = () => null) {}

  respondWith(handler: (request: DnsRequest) => Buffer | null): void {
    this.handler = handler;
  }

  resolve(server: DnsServerAddress, query: Buffer, callback: (response: Buffer) => void): OperationHandle {
    const request = { server, packet: dnsPacket.decode(query) };
    this.requests.push(request);
    const response = this.handler(request);
    const handle = response ? queueHandle(() => callback(response)) : { cancel: () => undefined };
    return {
      cancel: () => {
        this.cancelled++;
        handle.cancel();
      },
    };
  }

  close(): void {
    this.closed = true;
  }
}

// build a reply to a decoded query
export function dnsReply(query: dnsPacket.DecodedPacket, answers: dnsPacket.Answer[]): Buffer {
  return dnsPacket.encode({
    type: 'response',
    id: query.id,
    flags: dnsPacket.RECURSION_DESIRED | dnsPacket.RECURSION_AVAILABLE,
    questions: query.questions,
    answers,
  });
}

export class FakeStdResolver implements StdResolver {
  readonly hosts = new Map<string, ResolvedAddress[]>();
  readonly calls: { hostname: string; family: AddressFamily; timeout: number }[] = [];
  closed = false;

  ipGet(
    hostname: string,
    family: AddressFamily,
    timeout: number,
    callback: (address: ResolvedAddress | null) => void
  ): OperationHandle {
    this.calls.push({ hostname, family, timeout });
    const addresses = (this.hosts.get(hostname) ?? []).filter(
      address => family === 0 || address.family === family
    );
    return queueHandle(() => {
      for (const address of addresses) callback(address);
      callback(null);
    });
  }

  close(): void {
    this.closed = true;
  }
}

//--------------------------------
// VPN and shortening
//--------------------------------

export class FakeVpn implements VpnClient {
  readonly requests: VpnRedirectRequest[] = [];
  allocation: { family: AddressFamily; address: Buffer | null } = {
    family: 4,
    address: Buffer.from([10, 1, 2, 3]),
  };
  // false leaves every request unanswered
  respond = true;
  cancelled = 0;
  closed = false;

  redirectToPeer(
    request: VpnRedirectRequest,
    callback: (family: AddressFamily, address: Buffer | null) => void
  ): OperationHandle {
    this.requests.push(request);
    const { family, address } = this.allocation;
    const handle = this.respond ? queueHandle(() => callback(family, address)) : { cancel: () => undefined };
    return {
      cancel: () => {
        this.cancelled++;
        handle.cancel();
      },
    };
  }

  close(): void {
    this.closed = true;
  }
}

export class FakeShortener implements Shortener {
  readonly calls: { label: string; zone: ZoneKey; shortenKey: Buffer }[] = [];

  start(label: string, zone: ZoneKey, shortenKey: Buffer): void {
    this.calls.push({ label, zone, shortenKey });
  }
}

//--------------------------------
// resolver
//--------------------------------

export interface TestResolver {
  resolver: GnsResolver;
  namestore: FakeNamestore;
  dht: FakeDht;
  dns: FakeDnsStub;
  std: FakeStdResolver;
  vpn: FakeVpn;
  shortener: FakeShortener;
}

// a resolver wired to fakes, quiet unless a test asks for logs
export function createTestResolver(
  config: ResolverConfigInput = {},
  maxBackgroundDhtQueries?: number,
  options: { withVpn?: boolean } = {}
): TestResolver {
  const namestore = new FakeNamestore();
  const dht = new FakeDht();
  const dns = new FakeDnsStub();
  const std = new FakeStdResolver();
  const vpn = new FakeVpn();
  const shortener = new FakeShortener();
  const resolver = init(namestore, dht, { logLevel: 'silent', ...config }, maxBackgroundDhtQueries, {
    dnsStub: dns,
    stdResolver: std,
    vpn: options.withVpn === false ? undefined : vpn,
    shortener,
  });
  return { resolver, namestore, dht, dns, std, vpn, shortener };
}
