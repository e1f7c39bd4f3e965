import type { GnsError } from './errors';
import type { FAMILY_IPV4, FAMILY_IPV6, FAMILY_UNSPEC } from './constants';

// 64-byte zone public key, x || y
export type ZoneKey = Buffer;

// 64-byte DHT/namestore key derived from a zone key and a label
export type QueryHash = Buffer;

// address family for lookups and allocations
export type AddressFamily = typeof FAMILY_UNSPEC | typeof FAMILY_IPV4 | typeof FAMILY_IPV6;

// a single GNS record, DNS types keep their DNS wire format in data
export interface GnsRecord {
  type: number;
  data: Buffer;
  expirationTime: number; // ms; epoch time, or a duration with RECORD_FLAG_RELATIVE_EXPIRATION
  flags: number;
}

// signed, encrypted record set as stored in the namestore and the DHT
// only expirationTime is read by the resolver, the rest belongs to the namestore
export interface GnsBlock {
  derivedKey: Buffer;
  signature: Buffer;
  expirationTime: number; // ms since epoch
  payload: Buffer;
}

// one record collected during a standard DNS fallback
export interface DnsResult {
  data: Buffer;
  type: number;
  expirationTime: number; // 0 if unknown
}

// what a lookup asks for
export interface GnsLookup {
  zone: ZoneKey; // zone to start in for names ending in .gnu
  type: number; // desired record type
  name: string;
  shortenKey?: Buffer | null; // private key of the shorten zone, null to not shorten
  onlyCached?: boolean; // never go to the DHT
}

// a GNS zone that was authoritative for one label
export interface GnsAuthorityHop {
  kind: 'gns';
  label: string;
  zone: ZoneKey;
}

// a DNS server that is authoritative for the rest of the name
export interface DnsAuthorityHop {
  kind: 'dns';
  label: string; // full DNS name to ask for, not the server name
  name: string; // DNS domain taken from the GNS2DNS record
  address: string; // IP of the DNS server (glue)
}

export type AuthorityHop = GnsAuthorityHop | DnsAuthorityHop;

// a consumed hop, with the zone rendered for display
export type GnsResolutionHop = {
  kind: AuthorityHop['kind'];
  label: string;
  authority: string; // zkey of the zone, or the DNS server address
};

// the outcome of a lookup, delivered exactly once
export interface GnsAnswer {
  name: string; // the name that was asked for
  type: number; // the record type that was asked for
  records: GnsRecord[]; // empty on failure
  error: GnsError | null;
  trace: GnsResolutionHop[]; // authority chain in order of consumption
}

export type LookupCallback = (answer: GnsAnswer) => void;

// where a lookup currently waits
export type ResolverState =
  | 'Scheduled'
  | 'AwaitingNamestore'
  | 'AwaitingDHT'
  | 'AwaitingDNS'
  | 'AwaitingVPN'
  | 'AwaitingStdResolve'
  | 'Done';

//--------------------------------
// collaborator contracts
//--------------------------------

// returned by every asynchronous collaborator call
export interface OperationHandle {
  cancel(): void;
}

// local record storage and block cache
export interface NamestoreClient {
  // look up a block by its query hash, null if there is none
  lookupBlock(query: QueryHash, callback: (block: GnsBlock | null) => void): OperationHandle;
  // store a block from the DHT, error is null on success
  cacheBlock(block: GnsBlock, callback: (error: Error | null) => void): OperationHandle;
  // verify and decrypt a block, null if it is malformed
  decryptBlock(block: GnsBlock, zone: ZoneKey, label: string): GnsRecord[] | null;
  close?(): void;
}

export interface DhtGetOptions {
  replication: number;
}

// may call back more than once, the caller stops the GET after the first usable block
export interface DhtClient {
  getStart(
    query: QueryHash,
    options: DhtGetOptions,
    callback: (block: GnsBlock) => void
  ): OperationHandle;
  close?(): void;
}

export interface DnsServerAddress {
  address: string;
  port: number;
}

// sends a raw DNS query to one server and delivers the raw reply
export interface DnsStub {
  resolve(server: DnsServerAddress, query: Buffer, callback: (response: Buffer) => void): OperationHandle;
  close?(): void;
}

export interface ResolvedAddress {
  address: string;
  family: typeof FAMILY_IPV4 | typeof FAMILY_IPV6;
}

// hostname resolution through the operating system
// calls back once per address, then once with null
export interface StdResolver {
  ipGet(
    hostname: string,
    family: AddressFamily,
    timeout: number,
    callback: (address: ResolvedAddress | null) => void
  ): OperationHandle;
  close?(): void;
}

export interface VpnRedirectRequest {
  family: typeof FAMILY_IPV4 | typeof FAMILY_IPV6;
  protocol: number;
  peer: Buffer;
  serviceHash: Buffer;
  expirationTime: number; // ms since epoch
}

// allocates a local address tunnelled to a peer's service
// family is FAMILY_UNSPEC and address null when the allocation failed
export interface VpnClient {
  redirectToPeer(
    request: VpnRedirectRequest,
    callback: (family: AddressFamily, address: Buffer | null) => void
  ): OperationHandle;
  close?(): void;
}

// best-effort import of short names for zones met during resolution
export interface Shortener {
  start(label: string, zone: ZoneKey, shortenKey: Buffer): void;
}

// collaborators that have a default or may be left out
export interface ResolverServices {
  dnsStub?: DnsStub;
  stdResolver?: StdResolver;
  vpn?: VpnClient;
  shortener?: Shortener;
}
