import { randomInt } from 'crypto';
import { DhtLookupHeap } from './caches/dht-heap';
import { parseResolverConfig, type ResolverConfig, type ResolverConfigInput } from './config';
import {
  DNS_PORT,
  DNS_TYPE_A,
  DNS_TYPE_AAAA,
  DNS_TYPE_CNAME,
  FAMILY_IPV4,
  FAMILY_IPV6,
  FAMILY_UNSPEC,
  GNS_MASTERZONE_LABEL,
  IPV4_ADDRESS_LENGTH,
  IPV6_ADDRESS_LENGTH,
  RECORD_FLAG_NONE,
  RECORD_FLAG_RELATIVE_EXPIRATION,
  ZONE_KEY_LENGTH,
} from './constants';
import {
  AbortError,
  BackgroundQueryLimitError,
  CacheMissError,
  MalformedBlockError,
  MalformedNameError,
  MalformedRecordError,
  NoRecordsError,
  RecursionLimitError,
  ServiceError,
  ShutdownError,
  TimeoutError,
  toGnsError,
  type GnsError,
} from './errors';
import { ResolverHandle, type PendingOperation, type VpnContext } from './handle';
import { createLogger, type Logger } from './logger';
import { classifyName, consumeZkey, nextLabel, zoneToString } from './names';
import { createDnsQuery, getDnsTypeName, parseDnsReply, type DnsReply } from './packets';
import { handleGnsResult, type ResultProcessorHost } from './processor';
import { SystemResolver } from './transports/system';
import { UdpDnsStub } from './transports/udp';
import type {
  AddressFamily,
  DhtClient,
  DnsAuthorityHop,
  DnsStub,
  GnsAnswer,
  GnsAuthorityHop,
  GnsBlock,
  GnsLookup,
  GnsRecord,
  LookupCallback,
  NamestoreClient,
  OperationHandle,
  QueryHash,
  ResolvedAddress,
  ResolverServices,
  Shortener,
  StdResolver,
  VpnClient,
  ZoneKey,
} from './types';
import { addressToBytes, deriveQueryHash, hashServiceName, normalizeName } from './utils';
import { applyVpnAllocation, createVpnContext, parseVpnRecord } from './vpn';

// placeholder until a collaborator returned the real handle
const PENDING_HANDLE: OperationHandle = { cancel: () => undefined };

// a cache write that may still be cancelled
interface CacheWrite {
  handle: OperationHandle;
  settled: boolean;
}

// resolves names in GNS zones, delegating to DNS where the zones say so
// every step runs from the event loop, a lookup waits on at most one operation at a time
export class GnsResolver implements ResultProcessorHost {
  readonly config: ResolverConfig;
  readonly logger: Logger;

  private readonly namestore: NamestoreClient;
  private readonly dht: DhtClient;
  private readonly dnsStub: DnsStub;
  private readonly stdResolver: StdResolver;
  private readonly vpn: VpnClient | null;
  private readonly shortener: Shortener | null;

  // lookups that have not delivered their answer yet
  private readonly active = new Set<ResolverHandle>();

  // lookups waiting on the DHT, oldest first
  private readonly dhtHeap = new DhtLookupHeap<ResolverHandle>();

  // namestore writes of blocks found in the DHT
  private readonly cacheWrites = new Set<CacheWrite>();

  private closed = false;

  constructor(
    namestore: NamestoreClient,
    dht: DhtClient,
    config: ResolverConfig,
    services: ResolverServices = {}
  ) {
    this.config = config;
    this.logger = createLogger('gns-resolver', { level: config.logLevel });
    this.namestore = namestore;
    this.dht = dht;
    this.dnsStub = services.dnsStub ?? new UdpDnsStub({ logger: this.logger });
    this.stdResolver = services.stdResolver ?? new SystemResolver({ logger: this.logger });
    this.vpn = services.vpn ?? null;
    this.shortener = services.shortener ?? null;
  }

  // number of lookups that have not completed
  get activeLookups(): number {
    return this.active.size;
  }

  // number of lookups waiting on the DHT
  get backgroundQueries(): number {
    return this.dhtHeap.size();
  }

  // number of block cache writes still in flight
  get pendingCacheWrites(): number {
    return this.cacheWrites.size;
  }

  // start a lookup, the callback runs exactly once unless the lookup is cancelled
  public lookup(lookup: GnsLookup, callback: LookupCallback): ResolverHandle {
    const name = normalizeName(lookup.name);
    const rh = new ResolverHandle(
      name,
      lookup.type,
      Buffer.from(lookup.zone),
      lookup.shortenKey ? Buffer.from(lookup.shortenKey) : null,
      lookup.onlyCached ?? false,
      callback
    );
    this.active.add(rh);
    this.logger.debug(lookup.shortenKey ? 'Starting lookup with shortening' : 'Starting lookup', {
      name,
      type: lookup.type,
    });

    if (this.closed) {
      this.schedule(rh, () => this.fail(rh, new ShutdownError('Resolver has been shut down')));
      return rh;
    }
    this.restart(rh);
    return rh;
  }

  // promise wrapper around lookup(), aborting cancels the lookup
  public resolve(lookup: GnsLookup, signal?: AbortSignal): Promise<GnsAnswer> {
    return new Promise<GnsAnswer>(resolve => {
      const aborted = (): GnsAnswer => ({
        name: normalizeName(lookup.name),
        type: lookup.type,
        records: [],
        error: new AbortError('Lookup was aborted'),
        trace: [],
      });

      // check if external signal is already aborted
      if (signal?.aborted) {
        resolve(aborted());
        return;
      }

      const onAbort = () => {
        this.cancel(rh);
        resolve(aborted());
      };
      const rh = this.lookup(lookup, answer => {
        signal?.removeEventListener('abort', onAbort);
        resolve(answer);
      });
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  // stop a lookup without calling back, cancelling twice is a no-op
  public cancel(rh: ResolverHandle): void {
    if (rh.finished) return;
    this.logger.debug('Cancelling lookup', { name: rh.query });
    this.teardown(rh);
  }

  // fail every active lookup and release the shared connections
  public done(): void {
    this.closed = true;
    for (const rh of [...this.active]) {
      this.fail(rh, new ShutdownError('Resolver is shutting down'));
    }
    for (const write of [...this.cacheWrites]) {
      write.handle.cancel();
    }
    this.cacheWrites.clear();
    this.dhtHeap.clear();
    this.dnsStub.close?.();
    this.stdResolver.close?.();
    this.vpn?.close?.();
  }

  //--------------------------------
  // completion
  //--------------------------------

  public fail(rh: ResolverHandle, error: GnsError): void {
    if (rh.finished) return;
    this.logger.warn(error.message, { name: rh.query, error: error.name, code: error.code });
    this.deliver(rh, [], error);
  }

  public complete(rh: ResolverHandle, records: GnsRecord[]): void {
    if (rh.finished) return;
    if (records.length === 0) {
      this.fail(rh, new NoRecordsError(`No records found for '${rh.query}'`));
      return;
    }
    this.logger.debug('Lookup completed', { name: rh.query, records: records.length });
    this.deliver(rh, records, null);
  }

  // release everything the lookup holds, then call back
  private deliver(rh: ResolverHandle, records: GnsRecord[], error: GnsError | null): void {
    const trace = rh.trace();
    this.teardown(rh);
    rh.callback({ name: rh.query, type: rh.recordType, records, error, trace });
  }

  private teardown(rh: ResolverHandle): void {
    if (rh.finished) return;
    rh.finished = true;
    this.active.delete(rh);
    rh.cancelTask();
    const pending = rh.takePending();
    if (pending.kind === 'dht') {
      this.dhtHeap.remove(pending.heapNode);
    }
    if (pending.kind !== 'none') {
      pending.handle.cancel();
    }
    rh.chain = [];
    rh.dnsResults = [];
  }

  //--------------------------------
  // scheduling
  //--------------------------------

  // run fn on the next turn of the event loop, replacing any scheduled task
  private schedule(rh: ResolverHandle, fn: () => void): void {
    rh.cancelTask();
    const immediate = setImmediate(() => {
      rh.task = null;
      fn();
    });
    rh.task = () => clearImmediate(immediate);
  }

  // run fn unless the lookup moves on within ms
  private armTimeout(rh: ResolverHandle, ms: number, fn: () => void): void {
    rh.cancelTask();
    const timer = setTimeout(() => {
      rh.task = null;
      fn();
    }, ms);
    rh.task = () => clearTimeout(timer);
  }

  // wait on a collaborator; callbacks for anything but the current operation are dropped
  private track(
    rh: ResolverHandle,
    operation: Exclude<PendingOperation, { kind: 'none' }>,
    start: (isCurrent: () => boolean) => OperationHandle
  ): void {
    rh.pending = operation;
    const handle = start(() => rh.pending === operation && !rh.finished);
    // a callback that ran inside start() has already moved the lookup on
    if (rh.pending !== operation) {
      handle.cancel();
      return;
    }
    operation.handle = handle;
  }

  public recurse(rh: ResolverHandle): void {
    this.schedule(rh, () => this.step(rh));
  }

  // look at the name and pick the first hop
  public restart(rh: ResolverHandle): void {
    const kind = classifyName(rh.name);
    if (kind === 'dns') {
      this.lookupStdDns(rh);
      return;
    }

    if (kind === 'zkey') {
      const zone = consumeZkey(rh);
      if (!zone) {
        this.schedule(rh, () => this.fail(rh, new MalformedNameError(`Malformed zkey name '${rh.name}'`)));
        return;
      }
      rh.authorityZone = zone;
    } else {
      nextLabel(rh); // the TLD
      if (rh.authorityZone.length !== ZONE_KEY_LENGTH) {
        this.schedule(rh, () =>
          this.fail(rh, new MalformedNameError(`Zone key has ${rh.authorityZone.length} bytes`))
        );
        return;
      }
    }

    const label = nextLabel(rh) ?? GNS_MASTERZONE_LABEL;
    rh.chain.push({ kind: 'gns', label, zone: rh.authorityZone });
    this.recurse(rh);
  }

  // resolve the tail of the authority chain
  private step(rh: ResolverHandle): void {
    if (rh.loopLimiter++ > this.config.maxRecursion) {
      this.fail(rh, new RecursionLimitError(`Encountered unbounded recursion resolving '${rh.query}'`));
      return;
    }
    const tail = rh.tail;
    if (!tail) {
      this.fail(rh, new MalformedNameError(`Nothing left to resolve in '${rh.name}'`));
      return;
    }
    if (tail.kind === 'gns') {
      this.lookupNamestore(rh, tail);
    } else {
      this.lookupDns(rh, tail);
    }
  }

  public shorten(rh: ResolverHandle, label: string, zone: ZoneKey): void {
    if (!rh.shortenKey || !this.shortener) return;
    this.shortener.start(label, zone, rh.shortenKey);
  }

  //--------------------------------
  // GNS hops
  //--------------------------------

  private lookupNamestore(rh: ResolverHandle, hop: GnsAuthorityHop): void {
    const query = deriveQueryHash(hop.zone, hop.label);
    this.logger.debug('Starting GNS resolution', { label: hop.label, zone: zoneToString(hop.zone) });
    this.track(rh, { kind: 'namestore', handle: PENDING_HANDLE }, isCurrent =>
      this.namestore.lookupBlock(query, block => {
        if (!isCurrent()) return;
        rh.takePending();
        this.handleNamestoreBlock(rh, hop, query, block);
      })
    );
  }

  private handleNamestoreBlock(
    rh: ResolverHandle,
    hop: GnsAuthorityHop,
    query: QueryHash,
    block: GnsBlock | null
  ): void {
    if (!block || block.expirationTime <= Date.now()) {
      if (rh.onlyCached) {
        this.fail(
          rh,
          new CacheMissError(
            `Resolution failed for '${hop.label}' in zone ${zoneToString(hop.zone)} (DHT lookup not permitted)`
          )
        );
        return;
      }
      this.startDhtLookup(rh, hop, query);
      return;
    }

    const records = this.namestore.decryptBlock(block, hop.zone, hop.label);
    if (!records) {
      this.fail(rh, new MalformedBlockError(`Failed to decrypt block for '${hop.label}' from the namestore`));
      return;
    }
    handleGnsResult(this, rh, records);
  }

  private startDhtLookup(rh: ResolverHandle, hop: GnsAuthorityHop, query: QueryHash): void {
    this.logger.debug('Starting DHT lookup', { label: hop.label, zone: zoneToString(hop.zone) });
    const heapNode = this.dhtHeap.insert(rh, Date.now());
    this.armTimeout(rh, this.config.dhtLookupTimeout, () =>
      this.fail(
        rh,
        new TimeoutError(`DHT lookup for '${hop.label}' timed out after ${this.config.dhtLookupTimeout}ms`)
      )
    );
    this.track(rh, { kind: 'dht', handle: PENDING_HANDLE, heapNode }, isCurrent =>
      this.dht.getStart(query, { replication: this.config.dhtReplicationLevel }, block => {
        if (!isCurrent()) return;
        this.handleDhtBlock(rh, hop, block);
      })
    );

    // over capacity, give up on the oldest lookup
    if (this.dhtHeap.size() > this.config.maxBackgroundDhtQueries) {
      const oldest = this.dhtHeap.peek();
      if (oldest) {
        this.fail(oldest, new BackgroundQueryLimitError('Too many background DHT queries, dropping the oldest'));
      }
    }
  }

  private handleDhtBlock(rh: ResolverHandle, hop: GnsAuthorityHop, block: GnsBlock): void {
    // stop the GET, the first block wins
    const pending = rh.takePending();
    if (pending.kind === 'dht') {
      this.dhtHeap.remove(pending.heapNode);
      pending.handle.cancel();
    }
    rh.cancelTask();

    const records = this.namestore.decryptBlock(block, hop.zone, hop.label);
    if (!records) {
      this.fail(rh, new MalformedBlockError(`Failed to decrypt block for '${hop.label}' from the DHT`));
      return;
    }
    this.cacheBlock(block);
    handleGnsResult(this, rh, records);
  }

  // store a block from the DHT, the lookup does not wait for it
  private cacheBlock(block: GnsBlock): void {
    const write: CacheWrite = { handle: PENDING_HANDLE, settled: false };
    write.handle = this.namestore.cacheBlock(block, error => {
      write.settled = true;
      this.cacheWrites.delete(write);
      if (error) {
        this.logger.warn('Failed to cache GNS resolution', { error: error.message });
      }
    });
    if (!write.settled) {
      this.cacheWrites.add(write);
    }
  }

  //--------------------------------
  // VPN records
  //--------------------------------

  public redirectVpn(rh: ResolverHandle, record: GnsRecord, records: GnsRecord[]): void {
    const value = parseVpnRecord(record.data);
    if (!value) {
      this.fail(rh, new MalformedRecordError('VPN record is malformed'));
      return;
    }
    const vpn = this.vpn;
    if (!vpn) {
      this.fail(rh, new ServiceError('No VPN service configured'));
      return;
    }

    const context = createVpnContext(records);
    const family = rh.recordType === DNS_TYPE_A ? FAMILY_IPV4 : FAMILY_IPV6;
    this.logger.debug('Redirecting to VPN peer', { name: rh.query, service: value.serviceName });
    this.track(rh, { kind: 'vpn', handle: PENDING_HANDLE, context }, isCurrent =>
      vpn.redirectToPeer(
        {
          family,
          protocol: value.protocol,
          peer: value.peer,
          serviceHash: hashServiceName(value.serviceName),
          expirationTime: Date.now() + this.config.vpnTimeout,
        },
        (allocatedFamily, address) => {
          if (!isCurrent()) return;
          rh.takePending();
          this.handleVpnAllocation(rh, context, allocatedFamily, address);
        }
      )
    );
  }

  private handleVpnAllocation(
    rh: ResolverHandle,
    context: VpnContext,
    family: AddressFamily,
    address: Buffer | null
  ): void {
    if (family === FAMILY_UNSPEC || !address) {
      this.fail(rh, new ServiceError('VPN allocation failed'));
      return;
    }
    const expected = family === FAMILY_IPV4 ? IPV4_ADDRESS_LENGTH : IPV6_ADDRESS_LENGTH;
    if (address.length !== expected) {
      this.fail(rh, new MalformedRecordError(`VPN allocated an address of ${address.length} bytes`));
      return;
    }
    const records = applyVpnAllocation(context, family, address, Date.now() + this.config.vpnTimeout);
    handleGnsResult(this, rh, records);
  }

  //--------------------------------
  // DNS
  //--------------------------------

  // ask the DNS server a GNS2DNS record delegated to
  private lookupDns(rh: ResolverHandle, hop: DnsAuthorityHop): void {
    const type = getDnsTypeName(rh.recordType);
    if (!type) {
      this.fail(rh, new MalformedRecordError(`Record type ${rh.recordType} cannot be resolved through DNS`));
      return;
    }
    const query = createDnsQuery(hop.label, type, randomInt(0, 0x10000));
    this.logger.debug('Starting DNS lookup', { name: hop.label, nameserver: hop.name, server: hop.address });
    this.armTimeout(rh, this.config.dnsLookupTimeout, () =>
      this.fail(
        rh,
        new TimeoutError(
          `DNS lookup for '${hop.label}' at '${hop.address}' timed out after ${this.config.dnsLookupTimeout}ms`
        )
      )
    );
    this.track(rh, { kind: 'dns', handle: PENDING_HANDLE }, isCurrent =>
      this.dnsStub.resolve({ address: hop.address, port: DNS_PORT }, query, response => {
        if (!isCurrent()) return;
        rh.takePending();
        rh.cancelTask();
        this.handleDnsReply(rh, hop, response);
      })
    );
  }

  private handleDnsReply(rh: ResolverHandle, hop: DnsAuthorityHop, response: Buffer): void {
    let reply: DnsReply;
    try {
      reply = parseDnsReply(response, hop.label, rh.recordType !== DNS_TYPE_CNAME);
    } catch (error) {
      this.fail(rh, toGnsError(error));
      return;
    }

    if (reply.kind === 'cname') {
      this.logger.debug('Following CNAME from DNS', { name: hop.label, target: reply.target });
      rh.name = normalizeName(reply.target);
      rh.position = rh.name.length;
      this.restart(rh);
      return;
    }

    for (const answer of reply.skipped) {
      this.logger.info('Skipping DNS record of unsupported type', { name: answer.name, type: answer.type });
    }
    this.complete(rh, reply.records);
  }

  // names outside GNS go to the system resolver
  private lookupStdDns(rh: ResolverHandle): void {
    const family =
      rh.recordType === DNS_TYPE_A ? FAMILY_IPV4 : rh.recordType === DNS_TYPE_AAAA ? FAMILY_IPV6 : FAMILY_UNSPEC;
    this.logger.debug('Doing standard DNS lookup', { name: rh.name, family });
    this.track(rh, { kind: 'std-resolve', handle: PENDING_HANDLE }, isCurrent =>
      this.stdResolver.ipGet(rh.name, family, this.config.dnsLookupTimeout, address => {
        if (!isCurrent()) return;
        this.handleStdAddress(rh, address);
      })
    );
  }

  private handleStdAddress(rh: ResolverHandle, address: ResolvedAddress | null): void {
    if (address) {
      const data = addressToBytes(address.address);
      if (!data) {
        this.logger.warn('Dropping unparsable address from the system resolver', { address: address.address });
        return;
      }
      rh.dnsResults.push({
        data,
        type: data.length === IPV4_ADDRESS_LENGTH ? DNS_TYPE_A : DNS_TYPE_AAAA,
        expirationTime: 0,
      });
      return;
    }

    // end of the address list
    rh.takePending();
    const records = rh.dnsResults.map(result => ({
      type: result.type,
      data: result.data,
      expirationTime: result.expirationTime,
      flags: result.expirationTime === 0 ? RECORD_FLAG_RELATIVE_EXPIRATION : RECORD_FLAG_NONE,
    }));
    this.complete(rh, records);
  }
}

// create a resolver; maxBackgroundDhtQueries overrides the configured limit
export function init(
  namestore: NamestoreClient,
  dht: DhtClient,
  config: ResolverConfigInput = {},
  maxBackgroundDhtQueries?: number,
  services: ResolverServices = {}
): GnsResolver {
  const parsed = parseResolverConfig({
    ...config,
    ...(maxBackgroundDhtQueries !== undefined && { maxBackgroundDhtQueries }),
  });
  return new GnsResolver(namestore, dht, parsed, services);
}

// export types and constants
export type * from './types';
export * from './constants';
export * from './utils';
export * from './errors';
export * from './names';
export * from './packets';
export * from './config';
export * from './logger';
export * from './vpn';
export { ResolverHandle } from './handle';
export type { PendingOperation, VpnContext } from './handle';
export { DhtLookupHeap } from './caches/dht-heap';
export type { HeapNode } from './caches/dht-heap';
export { UdpDnsStub } from './transports/udp';
export { SystemResolver } from './transports/system';
