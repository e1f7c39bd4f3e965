import type { HeapNode } from './caches/dht-heap';
import type { NameCursor } from './names';
import { encodeZoneKey } from './names';
import type {
  AuthorityHop,
  DnsResult,
  GnsResolutionHop,
  LookupCallback,
  OperationHandle,
  ResolverState,
  ZoneKey,
} from './types';

// serialized snapshot of a record set while a VPN allocation is in flight
export interface VpnContext {
  recordCount: number;
  recordData: Buffer;
}

// the single sub-operation a lookup may wait on
export type PendingOperation =
  | { kind: 'none' }
  | { kind: 'namestore'; handle: OperationHandle }
  | { kind: 'dht'; handle: OperationHandle; heapNode: HeapNode<ResolverHandle> }
  | { kind: 'dns'; handle: OperationHandle }
  | { kind: 'std-resolve'; handle: OperationHandle }
  | { kind: 'vpn'; handle: OperationHandle; context: VpnContext };

const NO_OPERATION: PendingOperation = { kind: 'none' };

// state of one lookup, owned by the resolver that created it
export class ResolverHandle implements NameCursor {
  // the name being resolved, rewritten by CNAME restarts
  name: string;

  // length of the unresolved prefix of name
  position: number;

  // zone the resolution starts in, replaced by the zone of a zkey name
  authorityZone: ZoneKey;

  // incremented per hop, bounded by maxRecursion
  loopLimiter = 0;

  // authority chain, one hop per consumed label
  chain: AuthorityHop[] = [];

  // results collected during a standard DNS fallback
  dnsResults: DnsResult[] = [];

  // what we are waiting for
  pending: PendingOperation = NO_OPERATION;

  // scheduled step, timeout or deferred failure
  task: (() => void) | null = null;

  // set once the lookup completed or was cancelled
  finished = false;

  constructor(
    readonly query: string,
    readonly recordType: number,
    zone: ZoneKey,
    readonly shortenKey: Buffer | null,
    readonly onlyCached: boolean,
    readonly callback: LookupCallback
  ) {
    this.name = query;
    this.position = query.length;
    this.authorityZone = zone;
  }

  // last hop of the authority chain
  get tail(): AuthorityHop | null {
    return this.chain[this.chain.length - 1] ?? null;
  }

  get state(): ResolverState {
    if (this.finished) return 'Done';
    switch (this.pending.kind) {
      case 'namestore':
        return 'AwaitingNamestore';
      case 'dht':
        return 'AwaitingDHT';
      case 'dns':
        return 'AwaitingDNS';
      case 'std-resolve':
        return 'AwaitingStdResolve';
      case 'vpn':
        return 'AwaitingVPN';
      case 'none':
        return 'Scheduled';
    }
  }

  // take the pending operation, leaving none behind
  takePending(): PendingOperation {
    const pending = this.pending;
    this.pending = NO_OPERATION;
    return pending;
  }

  // clear and cancel the scheduled task
  cancelTask(): void {
    const task = this.task;
    this.task = null;
    task?.();
  }

  // the authority chain as it can be shown to a caller
  trace(): GnsResolutionHop[] {
    return this.chain.map(hop => ({
      kind: hop.kind,
      label: hop.label,
      authority: hop.kind === 'gns' ? encodeZoneKey(hop.zone) : hop.address,
    }));
  }
}
