import type { ResolverConfig } from './config';
import {
  DNS_MAX_NAME_LENGTH,
  DNS_TYPE_A,
  DNS_TYPE_AAAA,
  DNS_TYPE_CNAME,
  DNS_TYPE_MX,
  DNS_TYPE_SOA,
  DNS_TYPE_SRV,
  GNS_MASTERZONE_LABEL,
  GNS_TYPE_GNS2DNS,
  GNS_TYPE_PKEY,
  GNS_TYPE_VPN,
  IPV4_ADDRESS_LENGTH,
  IPV6_ADDRESS_LENGTH,
  ZONE_KEY_LENGTH,
} from './constants';
import {
  InvariantError,
  MalformedRecordError,
  MissingGlueError,
  NameTooLongError,
  NoDelegationError,
  type GnsError,
} from './errors';
import type { ResolverHandle } from './handle';
import type { Logger } from './logger';
import {
  isRelativeName,
  nextLabel,
  stripRelativeSuffix,
  translateDotPlus,
  unresolvedPrefix,
  zoneToString,
} from './names';
import { decodeMx, decodeName, decodeSoa, decodeSrv, encodeMx, encodeName, encodeSoa, encodeSrv } from './packets';
import type { GnsAuthorityHop, GnsRecord, ResolvedAddress, ZoneKey } from './types';
import { bytesToAddress } from './utils';

// what the post-processor needs from the resolver driving the lookup
export interface ResultProcessorHost {
  readonly config: ResolverConfig;
  readonly logger: Logger;
  fail(rh: ResolverHandle, error: GnsError): void;
  complete(rh: ResolverHandle, records: GnsRecord[]): void;
  // schedule the next step for the tail of the chain
  recurse(rh: ResolverHandle): void;
  // classify rh.name again and start over
  restart(rh: ResolverHandle): void;
  shorten(rh: ResolverHandle, label: string, zone: ZoneKey): void;
  redirectVpn(rh: ResolverHandle, record: GnsRecord, records: GnsRecord[]): void;
}

// handle the records a GNS hop produced
export function handleGnsResult(host: ResultProcessorHost, rh: ResolverHandle, records: GnsRecord[]): void {
  const tail = rh.tail;
  if (tail?.kind !== 'gns') {
    throw new InvariantError('GNS result without a GNS hop at the tail of the chain');
  }
  host.logger.debug('Resolution succeeded', {
    label: tail.label,
    zone: zoneToString(tail.zone),
    records: records.length,
  });

  if (rh.position === 0) {
    handleTerminalResult(host, rh, tail, records);
  } else {
    handleIntermediateResult(host, rh, tail, records);
  }
}

// every label is consumed, the records answer the lookup
function handleTerminalResult(
  host: ResultProcessorHost,
  rh: ResolverHandle,
  tail: GnsAuthorityHop,
  records: GnsRecord[]
): void {
  if (rh.recordType !== DNS_TYPE_CNAME) {
    const cname = records.find(record => record.type === DNS_TYPE_CNAME);
    if (cname) {
      followCname(host, rh, tail, cname);
      return;
    }
  }

  if (rh.recordType === DNS_TYPE_A || rh.recordType === DNS_TYPE_AAAA) {
    const vpn = records.find(record => record.type === GNS_TYPE_VPN);
    if (vpn) {
      host.redirectVpn(rh, vpn, records);
      return;
    }
  }

  if (rh.recordType !== GNS_TYPE_GNS2DNS) {
    const delegation = records.find(record => record.type === GNS_TYPE_GNS2DNS);
    if (delegation) {
      delegateToDns(host, rh, delegation, records);
      return;
    }
  }

  const result: GnsRecord[] = [];
  for (const record of records) {
    switch (record.type) {
      case DNS_TYPE_CNAME: {
        const name = decodeName(record.data);
        if (name === null) {
          host.logger.warn('Dropping malformed CNAME record', { zone: zoneToString(tail.zone) });
          break;
        }
        result.push({ ...record, data: encodeName(translateDotPlus(name, tail.zone)) });
        break;
      }
      case DNS_TYPE_SOA: {
        const soa = decodeSoa(record.data);
        if (!soa) {
          host.logger.warn('Dropping malformed SOA record', { zone: zoneToString(tail.zone) });
          break;
        }
        const data = encodeSoa({
          ...soa,
          mname: translateDotPlus(soa.mname, tail.zone),
          rname: translateDotPlus(soa.rname, tail.zone),
        });
        result.push({ ...record, data });
        break;
      }
      case DNS_TYPE_MX: {
        const mx = decodeMx(record.data);
        if (!mx) {
          host.logger.warn('Dropping malformed MX record', { zone: zoneToString(tail.zone) });
          break;
        }
        result.push({ ...record, data: encodeMx({ ...mx, exchange: translateDotPlus(mx.exchange, tail.zone) }) });
        break;
      }
      case DNS_TYPE_SRV: {
        const srv = decodeSrv(record.data);
        if (!srv) {
          host.logger.warn('Dropping malformed SRV record', { zone: zoneToString(tail.zone) });
          break;
        }
        result.push({ ...record, data: encodeSrv({ ...srv, target: translateDotPlus(srv.target, tail.zone) }) });
        break;
      }
      case GNS_TYPE_PKEY: {
        if (record.data.length !== ZONE_KEY_LENGTH) {
          host.logger.warn('Dropping malformed PKEY record', { zone: zoneToString(tail.zone) });
          break;
        }
        const zone = Buffer.from(record.data);
        host.shorten(rh, tail.label, zone);
        if (rh.recordType !== GNS_TYPE_PKEY) {
          // the name ends at a delegation, resolve the apex of the delegated zone
          rh.chain.push({ kind: 'gns', label: GNS_MASTERZONE_LABEL, zone });
          host.recurse(rh);
          return;
        }
        result.push(record);
        break;
      }
      default:
        result.push(record);
    }
  }
  host.complete(rh, result);
}

// labels are left, the records must delegate them somewhere
function handleIntermediateResult(
  host: ResultProcessorHost,
  rh: ResolverHandle,
  tail: GnsAuthorityHop,
  records: GnsRecord[]
): void {
  for (const record of records) {
    switch (record.type) {
      case GNS_TYPE_PKEY: {
        if (record.data.length !== ZONE_KEY_LENGTH) {
          host.fail(rh, new MalformedRecordError(`PKEY record has ${record.data.length} bytes`));
          return;
        }
        const zone = Buffer.from(record.data);
        const label = nextLabel(rh) ?? GNS_MASTERZONE_LABEL;
        rh.chain.push({ kind: 'gns', label, zone });
        host.shorten(rh, tail.label, zone);
        host.recurse(rh);
        return;
      }
      case GNS_TYPE_GNS2DNS:
        delegateToDns(host, rh, record, records);
        return;
      case DNS_TYPE_CNAME:
        followCname(host, rh, tail, record);
        return;
    }
  }
  host.fail(
    rh,
    new NoDelegationError(
      `GNS lookup recursion failed, no delegation for '${unresolvedPrefix(rh)}' below '${tail.label}'`
    )
  );
}

// restart on the CNAME target, within the same zone for relative targets
function followCname(host: ResultProcessorHost, rh: ResolverHandle, tail: GnsAuthorityHop, record: GnsRecord): void {
  const target = decodeName(record.data);
  if (target === null) {
    host.fail(rh, new MalformedRecordError('CNAME record does not hold a domain name'));
    return;
  }

  if (!isRelativeName(target)) {
    rh.name = target;
    rh.position = target.length;
    host.restart(rh);
    return;
  }

  // "foo.+": splice foo in place of the label we just resolved
  const relative = stripRelativeSuffix(target);
  const prefix = unresolvedPrefix(rh);
  rh.name = prefix.length > 0 ? `${prefix}.${relative}` : relative;
  rh.position = rh.name.length;
  host.shorten(rh, tail.label, tail.zone);
  const label = nextLabel(rh) ?? GNS_MASTERZONE_LABEL;
  rh.chain.push({ kind: 'gns', label, zone: tail.zone });
  host.recurse(rh);
}

// hand the rest of the name to the DNS server named by a GNS2DNS record
function delegateToDns(
  host: ResultProcessorHost,
  rh: ResolverHandle,
  delegation: GnsRecord,
  records: readonly GnsRecord[]
): void {
  const ns = decodeName(delegation.data);
  if (ns === null) {
    host.fail(rh, new MalformedRecordError('GNS2DNS record does not hold a domain name'));
    return;
  }

  // glue: the first address record of the set, whatever its family
  let glue: ResolvedAddress | null = null;
  for (const record of records) {
    if (record.type !== DNS_TYPE_A && record.type !== DNS_TYPE_AAAA) continue;
    const expected = record.type === DNS_TYPE_A ? IPV4_ADDRESS_LENGTH : IPV6_ADDRESS_LENGTH;
    if (record.data.length !== expected) {
      host.fail(rh, new MalformedRecordError(`Glue record has ${record.data.length} bytes`));
      return;
    }
    glue = bytesToAddress(record.data);
    break;
  }
  if (!glue) {
    host.fail(rh, new MissingGlueError(`No address record for nameserver '${ns}'`));
    return;
  }

  const prefix = unresolvedPrefix(rh);
  const label = prefix.length > 0 ? `${prefix}.${ns}` : ns;
  if (label.length > DNS_MAX_NAME_LENGTH) {
    host.fail(rh, new NameTooLongError(`Delegated name '${label}' exceeds ${DNS_MAX_NAME_LENGTH} characters`));
    return;
  }

  // the DNS server answers for everything that is left
  rh.position = 0;
  rh.chain.push({ kind: 'dns', label, name: ns, address: glue.address });
  host.recurse(rh);
}
