import { lookup, type LookupAddress } from 'dns';
import { FAMILY_IPV4, FAMILY_IPV6 } from '../constants';
import { createLogger, type Logger } from '../logger';
import type { AddressFamily, OperationHandle, ResolvedAddress, StdResolver } from '../types';

export interface SystemResolverOptions {
  logger?: Logger;
}

// resolve hostnames through the operating system (getaddrinfo)
export class SystemResolver implements StdResolver {
  private readonly logger: Logger;
  private readonly lookups = new Set<() => void>();

  constructor(options: SystemResolverOptions = {}) {
    this.logger = options.logger ?? createLogger('gns-resolver.system');
  }

  ipGet(
    hostname: string,
    family: AddressFamily,
    timeout: number,
    callback: (address: ResolvedAddress | null) => void
  ): OperationHandle {
    let active = true;

    const stop = () => {
      active = false;
      clearTimeout(timer);
      this.lookups.delete(stop);
    };

    // deliver every address, then the end marker
    const finish = (addresses: ResolvedAddress[]) => {
      if (!active) return;
      stop();
      for (const address of addresses) callback(address);
      callback(null);
    };

    const timer = setTimeout(() => {
      this.logger.debug('System lookup timed out', { hostname, timeout });
      finish([]);
    }, timeout);
    this.lookups.add(stop);

    lookup(hostname, { all: true, family }, (error: NodeJS.ErrnoException | null, addresses: LookupAddress[]) => {
      if (error) {
        this.logger.debug('System lookup failed', { hostname, error: error.code ?? error.message });
        finish([]);
        return;
      }
      finish(
        addresses.map(entry => ({
          address: entry.address,
          family: entry.family === FAMILY_IPV6 ? FAMILY_IPV6 : FAMILY_IPV4,
        }))
      );
    });

    return { cancel: stop };
  }

  // stop every lookup in flight, getaddrinfo itself cannot be interrupted
  close(): void {
    for (const stop of [...this.lookups]) stop();
  }
}
