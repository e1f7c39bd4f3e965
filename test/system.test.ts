import { createLogger } from '../src/logger';
import { SystemResolver } from '../src/transports/system';
import type { ResolvedAddress } from '../src/types';

describe('SystemResolver', () => {
  const logger = createLogger('test', { level: 'silent' });

  function collect(resolver: SystemResolver, hostname: string, family: 0 | 4 | 6): Promise<ResolvedAddress[]> {
    return new Promise(resolve => {
      const addresses: ResolvedAddress[] = [];
      resolver.ipGet(hostname, family, 1000, address => {
        if (address) {
          addresses.push(address);
        } else {
          resolve(addresses);
        }
      });
    });
  }

  test('should return IP literals without a network lookup', async () => {
    const resolver = new SystemResolver({ logger });

    expect(await collect(resolver, '127.0.0.1', 4)).toEqual([{ address: '127.0.0.1', family: 4 }]);
    expect(await collect(resolver, '::1', 0)).toEqual([{ address: '::1', family: 6 }]);
  });

  test('should not call back after cancel', async () => {
    const resolver = new SystemResolver({ logger });
    const calls: (ResolvedAddress | null)[] = [];

    const handle = resolver.ipGet('127.0.0.1', 4, 1000, address => calls.push(address));
    handle.cancel();
    await new Promise(resolve => setTimeout(resolve, 20));

    expect(calls).toEqual([]);
  });
});
