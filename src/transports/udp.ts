import dgram from 'dgram';
import { isIPv6 } from 'net';
import { DNS_HEADER_LENGTH } from '../constants';
import { createLogger, type Logger } from '../logger';
import type { DnsServerAddress, DnsStub, OperationHandle } from '../types';
import { isValidIp } from '../utils';

export interface UdpDnsStubOptions {
  logger?: Logger;
}

// send raw DNS queries over UDP, one socket per query
// replies whose id does not match the query are ignored
export class UdpDnsStub implements DnsStub {
  private readonly logger: Logger;
  // close functions of the queries still waiting for a reply
  private readonly queries = new Set<() => void>();

  constructor(options: UdpDnsStubOptions = {}) {
    this.logger = options.logger ?? createLogger('gns-resolver.udp');
  }

  // number of queries waiting for a reply
  get openSockets(): number {
    return this.queries.size;
  }

  resolve(server: DnsServerAddress, query: Buffer, callback: (response: Buffer) => void): OperationHandle {
    if (!isValidIp(server.address)) {
      this.logger.warn('Not sending DNS query to a server without an IP address', { server: server.address });
      return { cancel: () => undefined };
    }

    // create a UDP socket - use udp6 for IPv6 addresses, udp4 for IPv4
    const socket = dgram.createSocket(isIPv6(server.address) ? 'udp6' : 'udp4');
    const id = query.readUInt16BE(0);

    let closed = false;
    const close = () => {
      if (closed) return;
      closed = true;
      this.queries.delete(close);
      // remove all listeners to prevent late replies from reaching the callback
      socket.removeAllListeners();
      socket.close();
    };

    this.queries.add(close);

    // handle the response packet, close socket, and deliver it
    socket.on('message', (message: Buffer) => {
      if (message.length < DNS_HEADER_LENGTH || message.readUInt16BE(0) !== id) {
        this.logger.debug('Ignoring unrelated UDP datagram', { server: server.address, bytes: message.length });
        return;
      }
      close();
      callback(message);
    });

    // the caller's timeout reports the failure, the socket only has to go
    socket.on('error', (error: Error) => {
      this.logger.warn('UDP socket error', { server: server.address, error: error.message });
      close();
    });

    // send the query packet AFTER event listeners are attached
    socket.send(query, 0, query.length, server.port, server.address, error => {
      if (error) {
        this.logger.warn('Failed to send UDP query', { server: server.address, error: error.message });
        close();
      }
    });

    return { cancel: close };
  }

  // close every socket still waiting for a reply
  close(): void {
    for (const close of [...this.queries]) close();
  }
}
