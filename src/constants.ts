// GNS top-level domains
export const GNS_TLD = 'gnu'; // names resolved through the GNU Name System
export const ZKEY_TLD = 'zkey'; // names that carry a zone public key in their labels

// label for the apex of a zone ("@" in DNS)
export const GNS_MASTERZONE_LABEL = '+';

// suffix marking a name as relative to the zone it was found in
export const GNS_RELATIVE_SUFFIX = '.+';

// DNS record type codes we interpret
// https://www.iana.org/assignments/dns-parameters/dns-parameters.xhtml#dns-parameters-4
export const DNS_TYPE_A = 1;
export const DNS_TYPE_NS = 2;
export const DNS_TYPE_CNAME = 5;
export const DNS_TYPE_SOA = 6;
export const DNS_TYPE_PTR = 12;
export const DNS_TYPE_MX = 15;
export const DNS_TYPE_TXT = 16;
export const DNS_TYPE_AAAA = 28;
export const DNS_TYPE_SRV = 33;

// GNS-specific record types, allocated above the 16-bit DNS range
export const GNS_TYPE_PKEY = 65536; // delegation to another zone
export const GNS_TYPE_VPN = 65539; // service reachable through a VPN tunnel
export const GNS_TYPE_GNS2DNS = 65540; // delegation to a DNS nameserver

// numeric code => dns-packet type name, for records crossing into DNS
export const DNS_TYPE_NAMES = {
  [DNS_TYPE_A]: 'A',
  [DNS_TYPE_NS]: 'NS',
  [DNS_TYPE_CNAME]: 'CNAME',
  [DNS_TYPE_SOA]: 'SOA',
  [DNS_TYPE_PTR]: 'PTR',
  [DNS_TYPE_MX]: 'MX',
  [DNS_TYPE_TXT]: 'TXT',
  [DNS_TYPE_AAAA]: 'AAAA',
  [DNS_TYPE_SRV]: 'SRV',
} as const;

// record flags
export const RECORD_FLAG_NONE = 0;
export const RECORD_FLAG_RELATIVE_EXPIRATION = 8; // expirationTime is a duration, not a timestamp

// key material sizes in bytes
export const ZONE_KEY_LENGTH = 64; // x and y coordinates of the zone public key
export const ZONE_KEY_COORDINATE_LENGTH = 32;
export const QUERY_HASH_LENGTH = 64;
export const PEER_IDENTITY_LENGTH = 32;

// binary sizes of address records
export const IPV4_ADDRESS_LENGTH = 4;
export const IPV6_ADDRESS_LENGTH = 16;

// DNS limits
export const DNS_MAX_NAME_LENGTH = 253;
export const DNS_PORT = 53;
export const DNS_HEADER_LENGTH = 12;

// dns packet header flags
export const DNS_FLAG_RESPONSE = 1 << 15; // QR: packet is a response
export const DNS_FLAG_RECURSION_DESIRED = 1 << 8; // RD: ask the server to recurse for us

// address families, as used by dns.lookup()
export const FAMILY_UNSPEC = 0;
export const FAMILY_IPV4 = 4;
export const FAMILY_IPV6 = 6;

// context string mixed into query-hash derivation
export const GNS_DERIVATION_CONTEXT = 'gns';

// defaults for the resolver configuration
export const DEFAULT_DHT_LOOKUP_TIMEOUT = 60_000; // 60 seconds
export const DEFAULT_DNS_LOOKUP_TIMEOUT = 5_000; // 5 seconds
export const DEFAULT_VPN_TIMEOUT = 30 * 60_000; // 30 minutes
export const DEFAULT_MAX_RECURSION = 256; // hops before a lookup is considered looping
export const DEFAULT_DHT_REPLICATION_LEVEL = 5;
export const DEFAULT_MAX_BACKGROUND_DHT_QUERIES = 1000;
