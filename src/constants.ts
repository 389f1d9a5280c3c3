// default per-attempt timeout in ms
export const DEFAULT_TIMEOUT = 3_000;

// standard DNS port
export const DNS_PORT = 53;

// record types handled by the resolver
export const A_RECORD = 'A';
export const AAAA_RECORD = 'AAAA';
export const CNAME_RECORD = 'CNAME';
export const DNAME_RECORD = 'DNAME';
export const MX_RECORD = 'MX';
export const NS_RECORD = 'NS';
export const OPT_RECORD = 'OPT'; // EDNS0 pseudo-record, never parsed into a DnsRecord
export const PTR_RECORD = 'PTR';
export const SOA_RECORD = 'SOA';
export const TXT_RECORD = 'TXT';

// list of supported record types, in canonical order
export const DNS_RECORD_TYPES = [
  SOA_RECORD,
  NS_RECORD,
  A_RECORD,
  AAAA_RECORD,
  CNAME_RECORD,
  DNAME_RECORD,
  MX_RECORD,
  TXT_RECORD,
  PTR_RECORD,
] as const;

// DNS record classes
// https://www.iana.org/assignments/dns-parameters/dns-parameters.xhtml#dns-parameters-2
export const DNS_RECORD_CLASSES = {
  IN: 1, // Internet
  CS: 2, // CSNET (obsolete)
  CH: 3, // CHAOS
  HS: 4, // Hesiod
  ANY: 255, // ANY (query class)
} as const;

// DNS response codes
// https://www.iana.org/assignments/dns-parameters/dns-parameters.xhtml#dns-parameters-6
export const DNS_RESPONSE_CODES = {
  NOERROR: 0, // No Error	[RFC1035]
  FORMERR: 1, // Format Error	[RFC1035]
  SERVFAIL: 2, // Server Failure	[RFC1035]
  NXDOMAIN: 3, // Non-Existent Domain	[RFC1035]
  NOTIMP: 4, // Not Implemented	[RFC1035]
  REFUSED: 5, // Query Refused	[RFC1035]
  YXDOMAIN: 6, // Name Exists when it should not	[RFC2136][RFC6672]
  YXRRSET: 7, // RR Set Exists when it should not	[RFC2136]
  NXRRSET: 8, // RR Set that should exist does not	[RFC2136]
  NOTAUTH: 9, // Server Not Authoritative for zone	[RFC2136]
  NOTZONE: 10, // Name not contained in zone	[RFC2136]
  DSOTYPENI: 11, // DSO-TYPE Not Implemented	[RFC8490]
} as const;

// response codes that make the engine move on to the next nameserver
export const UNUSABLE_RESPONSE_CODES = ['FORMERR', 'SERVFAIL', 'NOTIMP', 'REFUSED'] as const;

// mask for the RCODE bits of the header flags
export const RCODE_MASK = 0x0f;

// map of root servers to their IPv4 addresses
// https://www.iana.org/domains/root/servers
// https://www.internic.net/domain/named.root
export const ROOT_SERVERS = {
  'a.root-servers.net': '198.41.0.4',
  'b.root-servers.net': '170.247.170.2',
  'c.root-servers.net': '192.33.4.12',
  'd.root-servers.net': '199.7.91.13',
  'e.root-servers.net': '192.203.230.10',
  'f.root-servers.net': '192.5.5.241',
  'g.root-servers.net': '192.112.36.4',
  'h.root-servers.net': '198.97.190.53',
  'i.root-servers.net': '192.36.148.17',
  'j.root-servers.net': '192.58.128.30',
  'k.root-servers.net': '193.0.14.129',
  'l.root-servers.net': '199.7.83.42',
  'm.root-servers.net': '202.12.27.33',
} as const;

// the IPv4 root hints, the starting point of every walk without a closer cached delegation
export const ROOT_HINTS: readonly string[] = Object.values(ROOT_SERVERS);
