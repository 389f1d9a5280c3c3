import type { Question, Answer } from 'dns-packet';
import type { DnsError } from './errors.js';
import type { Logger } from './logger.js';
import {
  A_RECORD,
  AAAA_RECORD,
  CNAME_RECORD,
  DNAME_RECORD,
  MX_RECORD,
  NS_RECORD,
  PTR_RECORD,
  SOA_RECORD,
  TXT_RECORD,
  DNS_RESPONSE_CODES,
  DNS_RECORD_CLASSES,
  DNS_RECORD_TYPES,
} from './constants.js';

// configuration options for the resolver
// external API uses Partial<DnsOptions>, internal uses full DnsOptions
export interface DnsOptions {
  rootHints: readonly string[]; // IPv4 addresses to start from (default: the 13 root servers)
  transport: DnsTransportQuery; // sends one query to one nameserver (default: UDP)
  port: number; // nameserver port (default: 53)
  timeout: number; // per-attempt timeout in ms (default: 3000)

  // limits
  maxReferrals: number; // referrals and alias restarts per lookup (default: 32)
  maxDepth: number; // nested glueless lookups (default: 8)
  maxAliases: number; // CNAME chain length (default: 16)

  // performance
  concurrency: number; // names collected in parallel by collectAll (default: 4)

  logger: Logger;
}

// case-insensitive versions of DNS types for better DX
export type RecordType = DnsRecordType | Lowercase<DnsRecordType>;

// individual query sent to a single nameserver
export type DnsQuestion = {
  query: string;
  type: DnsRecordType;
  server: string;
};

// function interface for DNS transport operation
export interface DnsTransportQuery {
  (question: DnsQuestion, options: DnsOptions): Promise<DnsPacket>;
}

// the type of DNS response code, e.g. 'NOERROR', 'NXDOMAIN', etc
export type DnsResponseType = keyof typeof DNS_RESPONSE_CODES;

// the numeric DNS response code, e.g. 0 for NOERROR, 3 for NXDOMAIN, etc
export type DnsResponseCode = (typeof DNS_RESPONSE_CODES)[DnsResponseType];

// the DNS record class, e.g. 'IN' for Internet
export type DnsRecordClass = keyof typeof DNS_RECORD_CLASSES;

// a DNS record type
export type DnsRecordType = (typeof DNS_RECORD_TYPES)[number];

// how a lookup ended
// answer: records of the requested type (or the alias) were found
// nodata: a server answered authoritatively with nothing, including NXDOMAIN
// exhausted: every nameserver of a cycle failed, nothing could be determined
// failed: the walk was cut short (glueless delegation dead end, loop or limit)
export type DnsResolutionStatus = 'answer' | 'nodata' | 'exhausted' | 'failed';

// what a single hop produced
export type DnsHopOutcome = 'answer' | 'alias' | 'referral' | 'nodata' | 'error';

// a single entry of a DNS resolution hop, with the details of the nameserver and query
export type DnsResolutionHop = {
  server: string;
  query: string;
  type: DnsRecordType;
  timestamp: Date;
  elapsed: number | null;
  rcodeName: DnsResponseType | null;
  outcome: DnsHopOutcome;
};

// the result of a lookup, with all the details of the final response
export interface DnsAnswer {
  query: string; // the name that was looked up
  type: DnsRecordType; // the record type that was looked up
  status: DnsResolutionStatus;
  server: string | null; // the nameserver that gave the final response
  rcode: DnsResponseCode | null; // e.g. 0 for NOERROR, 3 for NXDOMAIN
  rcodeName: DnsResponseType | null;
  error: DnsError | null; // populated for exhausted and failed lookups
  records: DnsRecord[]; // answer section
  authorities: DnsRecord[];
  additionals: DnsRecord[];
  trace: DnsResolutionHop[]; // hops in order, showing delegation/referrals/aliases
}

// per-lookup state handed down to nested glueless lookups
export interface ResolutionContext {
  depth: number;
  stack: readonly string[]; // cache keys currently being resolved, outermost first
}

// a single alias step of a CNAME chain
export interface DnsAliasStep {
  alias: string; // the name holding the CNAME
  name: string; // the CNAME target
}

// a resolved CNAME chain
export interface DnsAliasChain {
  name: string; // the terminal (non-alias) name
  aliases: DnsAliasStep[];
  error: DnsError | null;
}

// presentation records
export interface AddressResult {
  name: string;
  address: string;
}

export interface MailExchangeResult {
  name: string;
  preference: number;
  exchange: string;
}

// presentation-ready results for a single name
export interface DnsResults {
  CNAME: DnsAliasStep[];
  A: AddressResult[];
  AAAA: AddressResult[];
  MX: MailExchangeResult[];
}

//--------------------------------
// dns-packet types
//--------------------------------

// just aliases for convenience
export type PacketQuestion = Question;
export type PacketAnswer = Answer;

// the parts of dns-packet's DecodedPacket the resolver reads, plus the response size
// rcode is carried in the low bits of flags
export interface DnsPacket {
  id?: number | undefined;
  flags?: number | undefined;
  flag_aa?: boolean;
  bytes?: number; // the number of bytes in the response
  questions?: PacketQuestion[] | undefined;
  answers?: PacketAnswer[] | undefined;
  authorities?: PacketAnswer[] | undefined;
  additionals?: PacketAnswer[] | undefined;
}

//--------------------------------
// DnsRecord types
//--------------------------------

// common base interface for all DNS records
interface BaseDnsRecord {
  name: string;
  ttl: number;
  type: DnsRecordType;
  class: DnsRecordClass; // DNS class, almost always 'IN' (Internet)
}

// specific record type interfaces
export interface ARecord extends BaseDnsRecord {
  type: typeof A_RECORD;
  address: string;
}

export interface AaaaRecord extends BaseDnsRecord {
  type: typeof AAAA_RECORD;
  address: string;
}

export interface CnameRecord extends BaseDnsRecord {
  type: typeof CNAME_RECORD;
  value: string;
}

export interface DnameRecord extends BaseDnsRecord {
  type: typeof DNAME_RECORD;
  value: string;
}

export interface MxRecord extends BaseDnsRecord {
  type: typeof MX_RECORD;
  preference: number;
  exchange: string;
}

export interface NsRecord extends BaseDnsRecord {
  type: typeof NS_RECORD;
  value: string;
}

export interface PtrRecord extends BaseDnsRecord {
  type: typeof PTR_RECORD;
  value: string;
}

export interface SoaRecord extends BaseDnsRecord {
  type: typeof SOA_RECORD;
  nsname: string;
  hostmaster: string;
  serial: number;
  refresh: number;
  retry: number;
  expire: number;
  minimum: number;
}

export interface TxtRecord extends BaseDnsRecord {
  type: typeof TXT_RECORD;
  value: string;
}

// union type for all supported DNS records
export type DnsRecord =
  | AaaaRecord
  | ARecord
  | CnameRecord
  | DnameRecord
  | MxRecord
  | NsRecord
  | PtrRecord
  | SoaRecord
  | TxtRecord;
