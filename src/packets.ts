import dnsPacket from 'dns-packet';
import { Buffer } from 'buffer';
import {
  A_RECORD,
  AAAA_RECORD,
  CNAME_RECORD,
  DNAME_RECORD,
  DNS_RECORD_CLASSES,
  DNS_RESPONSE_CODES,
  MX_RECORD,
  NS_RECORD,
  OPT_RECORD,
  PTR_RECORD,
  RCODE_MASK,
  SOA_RECORD,
  TXT_RECORD,
} from './constants.js';
import type {
  DnsQuestion,
  DnsRecord,
  DnsRecordClass,
  DnsResponseType,
  PacketAnswer,
} from './types.js';
import { deduplicateRecords, sanitizeString, stripTrailingDot } from './utils.js';

// create an iterative (RD=0) query packet for the given question, without EDNS
export function createDnsPacket(
  question: Pick<DnsQuestion, 'query' | 'type'>,
  id: number
): Buffer {
  return dnsPacket.encode({
    type: 'query',
    id,
    flags: 0,
    questions: [{ type: question.type, name: question.query, class: 'IN' }],
  });
}

// get the response code name from the header flags, e.g. 3 => 'NXDOMAIN'
export function getResponseCode(flags: number | undefined): DnsResponseType | null {
  const rcode = (flags ?? 0) & RCODE_MASK;
  for (const [name, code] of Object.entries(DNS_RESPONSE_CODES)) {
    if (code === rcode && isResponseType(name)) return name;
  }
  return null;
}

function isResponseType(name: string): name is DnsResponseType {
  return Object.prototype.hasOwnProperty.call(DNS_RESPONSE_CODES, name);
}

function isRecordClass(value: unknown): value is DnsRecordClass {
  return (
    typeof value === 'string' && Object.prototype.hasOwnProperty.call(DNS_RECORD_CLASSES, value)
  );
}

// format a single answer from dns-packet into our DnsRecord type
// returns null for OPT pseudo-records and record types the resolver does not model
export function parsePacketAnswer(answer: PacketAnswer): DnsRecord | null {
  if (answer.type === OPT_RECORD) {
    // OPT records are EDNS0 pseudo-records, never part of a resolution result
    return null;
  }

  const baseData: { name: string; ttl: number; class: DnsRecordClass } = {
    name: stripTrailingDot(answer.name),
    ttl: answer.ttl ?? 0,
    class: isRecordClass(answer.class) ? answer.class : 'IN', // default to 'IN' (Internet)
  };

  switch (answer.type) {
    case A_RECORD: {
      return { ...baseData, type: A_RECORD, address: answer.data };
    }

    case AAAA_RECORD: {
      return { ...baseData, type: AAAA_RECORD, address: answer.data };
    }

    case CNAME_RECORD: {
      return { ...baseData, type: CNAME_RECORD, value: stripTrailingDot(answer.data) };
    }

    case DNAME_RECORD: {
      return { ...baseData, type: DNAME_RECORD, value: stripTrailingDot(answer.data) };
    }

    case NS_RECORD: {
      return { ...baseData, type: NS_RECORD, value: stripTrailingDot(answer.data) };
    }

    case PTR_RECORD: {
      return { ...baseData, type: PTR_RECORD, value: stripTrailingDot(answer.data) };
    }

    case MX_RECORD: {
      return {
        ...baseData,
        type: MX_RECORD,
        preference: answer.data.preference ?? 0,
        exchange: stripTrailingDot(answer.data.exchange),
      };
    }

    case SOA_RECORD: {
      return {
        ...baseData,
        type: SOA_RECORD,
        nsname: stripTrailingDot(answer.data.mname),
        hostmaster: stripTrailingDot(answer.data.rname),
        serial: answer.data.serial ?? 0,
        refresh: answer.data.refresh ?? 0,
        retry: answer.data.retry ?? 0,
        expire: answer.data.expire ?? 0,
        minimum: answer.data.minimum ?? 0,
      };
    }

    case TXT_RECORD: {
      const chunks = Array.isArray(answer.data) ? answer.data : [answer.data];
      const value = chunks
        .map(item => (Buffer.isBuffer(item) ? item.toString() : String(item)))
        .join('');
      return { ...baseData, type: TXT_RECORD, value: sanitizeString(value) };
    }

    default:
      return null;
  }
}

// parse the records of a packet section, dropping unsupported types and duplicates
export function parsePacketSection(answers: PacketAnswer[] | undefined): DnsRecord[] {
  if (!answers || answers.length === 0) {
    return [];
  }
  const records = answers
    .map(answer => parsePacketAnswer(answer))
    .filter((record): record is DnsRecord => record !== null);
  return deduplicateRecords(records);
}
