import type { AddressResult, DnsAliasStep, DnsResults, MailExchangeResult } from './types.js';

// one human-readable line per record, in the style of host(1)
export const RESULT_FORMATS = {
  CNAME: (record: DnsAliasStep) => `${record.alias} is an alias for ${record.name}`,
  A: (record: AddressResult) => `${record.name} has address ${record.address}`,
  AAAA: (record: AddressResult) => `${record.name} has IPv6 address ${record.address}`,
  MX: (record: MailExchangeResult) =>
    `${record.name} mail is handled by ${record.preference} ${record.exchange}`,
} as const;

// format the results of a name in the fixed order CNAME, A, AAAA, MX
export function formatResults(results: DnsResults): string[] {
  return [
    ...results.CNAME.map(RESULT_FORMATS.CNAME),
    ...results.A.map(RESULT_FORMATS.A),
    ...results.AAAA.map(RESULT_FORMATS.AAAA),
    ...results.MX.map(RESULT_FORMATS.MX),
  ];
}
