import type { DnsRecord } from './types.js';

// check for empty values: undefined, null, empty string, empty array, 0, false, NaN, empty objects
export function isEmpty(value: unknown): boolean {
  if (!value) {
    return true;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed === '' || trimmed === 'null' || trimmed === 'undefined';
  }
  if (Array.isArray(value)) {
    return value.length === 0 || value.every(v => isEmpty(v));
  }
  if (typeof value === 'object') {
    return Object.keys(value).length === 0;
  }
  return false;
}

// normalize host, remove leading/trailing periods/slashes, etc.
export const normalizeHost = (host: string, removeProtocol = true): string => {
  if (isEmpty(host)) return '';
  // trim spaces, leading/trailing periods, and lowercase
  host = String(host)
    .trim()
    .replace(/^[.]+|[.]+$/g, '')
    .toLowerCase();
  // remove protocol by default
  if (removeProtocol) {
    host = stripProtocol(host);
  }
  return host
    .replace(/\/$/, '') // remove trailing slash if present
    .replace(/^\.+|\.+$/g, '') // remove leading and trailing periods
    .trim(); // one last trim
};

// strip alphabetic protocols like http:// from a url
export function stripProtocol(url: string): string {
  return String(url)
    .trim()
    .replace(/^[a-zA-Z]+:\/\//, '');
}

// strip trailing dot from a string
export function stripTrailingDot(str: string): string {
  return str.endsWith('.') ? str.slice(0, -1) : str;
}

// sanitize string - removes null bytes and other control characters
export function sanitizeString(value: string): string {
  return (
    value
      // eslint-disable-next-line no-control-regex
      .replace(/[\x00-\x1F\x7F]/g, '')
      .trim()
  );
}

// check a (normalized) hostname: 1-63 character labels, 253 characters total
export function isValidHostname(host: string): boolean {
  if (isEmpty(host) || host.length > 253) return false;
  return host
    .split('.')
    .every(label => label.length > 0 && label.length <= 63 && /^[a-z0-9_-]+$/i.test(label));
}

// list a name and each of its label-suffixes, most specific first, excluding the root
// e.g. www.example.com -> ['www.example.com', 'example.com', 'com']
export function getAncestors(name: string): string[] {
  const host = normalizeHost(name);
  if (!host) return [];
  const labels = host.split('.');
  return labels.map((_, i) => labels.slice(i).join('.'));
}

// check for a dotted-quad IPv4 address
export const isValidIpv4 = (ip: string) => {
  if (isEmpty(ip)) return false;
  ip = String(ip).trim();

  // must contain dots and only digits
  if (!/^[\d.]+$/.test(ip)) {
    return false;
  }

  const parts = ip.split('.');
  if (parts.length !== 4) {
    return false;
  }

  // check each part is numeric and in range
  for (const part of parts) {
    if (part === '' || !/^\d+$/.test(part)) {
      return false;
    }
    const num = parseInt(part, 10);
    if (isNaN(num) || num < 0 || num > 255) {
      return false;
    }
  }

  return true;
};

// deduplicate DNS records, ignoring TTL for comparison
export function deduplicateRecords(records: DnsRecord[]): DnsRecord[] {
  const seenRecords = new Set<string>();
  const uniqueRecords: DnsRecord[] = [];

  for (const record of records) {
    // compare everything but the TTL, owner names case-insensitively
    const { ttl: _ttl, ...normalizedRecord } = { ...record, name: normalizeHost(record.name) };

    // create a unique key for this record based on all remaining fields
    const recordKey = JSON.stringify(normalizedRecord, Object.keys(normalizedRecord).sort());

    // only add if we haven't seen this exact record before
    if (!seenRecords.has(recordKey)) {
      seenRecords.add(recordKey);
      uniqueRecords.push(record);
    }
  }
  return uniqueRecords;
}
