import {
  deduplicateRecords,
  getAncestors,
  isEmpty,
  isValidHostname,
  isValidIpv4,
  normalizeHost,
  sanitizeString,
  stripProtocol,
  stripTrailingDot,
} from '../src/utils.js';
import type { DnsRecord } from '../src/types.js';

describe('Utility Functions', () => {
  describe('isEmpty', () => {
    test('should treat missing and blank values as empty', () => {
      expect(isEmpty(undefined)).toBe(true);
      expect(isEmpty(null)).toBe(true);
      expect(isEmpty('  ')).toBe(true);
      expect(isEmpty('null')).toBe(true);
      expect(isEmpty([])).toBe(true);
      expect(isEmpty(['', null])).toBe(true);
      expect(isEmpty({})).toBe(true);
    });

    test('should treat anything else as non-empty', () => {
      expect(isEmpty('example.com')).toBe(false);
      expect(isEmpty(['example.com'])).toBe(false);
      expect(isEmpty({ name: 'example.com' })).toBe(false);
    });
  });

  describe('normalizeHost', () => {
    test('should lowercase and strip dots and whitespace', () => {
      expect(normalizeHost('  WWW.Example.COM. ')).toBe('www.example.com');
      expect(normalizeHost('.example.com..')).toBe('example.com');
    });

    test('should strip a protocol and trailing slash', () => {
      expect(normalizeHost('https://example.com/')).toBe('example.com');
      expect(normalizeHost('https://example.com/', false)).toBe('https://example.com');
    });

    test('should return an empty string for empty input', () => {
      expect(normalizeHost('')).toBe('');
      expect(normalizeHost('.')).toBe('');
    });
  });

  describe('stripProtocol', () => {
    test('should remove alphabetic protocols only', () => {
      expect(stripProtocol('http://example.com')).toBe('example.com');
      expect(stripProtocol('example.com')).toBe('example.com');
    });
  });

  describe('stripTrailingDot', () => {
    test('should remove a single trailing dot', () => {
      expect(stripTrailingDot('example.com.')).toBe('example.com');
      expect(stripTrailingDot('example.com')).toBe('example.com');
    });
  });

  describe('sanitizeString', () => {
    test('should remove control characters and trim', () => {
      expect(sanitizeString(' v=spf1\x00 -all\n')).toBe('v=spf1 -all');
    });
  });

  describe('isValidHostname', () => {
    test('should accept ordinary names', () => {
      expect(isValidHostname('example.com')).toBe(true);
      expect(isValidHostname('_dmarc.example.com')).toBe(true);
      expect(isValidHostname('xn--bcher-kva.example')).toBe(true);
      expect(isValidHostname('com')).toBe(true);
    });

    test('should reject empty labels, spaces and oversized names', () => {
      expect(isValidHostname('')).toBe(false);
      expect(isValidHostname('example..com')).toBe(false);
      expect(isValidHostname('bad name.com')).toBe(false);
      expect(isValidHostname(`${'a'.repeat(64)}.com`)).toBe(false);
      expect(isValidHostname(`${'a.'.repeat(127)}com`)).toBe(false);
    });
  });

  describe('getAncestors', () => {
    test('should list the name and its parents, most specific first', () => {
      expect(getAncestors('www.example.com.')).toEqual(['www.example.com', 'example.com', 'com']);
    });

    test('should normalize the name first', () => {
      expect(getAncestors('Mail.Example.ORG')).toEqual(['mail.example.org', 'example.org', 'org']);
    });

    test('should return nothing for the root', () => {
      expect(getAncestors('.')).toEqual([]);
      expect(getAncestors('')).toEqual([]);
    });
  });

  describe('isValidIpv4', () => {
    test('should recognise dotted-quad IPv4 addresses', () => {
      expect(isValidIpv4('192.0.2.1')).toBe(true);
      expect(isValidIpv4('192.0.2')).toBe(false);
      expect(isValidIpv4('192.0.2.256')).toBe(false);
      expect(isValidIpv4('a.root-servers.net')).toBe(false);
      expect(isValidIpv4('2001:db8::1')).toBe(false);
    });
  });

  describe('deduplicateRecords', () => {
    test('should drop records that differ only in TTL or owner case', () => {
      const records: DnsRecord[] = [
        { name: 'example.com', ttl: 300, class: 'IN', type: 'A', address: '192.0.2.1' },
        { name: 'Example.com', ttl: 60, class: 'IN', type: 'A', address: '192.0.2.1' },
        { name: 'example.com', ttl: 300, class: 'IN', type: 'A', address: '192.0.2.2' },
      ];

      expect(deduplicateRecords(records)).toEqual([records[0], records[2]]);
    });

    test('should keep records of different types', () => {
      const records: DnsRecord[] = [
        { name: 'example.com', ttl: 300, class: 'IN', type: 'NS', value: 'ns1.example.com' },
        { name: 'example.com', ttl: 300, class: 'IN', type: 'CNAME', value: 'ns1.example.com' },
      ];

      expect(deduplicateRecords(records)).toHaveLength(2);
    });
  });
});
