import { formatResults } from '../src/format.js';

describe('formatResults', () => {
  test('should print one line per record in CNAME, A, AAAA, MX order', () => {
    const lines = formatResults({
      MX: [
        { name: 'example.com', preference: 10, exchange: 'mail.example.com' },
        { name: 'example.com', preference: 20, exchange: 'backup.example.com' },
      ],
      AAAA: [{ name: 'example.com', address: '2001:db8::1' }],
      A: [{ name: 'example.com', address: '93.184.216.34' }],
      CNAME: [{ alias: 'www.example.com', name: 'example.com' }],
    });

    expect(lines).toEqual([
      'www.example.com is an alias for example.com',
      'example.com has address 93.184.216.34',
      'example.com has IPv6 address 2001:db8::1',
      'example.com mail is handled by 10 mail.example.com',
      'example.com mail is handled by 20 backup.example.com',
    ]);
  });

  test('should print nothing for empty results', () => {
    expect(formatResults({ CNAME: [], A: [], AAAA: [], MX: [] })).toEqual([]);
  });
});
