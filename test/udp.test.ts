import dgram from 'dgram';
import dnsPacket from 'dns-packet';
import { ConnectionError, TimeoutError } from '../src/errors.js';
import { DEFAULT_OPTIONS } from '../src/index.js';
import { udpQuery } from '../src/transports/udp.js';
import type { DnsOptions } from '../src/types.js';

type DecodedQuery = ReturnType<typeof dnsPacket.decode>;

// a response to `query` carrying a single A record
function encodeResponse(query: DecodedQuery, address: string, id = query.id): Buffer {
  return dnsPacket.encode({
    type: 'response',
    id,
    flags: 0,
    questions: query.questions,
    answers: [{ type: 'A', name: 'example.com', ttl: 60, class: 'IN', data: address }],
  });
}

describe('UDP transport', () => {
  let server: dgram.Socket;
  let options: DnsOptions;
  const received: DecodedQuery[] = [];

  beforeEach(async () => {
    received.length = 0;
    server = dgram.createSocket('udp4');
    await new Promise<void>(resolve => server.bind(0, '127.0.0.1', () => resolve()));
    options = { ...DEFAULT_OPTIONS, port: server.address().port, timeout: 2000 };
  });

  afterEach(async () => {
    await new Promise<void>(resolve => server.close(() => resolve()));
  });

  test('should send one iterative query and decode the response', async () => {
    let sentBytes = 0;
    server.on('message', (message, rinfo) => {
      const query = dnsPacket.decode(message);
      received.push(query);
      const response = encodeResponse(query, '93.184.216.34');
      sentBytes = response.length;
      server.send(response, rinfo.port, rinfo.address);
    });

    const packet = await udpQuery(
      { query: 'example.com', type: 'A', server: '127.0.0.1' },
      options
    );

    expect(received).toHaveLength(1);
    expect(received[0].flag_rd).toBe(false);
    expect(received[0].questions).toEqual([{ name: 'example.com', type: 'A', class: 'IN' }]);
    expect(packet.id).toBe(received[0].id);
    expect(packet.bytes).toBe(sentBytes);
    expect(packet.answers?.[0]).toMatchObject({
      type: 'A',
      name: 'example.com',
      data: '93.184.216.34',
    });
  });

  test('should ignore responses with a different query id', async () => {
    server.on('message', (message, rinfo) => {
      const query = dnsPacket.decode(message);
      const foreignId = ((query.id ?? 0) + 1) & 0xffff;
      server.send(encodeResponse(query, '192.0.2.99', foreignId), rinfo.port, rinfo.address);
      server.send(encodeResponse(query, '93.184.216.34'), rinfo.port, rinfo.address);
    });

    const packet = await udpQuery(
      { query: 'example.com', type: 'A', server: '127.0.0.1' },
      options
    );

    expect(packet.answers?.[0]).toMatchObject({ data: '93.184.216.34' });
  });

  test('should time out when the server does not answer', async () => {
    await expect(
      udpQuery(
        { query: 'example.com', type: 'A', server: '127.0.0.1' },
        { ...options, timeout: 100 }
      )
    ).rejects.toThrow(new TimeoutError("Timeout for query 'example.com' at '127.0.0.1' after 100ms"));
  });

  test('should refuse nameservers that are not IPv4 addresses', async () => {
    await expect(
      udpQuery({ query: 'example.com', type: 'A', server: '2001:db8::53' }, options)
    ).rejects.toBeInstanceOf(ConnectionError);
    await expect(
      udpQuery({ query: 'example.com', type: 'A', server: 'a.root-servers.net' }, options)
    ).rejects.toThrow("Not an IPv4 nameserver address: 'a.root-servers.net'");
  });
});
