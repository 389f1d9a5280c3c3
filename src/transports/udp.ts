import dgram from 'dgram';
import dnsPacket from 'dns-packet';
import { TimeoutError, ConnectionError, ParsingError } from '../errors.js';
import { createDnsPacket } from '../packets.js';
import type { DnsOptions, DnsPacket, DnsQuestion, DnsTransportQuery } from '../types.js';
import { isValidIpv4 } from '../utils.js';

// random 16-bit query id
export function createQueryId(): number {
  return Math.floor(Math.random() * 0x10000);
}

// send a DnsQuestion to a single IPv4 nameserver over UDP and wait for the matching response
export const udpQuery: DnsTransportQuery = async function (
  question: DnsQuestion,
  options: DnsOptions
): Promise<DnsPacket> {
  // queries are only sent over IPv4
  if (!isValidIpv4(question.server)) {
    throw new ConnectionError(`Not an IPv4 nameserver address: '${question.server}'`);
  }

  // create the DNS packet using shared function
  const id = createQueryId();
  const encodedPacket = createDnsPacket(question, id);

  const socket = dgram.createSocket('udp4');

  // wait for the response packet
  return await new Promise<DnsPacket>((resolve, reject) => {
    let isResolved = false;

    // close the socket, only ever called once through safeResolve/safeReject
    const closeSocket = () => {
      // remove all listeners to prevent memory leaks
      socket.removeAllListeners();
      socket.close();
    };

    // per-attempt timeout
    const timeoutId = setTimeout(() => {
      safeReject(
        new TimeoutError(
          `Timeout for query '${question.query}' at '${question.server}' after ${options.timeout}ms`
        )
      );
    }, options.timeout);

    // helper to safely resolve once
    const safeResolve = (response: DnsPacket) => {
      if (!isResolved) {
        isResolved = true;
        clearTimeout(timeoutId);
        closeSocket();
        resolve(response);
      }
    };

    // helper to safely reject once
    const safeReject = (error: Error) => {
      if (!isResolved) {
        isResolved = true;
        clearTimeout(timeoutId);
        closeSocket();
        reject(error);
      }
    };

    // handle the response packet, close socket, and resolve the promise
    socket.on('message', (message: Buffer) => {
      if (isResolved) return;

      let decoded: ReturnType<typeof dnsPacket.decode>;
      try {
        decoded = dnsPacket.decode(message);
      } catch (error) {
        safeReject(new ParsingError(`Failed to decode UDP response: ${String(error)}`));
        return;
      }

      // a datagram for another query (late or spoofed), keep waiting
      if (decoded.id !== id) return;

      safeResolve({ ...decoded, bytes: message.length });
    });

    // handle errors, close socket, and reject the promise
    socket.on('error', (error: Error) => {
      safeReject(new ConnectionError(error.message));
    });

    // send the query packet AFTER event listeners are attached
    socket.send(encodedPacket, 0, encodedPacket.length, options.port, question.server, err => {
      if (err) {
        safeReject(new ConnectionError(`Failed to send UDP query: ${err.message}`));
      }
    });
  });
};
