import { DelegationLocator } from './caches/nameservers.js';
import { ResolutionCache, type CacheKey } from './caches/queries.js';
import {
  A_RECORD,
  AAAA_RECORD,
  CNAME_RECORD,
  DEFAULT_TIMEOUT,
  DNS_PORT,
  DNS_RECORD_TYPES,
  DNS_RESPONSE_CODES,
  MX_RECORD,
  NS_RECORD,
  ROOT_HINTS,
  UNUSABLE_RESPONSE_CODES,
} from './constants.js';
import {
  ConfigurationError,
  ExhaustedNameserversError,
  GluelessDelegationError,
  InvalidResponseError,
  ResolutionLoopError,
  toDnsError,
  type DnsError,
} from './errors.js';
import { createLogger, type Logger } from './logger.js';
import { getResponseCode, parsePacketSection } from './packets.js';
import { udpQuery } from './transports/udp.js';
import type {
  ARecord,
  AaaaRecord,
  CnameRecord,
  DnsAliasChain,
  DnsAliasStep,
  DnsAnswer,
  DnsHopOutcome,
  DnsOptions,
  DnsRecord,
  DnsRecordType,
  DnsResolutionHop,
  DnsResolutionStatus,
  DnsResponseType,
  DnsResults,
  MxRecord,
  NsRecord,
  RecordType,
  ResolutionContext,
} from './types.js';
import { isValidHostname, isValidIpv4, normalizeHost } from './utils.js';

// default options for DnsResolver
export const DEFAULT_OPTIONS: DnsOptions = {
  rootHints: ROOT_HINTS, // where every walk starts without a closer cached delegation
  transport: udpQuery, // one UDP query to one nameserver
  port: DNS_PORT,
  timeout: DEFAULT_TIMEOUT, // per-attempt timeout in ms
  maxReferrals: 32, // referrals and alias restarts per lookup
  maxDepth: 8, // nested glueless lookups
  maxAliases: 16, // CNAME chain length
  concurrency: 4, // names collected in parallel by collectAll
  logger: createLogger('resolver'),
};

// options that must be positive integers
const NUMERIC_OPTIONS = [
  'port',
  'timeout',
  'maxReferrals',
  'maxDepth',
  'maxAliases',
  'concurrency',
] as const;

// a usable response from a single nameserver, parsed into DnsRecords
interface NameserverResponse {
  server: string;
  timestamp: Date;
  elapsed: number;
  authoritative: boolean;
  rcodeName: DnsResponseType | null;
  records: DnsRecord[];
  authorities: DnsRecord[];
  additionals: DnsRecord[];
}

// next nameserver addresses after a referral, or why there are none
interface ReferralTargets {
  addresses: string[];
  error: DnsError | null;
}

// outcome of trying every nameserver of a cycle
type NameserverAttempt =
  | { response: NameserverResponse; error: null }
  | { response: null; error: DnsError };

export class DnsResolver {
  // the resolver-level options
  options: DnsOptions;

  // answers, delegations and glue learned so far
  cache: ResolutionCache;

  // finds the closest cached delegation for a name
  locator: DelegationLocator;

  protected logger: Logger;

  constructor(opts?: Partial<DnsOptions>) {
    this.options = this.getOptions(opts);
    this.logger = this.options.logger;
    this.cache = new ResolutionCache();
    this.locator = new DelegationLocator(this.cache, this.options.rootHints);
  }

  // merge partial options over the defaults and validate them
  protected getOptions(opts: Partial<DnsOptions> = {}): DnsOptions {
    const options: DnsOptions = {
      ...DEFAULT_OPTIONS,
      ...opts,
    };

    for (const key of NUMERIC_OPTIONS) {
      const value = options[key];
      if (!Number.isInteger(value) || value < 1) {
        throw new ConfigurationError(`Invalid ${key}: ${String(value)}`);
      }
    }

    if (options.rootHints.length === 0) {
      throw new ConfigurationError('At least one root hint is required');
    }
    const invalidHint = options.rootHints.find(hint => !isValidIpv4(hint));
    if (invalidHint !== undefined) {
      throw new ConfigurationError(`Invalid root hint: '${invalidHint}' is not an IPv4 address`);
    }
    return options;
  }

  // look up a single name and record type, walking from the closest known delegation
  public async lookup(name: string, type: RecordType = A_RECORD): Promise<DnsAnswer> {
    return await this.resolve(this.createQuestion(name, type), { depth: 0, stack: [] });
  }

  // follow the CNAME chain of a name to its terminal (non-alias) name
  public async resolveChain(name: string): Promise<DnsAliasChain> {
    let current = this.createQuestion(name, CNAME_RECORD).query;
    const aliases: DnsAliasStep[] = [];
    const seen = new Set([current]);

    for (;;) {
      const answer = await this.resolve(
        { query: current, type: CNAME_RECORD },
        { depth: 0, stack: [] }
      );
      const cnames = answer.records.filter((r): r is CnameRecord => r.type === CNAME_RECORD);
      const cname = cnames.find(r => normalizeHost(r.name) === current) ?? cnames[0];
      if (!cname) {
        return { name: current, aliases, error: null };
      }

      // one more step would go over the limit
      if (aliases.length >= this.options.maxAliases) {
        return {
          name: current,
          aliases,
          error: new ResolutionLoopError(
            `CNAME chain of '${name}' is longer than ${this.options.maxAliases} aliases`
          ),
        };
      }

      const target = normalizeHost(cname.value);
      aliases.push({ alias: current, name: target });
      this.logger.debug('Alias', { alias: current, name: target });

      if (seen.has(target)) {
        return {
          name: current,
          aliases,
          error: new ResolutionLoopError(`CNAME loop: '${target}' was already visited`),
        };
      }

      seen.add(target);
      current = target;
    }
  }

  // collect the CNAME chain and the A, AAAA and MX records of its terminal name
  public async collect(name: string): Promise<DnsResults> {
    const chain = await this.resolveChain(name);
    const results: DnsResults = { CNAME: chain.aliases, A: [], AAAA: [], MX: [] };

    if (chain.error) {
      this.logger.warn('Alias chain did not terminate', {
        query: name,
        error: chain.error.message,
      });
      return results;
    }

    // independent lookups, the shared cache keeps the first answer for every key
    const root: ResolutionContext = { depth: 0, stack: [] };
    const [a, aaaa, mx] = await Promise.all([
      this.resolve({ query: chain.name, type: A_RECORD }, root),
      this.resolve({ query: chain.name, type: AAAA_RECORD }, root),
      this.resolve({ query: chain.name, type: MX_RECORD }, root),
    ]);

    for (const answer of [a, aaaa, mx]) {
      if (answer.status !== 'answer') {
        this.logger.debug('No records', {
          query: answer.query,
          type: answer.type,
          status: answer.status,
          rcode: answer.rcodeName,
          error: answer.error?.message,
        });
      }
    }

    results.A = a.records
      .filter((r): r is ARecord => r.type === A_RECORD)
      .map(r => ({ name: r.name, address: r.address }));
    results.AAAA = aaaa.records
      .filter((r): r is AaaaRecord => r.type === AAAA_RECORD)
      .map(r => ({ name: r.name, address: r.address }));
    results.MX = mx.records
      .filter((r): r is MxRecord => r.type === MX_RECORD)
      .map(r => ({ name: r.name, preference: r.preference, exchange: r.exchange }));
    return results;
  }

  // collect several names in parallel up to the concurrency limit, in input order
  public async collectAll(names: string[]): Promise<DnsResults[]> {
    // reject malformed names before any query is sent
    for (const name of names) {
      this.createQuestion(name, A_RECORD);
    }

    const results: DnsResults[] = [];
    for (let i = 0; i < names.length; i += this.options.concurrency) {
      const batch = names.slice(i, i + this.options.concurrency);
      results.push(...(await Promise.all(batch.map(name => this.collect(name)))));
    }
    return results;
  }

  // validate and normalize a user-supplied name and record type
  protected createQuestion(name: string, type: RecordType): CacheKey {
    const upper = type.toUpperCase();
    const recordType = DNS_RECORD_TYPES.find(t => t === upper);
    if (!recordType) {
      throw new ConfigurationError(`Invalid record type: ${type}`);
    }
    const query = normalizeHost(name);
    if (!isValidHostname(query)) {
      throw new ConfigurationError(`Invalid domain name: '${name}'`);
    }
    return { query, type: recordType };
  }

  // serve a question from the cache, or walk the delegation tree for it
  protected async resolve(question: CacheKey, context: ResolutionContext): Promise<DnsAnswer> {
    const cached = this.cache.get(question);
    if (cached) {
      return cached;
    }

    const key = ResolutionCache.makeKey(question);
    if (context.stack.includes(key)) {
      return this.failed(
        question,
        new ResolutionLoopError(`'${question.query}' (${question.type}) depends on itself`)
      );
    }
    if (context.depth > this.options.maxDepth) {
      return this.failed(
        question,
        new ResolutionLoopError(
          `Nameserver lookups for '${question.query}' nested deeper than ${this.options.maxDepth} levels`
        )
      );
    }

    return await this.iterate(question, { depth: context.depth, stack: [...context.stack, key] });
  }

  // the iterative walk: query, classify the response, narrow the delegation, repeat
  protected async iterate(question: CacheKey, context: ResolutionContext): Promise<DnsAnswer> {
    const trace: DnsResolutionHop[] = [];
    let target = normalizeHost(question.query);
    let nameservers = this.locator.closestDelegation(target);

    for (let cycle = 0; cycle < this.options.maxReferrals; cycle++) {
      const attempt = await this.queryNameservers(
        { query: target, type: question.type },
        nameservers,
        trace
      );

      // every nameserver failed, nothing could be determined
      if (attempt.error) {
        const error = new ExhaustedNameserversError(
          `All ${nameservers.length} nameservers failed for '${target}' (${question.type}): ${attempt.error.message}`
        );
        this.logger.warn('Nameservers exhausted', {
          query: question.query,
          type: question.type,
          error: error.message,
        });
        return this.cache.set(
          question,
          this.createAnswer(question, { status: 'exhausted', error, trace })
        );
      }

      const response = attempt.response;
      const { records, authorities } = response;

      // response has answers
      if (records.length > 0) {
        const cname = records.find((r): r is CnameRecord => r.type === CNAME_RECORD);

        // CNAME lookups never chase the alias
        if (question.type === CNAME_RECORD) {
          this.addHop(trace, target, question.type, response, cname ? 'answer' : 'nodata');
          const answer = cname
            ? this.fromResponse(question, response, 'answer', trace)
            : this.fromResponse(question, response, 'nodata', trace, { records: [] });
          return this.cache.set(question, answer);
        }

        // an alias without the requested records: restart from the root for the target.
        // a CNAME that arrives with records of the requested type is returned as is
        if (cname && !records.some(r => r.type === question.type)) {
          this.addHop(trace, target, question.type, response, 'alias');
          this.logger.debug('Following alias', { from: target, to: cname.value });
          target = normalizeHost(cname.value);
          nameservers = [...this.options.rootHints];
          continue;
        }

        this.addHop(trace, target, question.type, response, 'answer');
        return this.cache.set(question, this.fromResponse(question, response, 'answer', trace));
      }

      // response has nameserver referrals
      const nsRecords = authorities.filter((r): r is NsRecord => r.type === NS_RECORD);
      if (nsRecords.length > 0 && !response.authoritative) {
        this.addHop(trace, target, question.type, response, 'referral');
        const zone = normalizeHost(nsRecords[0].name);
        this.logger.debug('Referral', {
          query: target,
          zone,
          nameservers: nsRecords.map(r => r.value),
        });

        const next = await this.followReferral(zone, nsRecords, response, context);
        if (next.addresses.length === 0) {
          return this.failed(
            question,
            next.error ??
              new GluelessDelegationError(`No address found for any nameserver of '${zone}'`),
            trace
          );
        }
        nameservers = next.addresses;
        continue;
      }

      // no answer and no referral: the name or the record does not exist
      this.addHop(trace, target, question.type, response, 'nodata');
      return this.cache.set(question, this.fromResponse(question, response, 'nodata', trace));
    }

    return this.failed(
      question,
      new ResolutionLoopError(
        `Gave up on '${question.query}' (${question.type}) after ${this.options.maxReferrals} referrals`
      ),
      trace
    );
  }

  // try each nameserver in order, once, until one gives a usable response
  protected async queryNameservers(
    question: CacheKey,
    nameservers: readonly string[],
    trace: DnsResolutionHop[]
  ): Promise<NameserverAttempt> {
    let lastError: DnsError = new ExhaustedNameserversError(
      `No nameservers to query for '${question.query}'`
    );

    for (const server of nameservers) {
      // track query elapsed time
      const timestamp = new Date();
      const startTime = performance.now();

      try {
        const packet = await this.options.transport({ ...question, server }, this.options);
        const elapsed = Math.round(performance.now() - startTime);
        const rcodeName = getResponseCode(packet.flags);

        // SERVFAIL, REFUSED and friends: this server cannot help, try the next one
        if (UNUSABLE_RESPONSE_CODES.some(code => code === rcodeName)) {
          lastError = new InvalidResponseError(
            `Server '${server}' answered ${String(rcodeName)} for '${question.query}' (${question.type})`
          );
          trace.push({ ...question, server, timestamp, elapsed, rcodeName, outcome: 'error' });
          this.logger.debug('Unusable response', { server, query: question.query, rcodeName });
          continue;
        }

        return {
          response: {
            server,
            timestamp,
            elapsed,
            authoritative: packet.flag_aa ?? false,
            rcodeName,
            records: parsePacketSection(packet.answers),
            authorities: parsePacketSection(packet.authorities),
            additionals: parsePacketSection(packet.additionals),
          },
          error: null,
        };
      } catch (error) {
        // timeouts and connection failures move on to the next nameserver, no retry
        lastError = toDnsError(error);
        trace.push({
          ...question,
          server,
          timestamp,
          elapsed: Math.round(performance.now() - startTime),
          rcodeName: null,
          outcome: 'error',
        });
        this.logger.debug('Nameserver attempt failed', {
          server,
          query: question.query,
          type: question.type,
          error: lastError.message,
        });
      }
    }

    return { response: null, error: lastError };
  }

  // cache the delegation and its glue, and work out the addresses of the next nameserver set
  protected async followReferral(
    zone: string,
    nsRecords: NsRecord[],
    response: NameserverResponse,
    context: ResolutionContext
  ): Promise<ReferralTargets> {
    this.cache.set(
      { query: zone, type: NS_RECORD },
      this.createAnswer(
        { query: zone, type: NS_RECORD },
        { status: 'answer', server: response.server, records: nsRecords }
      )
    );

    // glue: A records in the additional section owned by one of the NS targets
    const addresses: string[] = [];
    for (const ns of nsRecords) {
      const host = normalizeHost(ns.value);
      const glue = response.additionals.filter(
        (r): r is ARecord => r.type === A_RECORD && normalizeHost(r.name) === host
      );
      if (glue.length === 0) continue;

      this.cache.set(
        { query: host, type: A_RECORD },
        this.createAnswer(
          { query: host, type: A_RECORD },
          { status: 'answer', server: response.server, records: glue }
        )
      );
      addresses.push(...glue.map(r => r.address).filter(ip => !addresses.includes(ip)));
    }
    if (addresses.length > 0) {
      return { addresses, error: null };
    }

    // glueless delegation: resolve the nameserver names themselves, first success wins
    let loopError: DnsError | null = null;
    for (const ns of nsRecords) {
      this.logger.debug('Glueless delegation', { zone, nameserver: ns.value });
      const nested = await this.resolve(
        { query: ns.value, type: A_RECORD },
        { depth: context.depth + 1, stack: context.stack }
      );
      const found = nested.records
        .filter((r): r is ARecord => r.type === A_RECORD)
        .map(r => r.address);
      if (found.length > 0) {
        return { addresses: [...new Set(found)], error: null };
      }
      if (nested.error instanceof ResolutionLoopError) {
        loopError = nested.error;
      }
    }
    // a nested lookup that hit a loop or the depth limit is reported as such
    return { addresses: [], error: loopError };
  }

  // record a hop that got a usable response
  protected addHop(
    trace: DnsResolutionHop[],
    query: string,
    type: DnsRecordType,
    response: NameserverResponse,
    outcome: DnsHopOutcome
  ): void {
    trace.push({
      server: response.server,
      query,
      type,
      timestamp: response.timestamp,
      elapsed: response.elapsed,
      rcodeName: response.rcodeName,
      outcome,
    });
  }

  // a lookup cut short; returned to the caller but never cached
  protected failed(
    question: CacheKey,
    error: DnsError,
    trace: DnsResolutionHop[] = []
  ): DnsAnswer {
    this.logger.warn('Lookup failed', {
      query: question.query,
      type: question.type,
      error: error.message,
    });
    return this.createAnswer(question, { status: 'failed', error, trace });
  }

  // build a DnsAnswer from a nameserver response
  protected fromResponse(
    question: CacheKey,
    response: NameserverResponse,
    status: DnsResolutionStatus,
    trace: DnsResolutionHop[],
    overrides?: Partial<DnsAnswer>
  ): DnsAnswer {
    return this.createAnswer(question, {
      status,
      server: response.server,
      rcode: response.rcodeName ? DNS_RESPONSE_CODES[response.rcodeName] : null,
      rcodeName: response.rcodeName,
      records: response.records,
      authorities: response.authorities,
      additionals: response.additionals,
      trace,
      ...overrides,
    });
  }

  // create a DnsAnswer object with optional overrides, empty by default
  protected createAnswer(question: CacheKey, overrides?: Partial<DnsAnswer>): DnsAnswer {
    return {
      query: normalizeHost(question.query),
      type: question.type,
      status: 'nodata',
      server: null,
      rcode: null,
      rcodeName: null,
      error: null,
      records: [],
      authorities: [],
      additionals: [],
      trace: [],
      ...overrides,
    };
  }
}

// export types and constants
export type * from './types.js';
export type { CacheKey } from './caches/queries.js';
export { ResolutionCache } from './caches/queries.js';
export { DelegationLocator } from './caches/nameservers.js';
export { udpQuery } from './transports/udp.js';
export { createDnsPacket, getResponseCode, parsePacketAnswer } from './packets.js';
export { createLogger, type Logger, type LogLevel } from './logger.js';
export * from './constants.js';
export * from './utils.js';
export * from './errors.js';
export * from './format.js';
