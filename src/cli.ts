#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import { toDnsError } from './errors.js';
import { formatResults } from './format.js';
import { DnsResolver } from './index.js';
import { createLogger, getLogLevel, type Logger, type LoggerConfig } from './logger.js';
import type { DnsOptions } from './types.js';
import { isValidHostname, normalizeHost } from './utils.js';

const VERSION = '0.1.0';

export interface CliOptions {
  verbose: boolean;
  timeout?: number;
}

// seams for tests: where lines go, how the logger and the resolver are built
export interface CliDependencies {
  write: (line: string) => void;
  createLogger: (service: string, config: LoggerConfig) => Logger;
  createResolver: (options: Partial<DnsOptions>) => DnsResolver;
}

const DEFAULT_DEPENDENCIES: CliDependencies = {
  write: line => process.stdout.write(`${line}\n`),
  createLogger,
  createResolver: options => new DnsResolver(options),
};

function parseTimeout(value: string): number {
  const timeout = Number(value);
  if (!Number.isInteger(timeout) || timeout < 1) {
    throw new InvalidArgumentError('Timeout must be a positive number of milliseconds.');
  }
  return timeout;
}

export function createProgram(deps: Partial<CliDependencies> = {}): Command {
  const {
    write,
    createLogger: makeLogger,
    createResolver,
  } = { ...DEFAULT_DEPENDENCIES, ...deps };
  const program = new Command();

  program
    .name('rootwalk')
    .description('Resolve names iteratively, starting from the root nameservers')
    .version(VERSION)
    .argument('<names...>', 'DNS name(s) to look up')
    .option('-v, --verbose', 'increase output verbosity', false)
    .option('-t, --timeout <ms>', 'per-nameserver timeout in milliseconds', parseTimeout)
    .action(async (names: string[], opts: CliOptions) => {
      const invalid = names.find(name => !isValidHostname(normalizeHost(name)));
      if (invalid !== undefined) {
        program.error(`error: invalid domain name '${invalid}'`);
      }

      const logger = makeLogger('rootwalk', { level: opts.verbose ? 'debug' : getLogLevel() });
      const resolver = createResolver({
        logger,
        ...(opts.timeout !== undefined && { timeout: opts.timeout }),
      });

      // one name at a time, printed as soon as it is resolved
      for (const name of names) {
        const results = await resolver.collect(name);
        for (const line of formatResults(results)) {
          write(line);
        }
      }
    });

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  await createProgram().parseAsync(argv);
}

if (require.main === module) {
  main().catch((error: unknown) => {
    process.stderr.write(`${toDnsError(error).message}\n`);
    process.exitCode = 1;
  });
}
