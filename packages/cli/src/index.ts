// SPDX-License-Identifier: Apache-2.0

import { ConfigService, ProverConfig, ValidationService } from '@log-prover/config-service';
import { BlockchainResolver, ProofServiceClient } from '@log-prover/prover';
import type { Logger } from 'pino';

import { GlobalOptions, parseCommandLine, USAGE, UsageError } from './cli';
import { runRequest } from './commands/request';
import { runStatus } from './commands/status';
import { runVersion } from './commands/version';
import { createLogger } from './logger';
import type { OutputStream } from './output';

export interface CliDependencies {
  stdout: OutputStream;
  stderr: OutputStream;
  envs: NodeJS.Dict<string>;
  createLogger: (level: string) => Logger;
  createProofService: (config: ProverConfig, logger: Logger) => ProofServiceClient;
  createResolver: (config: ProverConfig, logger: Logger) => BlockchainResolver;
}

const defaultDependencies = (): CliDependencies => ({
  stdout: process.stdout,
  stderr: process.stderr,
  envs: process.env,
  createLogger,
  createProofService: (config, logger) => new ProofServiceClient(config, logger),
  createResolver: (config, logger) => new BlockchainResolver(logger, { timeout: config.requestTimeout }),
});

const loadConfig = (globals: GlobalOptions, envs: NodeJS.Dict<string>, logger: Logger): ProverConfig => {
  const config = ConfigService.load({ envs, overrides: globals.overrides, configPath: globals.configPath, logger });
  ValidationService.validate(config);
  return config;
};

/**
 * Runs one command and resolves to the process exit code. Never rejects.
 */
export const main = async (argv: readonly string[], overrides: Partial<CliDependencies> = {}): Promise<number> => {
  const deps: CliDependencies = { ...defaultDependencies(), ...overrides };
  const controller = new AbortController();
  const onSigint = () => controller.abort();
  process.once('SIGINT', onSigint);

  try {
    const parsed = parseCommandLine(argv);
    if (parsed.command === 'help') {
      deps.stdout.write(USAGE);
      return 0;
    }
    if (parsed.command === 'version') {
      runVersion(deps.stdout);
      return 0;
    }

    const rootLogger = deps.createLogger(parsed.globals.debug ? 'debug' : 'info');
    const config = loadConfig(parsed.globals, deps.envs, rootLogger);
    rootLogger.level = config.debug ? 'debug' : config.logLevel;

    const logger = rootLogger.child({ name: 'cli' });
    const context = { config, logger, stdout: deps.stdout, signal: controller.signal };
    const proofService = deps.createProofService(config, rootLogger.child({ name: 'proof-service' }));

    if (parsed.command === 'status') {
      await runStatus(parsed.jobId, parsed.raw, context, proofService);
    } else {
      const resolver = deps.createResolver(config, rootLogger.child({ name: 'blockchain-resolver' }));
      await runRequest(parsed.request, context, { proofService, resolver });
    }
    return 0;
  } catch (error: unknown) {
    deps.stderr.write(`Error: ${error instanceof Error ? error.message : String(error)}\n`);
    if (error instanceof UsageError) {
      deps.stderr.write(`\n${USAGE}`);
    }
    return 1;
  } finally {
    process.off('SIGINT', onSigint);
  }
};

export const run = async (): Promise<void> => {
  process.exitCode = await main(process.argv.slice(2));
};
