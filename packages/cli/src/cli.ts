// SPDX-License-Identifier: Apache-2.0

import type { ConfigKey } from '@log-prover/config-service';
import { parseArgs } from 'node:util';

export const USAGE = `Usage: log-prover <command> [flags]

Request and track proofs of blockchain transaction logs.

Commands:
  request            Request a new proof
  status <jobId>     Check the status of a proof generation job
  version            Print the version number

Request flags:
  --chain-id <n>           Source chain ID
  --block-number <n>       Source block number
  --tx-index <n>           Transaction index in the block
  --log-index <n>          Log index in the transaction
  --tx-hash <hash>         Transaction hash to request a proof for
  --rpc-url <url>          RPC URL of the source chain, required with --tx-hash
  --event-signature <sig>  Event signature identifying the log, e.g. 'Transfer(address,address,uint256)'
  --wait                   Wait for the proof to be generated
  --raw                    Print the proof without formatting

Global flags:
  --config <path>          dotenv file to read (default: nearest .env)
  --api-key <key>          Proof service API key
  --api-url <url>          Proof service URL
  --max-attempts <n>       Maximum number of status polls
  --interval <ms>          Delay between status polls
  --debug                  Enable debug output
  -h, --help               Show this help

Examples:
  log-prover request --chain-id=1 --block-number=17000000 --tx-index=5 --log-index=2
  log-prover request --tx-hash=0x123... --event-signature="Transfer(address,address,uint256)" --wait
  log-prover status 12345
`;

const OPTIONS = {
  config: { type: 'string' },
  'api-key': { type: 'string' },
  'api-url': { type: 'string' },
  'max-attempts': { type: 'string' },
  interval: { type: 'string' },
  debug: { type: 'boolean' },
  help: { type: 'boolean', short: 'h' },
  'chain-id': { type: 'string' },
  'block-number': { type: 'string' },
  'tx-index': { type: 'string' },
  'log-index': { type: 'string' },
  'tx-hash': { type: 'string' },
  'rpc-url': { type: 'string' },
  'event-signature': { type: 'string' },
  wait: { type: 'boolean' },
  raw: { type: 'boolean' },
} as const;

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
    Object.setPrototypeOf(this, UsageError.prototype);
  }
}

export interface GlobalOptions {
  configPath?: string;
  debug: boolean;
  /** Flag values keyed by the configuration entry they override. */
  overrides: Partial<Record<ConfigKey, string>>;
}

/**
 * Flag values of the `request` command, exactly as typed; they are parsed by the command.
 */
export interface RequestArguments {
  chainId?: string;
  blockNumber?: string;
  txIndex?: string;
  logIndex?: string;
  txHash?: string;
  eventSignature?: string;
  wait: boolean;
  raw: boolean;
}

export type ParsedCommandLine =
  | { command: 'help' }
  | { command: 'version' }
  | { command: 'status'; globals: GlobalOptions; jobId: string; raw: boolean }
  | { command: 'request'; globals: GlobalOptions; request: RequestArguments };

const parseFlags = (argv: readonly string[]) => {
  try {
    return parseArgs({ args: [...argv], options: OPTIONS, allowPositionals: true, strict: true });
  } catch (error: unknown) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }
};

export const parseCommandLine = (argv: readonly string[]): ParsedCommandLine => {
  const { values, positionals } = parseFlags(argv);
  const command: string | undefined = positionals[0];
  const args = positionals.slice(1);

  if (values.help) {
    return { command: 'help' };
  }

  const overrides: Partial<Record<ConfigKey, string>> = {};
  if (values['api-key'] !== undefined) overrides.PROVER_API_KEY = values['api-key'];
  if (values['api-url'] !== undefined) overrides.PROVER_API_URL = values['api-url'];
  if (values['max-attempts'] !== undefined) overrides.PROVER_MAX_ATTEMPTS = values['max-attempts'];
  if (values.interval !== undefined) overrides.PROVER_POLL_INTERVAL = values.interval;
  if (values['rpc-url'] !== undefined) overrides.PROVER_RPC_URL = values['rpc-url'];
  if (values.debug) overrides.PROVER_DEBUG = 'true';

  const globals: GlobalOptions = {
    configPath: values.config,
    debug: values.debug ?? false,
    overrides,
  };

  switch (command) {
    case 'version':
      return { command: 'version' };
    case 'status':
      if (args.length !== 1) {
        throw new UsageError(`status accepts 1 argument, received ${args.length}`);
      }
      return { command: 'status', globals, jobId: args[0], raw: values.raw ?? false };
    case 'request':
      if (args.length > 0) {
        throw new UsageError(`unexpected argument: ${args[0]}`);
      }
      return {
        command: 'request',
        globals,
        request: {
          chainId: values['chain-id'],
          blockNumber: values['block-number'],
          txIndex: values['tx-index'],
          logIndex: values['log-index'],
          txHash: values['tx-hash'],
          eventSignature: values['event-signature'],
          wait: values.wait ?? false,
          raw: values.raw ?? false,
        },
      };
    case undefined:
      throw new UsageError('no command given');
    default:
      throw new UsageError(`unknown command "${command}"`);
  }
};
