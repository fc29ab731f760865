// SPDX-License-Identifier: Apache-2.0

/**
 * Interface defining the structure of a configuration property.
 */
export interface ConfigProperty {
  envName: string; // Environment variable name
  type: 'string' | 'number' | 'boolean'; // Data type of the configuration property
  sensitive: boolean; // Whether the value must be masked when logged
  defaultValue: string | number | boolean | null; // Default value (if any)
}

/**
 * Configuration entries understood by the CLI. Values are read from the
 * environment (or a `.env` file) under `envName`, and may be overridden by
 * command-line flags.
 */
const _CONFIG = {
  PROVER_API_KEY: {
    envName: 'PROVER_API_KEY',
    type: 'string',
    sensitive: true,
    defaultValue: null,
  },
  PROVER_API_URL: {
    envName: 'PROVER_API_URL',
    type: 'string',
    sensitive: false,
    defaultValue: 'https://proof.testnet.polymer.zone',
  },
  PROVER_DEBUG: {
    envName: 'PROVER_DEBUG',
    type: 'boolean',
    sensitive: false,
    defaultValue: false,
  },
  PROVER_LOG_LEVEL: {
    envName: 'PROVER_LOG_LEVEL',
    type: 'string',
    sensitive: false,
    defaultValue: 'info',
  },
  PROVER_MAX_ATTEMPTS: {
    envName: 'PROVER_MAX_ATTEMPTS',
    type: 'number',
    sensitive: false,
    defaultValue: 20,
  },
  PROVER_POLL_INTERVAL: {
    envName: 'PROVER_POLL_INTERVAL',
    type: 'number',
    sensitive: false,
    defaultValue: 3000, // ms
  },
  PROVER_REQUEST_TIMEOUT: {
    envName: 'PROVER_REQUEST_TIMEOUT',
    type: 'number',
    sensitive: false,
    defaultValue: 60000, // ms
  },
  PROVER_RPC_URL: {
    envName: 'PROVER_RPC_URL',
    type: 'string',
    sensitive: false,
    defaultValue: null,
  },
} as const satisfies { [key: string]: ConfigProperty }; // Ensures _CONFIG is read-only and conforms to the ConfigProperty structure

export type ConfigKey = keyof typeof _CONFIG;

export class GlobalConfig {
  public static readonly ENTRIES: Record<ConfigKey, ConfigProperty> = _CONFIG;

  public static isConfigKey(name: string): name is ConfigKey {
    return Object.prototype.hasOwnProperty.call(_CONFIG, name);
  }
}
