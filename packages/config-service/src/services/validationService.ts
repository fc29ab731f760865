// SPDX-License-Identifier: Apache-2.0

import { ConfigurationError } from './configurationError';
import { ConfigKey, GlobalConfig } from './globalConfig';
import type { ProverConfig } from './proverConfig';

export type ConfigValue = string | number | boolean;
export type TypedEnvs = Partial<Record<ConfigKey, ConfigValue>>;

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

export class ValidationService {
  /**
   * Validate value formats on start-up
   * @param envs
   */
  static startUp(envs: NodeJS.Dict<string>): void {
    Object.entries(GlobalConfig.ENTRIES).forEach(([entryName, entryInfo]) => {
      const present = Object.prototype.hasOwnProperty.call(envs, entryName) && envs[entryName] !== undefined;

      if (!present) {
        return;
      }

      const raw = envs[entryName] ?? '';
      if (entryInfo.type === 'number' && (raw.trim() === '' || isNaN(Number(raw)))) {
        throw new ConfigurationError(`${entryName} must be a valid number.`);
      }

      if (entryInfo.type === 'boolean' && !['true', 'false', '1', '0', ''].includes(raw.toLowerCase())) {
        throw new ConfigurationError(`${entryName} must be either true or false.`);
      }
    });
  }

  /**
   * Transform string environment variables to their proper types based on GlobalConfig.ENTRIES.
   * For each entry:
   * - If the env var is missing but has a default value, use the default
   * - For 'number' type, converts to Number
   * - For 'boolean' type, converts 'true' or '1' to true
   * - For 'string' type, keeps as string
   *
   * Variables that are not configuration entries are dropped.
   *
   * @param envs - Dictionary of environment variables and their string values
   * @returns Dictionary with environment variables cast to their proper types
   */
  static typeCasting(envs: NodeJS.Dict<string>): TypedEnvs {
    const typeCastedEnvs: TypedEnvs = {};

    Object.entries(GlobalConfig.ENTRIES).forEach(([entryName, entryInfo]) => {
      if (!GlobalConfig.isConfigKey(entryName)) {
        return;
      }

      const raw = envs[entryName];
      if (raw === undefined) {
        if (entryInfo.defaultValue != null) {
          typeCastedEnvs[entryName] = entryInfo.defaultValue;
        }
        return;
      }

      switch (entryInfo.type) {
        case 'number':
          typeCastedEnvs[entryName] = Number(raw);
          break;
        case 'boolean':
          typeCastedEnvs[entryName] = raw.toLowerCase() === 'true' || raw === '1';
          break;
        default:
          // handle "string" type
          typeCastedEnvs[entryName] = raw;
      }
    });

    return typeCastedEnvs;
  }

  /**
   * Checks the assembled configuration before any client is constructed.
   * @param config
   */
  static validate(config: ProverConfig): void {
    if (!config.apiKey) {
      throw new ConfigurationError(
        'API key is required. Set it using --api-key flag, PROVER_API_KEY environment variable, or in the .env file.',
      );
    }

    if (!config.apiUrl) {
      throw new ConfigurationError('API URL must not be empty.');
    }

    const positiveIntegers: Array<[string, number]> = [
      ['max-attempts', config.maxAttempts],
      ['interval', config.pollInterval],
      ['request timeout', config.requestTimeout],
    ];
    for (const [label, value] of positiveIntegers) {
      if (!Number.isInteger(value) || value <= 0) {
        throw new ConfigurationError(`${label} must be greater than 0`);
      }
    }

    if (!LOG_LEVELS.includes(config.logLevel)) {
      throw new ConfigurationError(`log level must be one of ${LOG_LEVELS.join(', ')}`);
    }
  }
}
