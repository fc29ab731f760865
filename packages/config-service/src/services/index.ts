// SPDX-License-Identifier: Apache-2.0

import dotenv, { DotenvPopulateInput } from 'dotenv';
import findConfig from 'find-config';
import type { Logger } from 'pino';

import { ConfigurationError } from './configurationError';
import { ConfigKey, GlobalConfig } from './globalConfig';
import { LoggerService } from './loggerService';
import type { ProverConfig } from './proverConfig';
import { TypedEnvs, ValidationService } from './validationService';

export interface ConfigLoadOptions {
  /**
   * Process environment, lower precedence than `overrides`. Defaults to `process.env`.
   */
  envs?: NodeJS.Dict<string>;

  /**
   * Values taken from command-line flags, keyed by env name. Highest precedence.
   */
  overrides?: Partial<Record<ConfigKey, string>>;

  /**
   * Explicit path of a dotenv file. When omitted, the nearest `.env` is used if one exists.
   */
  configPath?: string;

  logger: Logger;
}

export class ConfigService {
  /**
   * @private
   */
  private static readonly envFileName: string = '.env';

  /**
   * Builds the configuration value object from defaults, the dotenv file, the
   * environment and the overrides, in increasing order of precedence.
   *
   * The result is frozen; it is created once at start-up and passed by
   * reference to every collaborator.
   *
   * @throws ConfigurationError if a value cannot be converted to its declared type
   */
  public static load(options: ConfigLoadOptions): ProverConfig {
    const logger = options.logger.child({ name: 'config-service' });
    const fileEnvs = ConfigService.readEnvFile(options.configPath, logger);

    const merged: NodeJS.Dict<string> = { ...fileEnvs };
    for (const [name, value] of Object.entries(options.envs ?? process.env)) {
      if (GlobalConfig.isConfigKey(name) && value !== undefined) {
        merged[name] = value;
      }
    }
    for (const [name, value] of Object.entries(options.overrides ?? {})) {
      if (value !== undefined) {
        merged[name] = value;
      }
    }

    // validate formats
    ValidationService.startUp(merged);

    // transform string representations of env vars into proper types
    const envs = ValidationService.typeCasting(merged);

    // PROVER_DEBUG set in the environment or the file turns on the dump just like --debug
    if (envs.PROVER_DEBUG === true && options.logger.level !== 'silent') {
      logger.level = 'debug';
    }

    // printing current configuration, masking up sensitive information
    if (logger.isLevelEnabled('debug')) {
      for (const name of Object.keys(GlobalConfig.ENTRIES)) {
        if (GlobalConfig.isConfigKey(name)) {
          logger.debug(LoggerService.maskUpEnv(name, envs[name]));
        }
      }
    }

    const rpcUrl = ConfigService.readString(envs, 'PROVER_RPC_URL');
    const config: ProverConfig = {
      apiKey: ConfigService.readString(envs, 'PROVER_API_KEY') ?? '',
      apiUrl: ConfigService.readString(envs, 'PROVER_API_URL') ?? '',
      debug: ConfigService.readBoolean(envs, 'PROVER_DEBUG'),
      logLevel: ConfigService.readString(envs, 'PROVER_LOG_LEVEL') ?? 'info',
      maxAttempts: ConfigService.readNumber(envs, 'PROVER_MAX_ATTEMPTS'),
      pollInterval: ConfigService.readNumber(envs, 'PROVER_POLL_INTERVAL'),
      requestTimeout: ConfigService.readNumber(envs, 'PROVER_REQUEST_TIMEOUT'),
      ...(rpcUrl ? { rpcUrl } : {}),
    };

    return Object.freeze(config);
  }

  private static readEnvFile(configPath: string | undefined, logger: Logger): DotenvPopulateInput {
    const fileEnvs: DotenvPopulateInput = {};
    const path = configPath ?? findConfig(ConfigService.envFileName);

    if (!path) {
      logger.debug(`No ${ConfigService.envFileName} file is found, using environment and defaults only.`);
      return fileEnvs;
    }

    const result = dotenv.config({ path, processEnv: fileEnvs });
    if (result.error) {
      if (configPath) {
        throw new ConfigurationError(`unable to read config file ${configPath}: ${result.error.message}`);
      }
      logger.warn(`Unable to read ${path}: ${result.error.message}`);
      return {};
    }

    logger.debug(`Using config file: ${path}`);
    return fileEnvs;
  }

  private static readString(envs: TypedEnvs, name: ConfigKey): string | undefined {
    const value = envs[name];
    return typeof value === 'string' ? value : undefined;
  }

  private static readNumber(envs: TypedEnvs, name: ConfigKey): number {
    const value = envs[name];
    return typeof value === 'number' ? value : NaN;
  }

  private static readBoolean(envs: TypedEnvs, name: ConfigKey): boolean {
    return envs[name] === true;
  }
}

export { ConfigurationError } from './configurationError';
export { GlobalConfig } from './globalConfig';
export type { ConfigKey, ConfigProperty } from './globalConfig';
export { LoggerService } from './loggerService';
export type { ProverConfig } from './proverConfig';
export { ValidationService } from './validationService';
export type { TypedEnvs } from './validationService';
