// SPDX-License-Identifier: Apache-2.0

import { GlobalConfig } from './globalConfig';

export class LoggerService {
  public static readonly SENSITIVE_FIELDS = Object.values(GlobalConfig.ENTRIES)
    .filter((entry) => entry.sensitive)
    .map((entry) => entry.envName);

  /**
   * Hide sensitive information
   *
   * @param envName
   * @param envValue
   */
  static maskUpEnv(envName: string, envValue: string | number | boolean | undefined): string {
    const isSensitiveField: boolean = this.SENSITIVE_FIELDS.indexOf(envName) > -1;

    if (isSensitiveField && envValue !== undefined && envValue !== '') {
      return `${envName} = **********`;
    }

    return `${envName} = ${envValue}`;
  }
}
