// SPDX-License-Identifier: Apache-2.0

import dotenv from 'dotenv';
import path from 'path';

import { type ConfigKey, type ConfigProperty, type ConfigValues, GlobalConfig } from './globalConfig';

export class ConfigService {
  /**
   * The name of the file dotenv loads once, relative to the working directory.
   * @private
   */
  private static readonly envFileName: string = '.env';

  private static envLoaded = false;

  private static loadEnvFile(): void {
    if (!ConfigService.envLoaded) {
      dotenv.config({ path: path.resolve(process.cwd(), ConfigService.envFileName) });
      ConfigService.envLoaded = true;
    }
  }

  private static read<T>(entry: ConfigProperty<T>): T {
    const raw = process.env[entry.envName];
    if (raw === undefined || raw === '') {
      return entry.defaultValue;
    }
    return entry.parse(raw);
  }

  /**
   * Get the typed value of a configuration key.
   * Values are read from the environment on every call, so changes made to
   * `process.env` after startup are picked up.
   *
   * @throws {Error} when the environment holds a value the key's type cannot take
   */
  public static get<K extends ConfigKey>(name: K): ConfigValues[K] {
    ConfigService.loadEnvFile();
    const entry: ConfigProperty<ConfigValues[K]> = GlobalConfig.ENTRIES[name];
    return ConfigService.read(entry);
  }

  /**
   * Resolve every entry, failing on the first invalid one.
   */
  public static validate(): void {
    ConfigService.getAll();
  }

  /**
   * All resolved configuration values, keyed by environment variable name.
   */
  public static getAll(): Record<string, unknown> {
    ConfigService.loadEnvFile();
    const values: Record<string, unknown> = {};
    for (const entry of Object.values(GlobalConfig.ENTRIES)) {
      values[entry.envName] = ConfigService.read<unknown>(entry);
    }
    return values;
  }
}
