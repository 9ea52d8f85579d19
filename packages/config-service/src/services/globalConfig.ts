// SPDX-License-Identifier: Apache-2.0

/**
 * Resolved value type of every supported configuration key.
 */
export interface ConfigValues {
  BATCH_REQUESTS_DISALLOWED_METHODS: string[];
  BATCH_REQUESTS_ENABLED: boolean;
  BATCH_REQUESTS_MAX_SIZE: number;
  CHAIN_ID: string | undefined;
  ESTIMATE_GAS_THROWS: boolean;
  INPUT_SIZE_LIMIT: number;
  LOG_LEVEL: string;
  PROTOCOL_VERSION: number;
  REQUEST_ID_IS_OPTIONAL: boolean;
  SERVER_PORT: number;
}

export type ConfigKey = keyof ConfigValues;

export interface ConfigProperty<T> {
  envName: string;
  defaultValue: T;
  parse: (raw: string) => T;
}

type ConfigEntries = { readonly [K in ConfigKey]: ConfigProperty<ConfigValues[K]> };

const configError = (envName: string, expectation: string, raw: string): Error =>
  new Error(`Configuration error: ${envName} ${expectation}, received '${raw}'`);

const asNumber =
  (envName: string) =>
  (raw: string): number => {
    const value = Number(raw);
    if (raw.trim() === '' || Number.isNaN(value)) {
      throw configError(envName, 'must be a number', raw);
    }
    return value;
  };

const asBoolean =
  (envName: string) =>
  (raw: string): boolean => {
    const normalized = raw.trim().toLowerCase();
    if (normalized === 'true') return true;
    if (normalized === 'false') return false;
    throw configError(envName, 'must be true or false', raw);
  };

const asString = (raw: string): string => raw;

const asStringArray =
  (envName: string) =>
  (raw: string): string[] => {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      throw configError(envName, 'must be a JSON array of strings', raw);
    }
    if (!Array.isArray(parsed) || !parsed.every((item): item is string => typeof item === 'string')) {
      throw configError(envName, 'must be a JSON array of strings', raw);
    }
    return parsed;
  };

/**
 * Chain ids are served as hex quantities; decimal input is converted.
 */
const asChainId = (raw: string): string => {
  const value = raw.trim();
  if (/^0x[0-9a-fA-F]+$/.test(value) || /^[0-9]+$/.test(value)) {
    return '0x' + BigInt(value).toString(16);
  }
  throw configError('CHAIN_ID', 'must be a decimal or 0x-prefixed hex number', raw);
};

export class GlobalConfig {
  public static readonly ENTRIES: ConfigEntries = {
    BATCH_REQUESTS_DISALLOWED_METHODS: {
      envName: 'BATCH_REQUESTS_DISALLOWED_METHODS',
      defaultValue: [],
      parse: asStringArray('BATCH_REQUESTS_DISALLOWED_METHODS'),
    },
    BATCH_REQUESTS_ENABLED: {
      envName: 'BATCH_REQUESTS_ENABLED',
      defaultValue: true,
      parse: asBoolean('BATCH_REQUESTS_ENABLED'),
    },
    BATCH_REQUESTS_MAX_SIZE: {
      envName: 'BATCH_REQUESTS_MAX_SIZE',
      defaultValue: 100,
      parse: asNumber('BATCH_REQUESTS_MAX_SIZE'),
    },
    CHAIN_ID: {
      envName: 'CHAIN_ID',
      defaultValue: undefined,
      parse: asChainId,
    },
    // when false, a reverting estimate returns the gas cap instead of an error
    ESTIMATE_GAS_THROWS: {
      envName: 'ESTIMATE_GAS_THROWS',
      defaultValue: true,
      parse: asBoolean('ESTIMATE_GAS_THROWS'),
    },
    INPUT_SIZE_LIMIT: {
      envName: 'INPUT_SIZE_LIMIT',
      defaultValue: 1,
      parse: asNumber('INPUT_SIZE_LIMIT'),
    },
    LOG_LEVEL: {
      envName: 'LOG_LEVEL',
      defaultValue: 'info',
      parse: asString,
    },
    PROTOCOL_VERSION: {
      envName: 'PROTOCOL_VERSION',
      defaultValue: 65,
      parse: asNumber('PROTOCOL_VERSION'),
    },
    REQUEST_ID_IS_OPTIONAL: {
      envName: 'REQUEST_ID_IS_OPTIONAL',
      defaultValue: false,
      parse: asBoolean('REQUEST_ID_IS_OPTIONAL'),
    },
    SERVER_PORT: {
      envName: 'SERVER_PORT',
      defaultValue: 7546,
      parse: asNumber('SERVER_PORT'),
    },
  };
}
