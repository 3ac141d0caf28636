import {
  createConfigValue,
  FileConfig,
  fileConfigAccessorFactory,
  IWritableConfigValue
} from 'app/server/lib/config';

const SHA256_HEX = /^[0-9a-f]{64}$/;

/**
 * Format of the access config file on disk - V1
 */
export interface AccessConfigFileV1 {
  version: "1";
  passwordHash?: string;
}

/**
 * Latest access config file format
 */
export type AccessConfigFileLatest = AccessConfigFileV1;

/**
 * Access settings persisted between runs.
 */
export interface AccessConfig {
  passwordHash: IWritableConfigValue<string>;
}

/**
 * Checks the contents of an access config file. An empty object (as for a file that doesn't exist
 * yet) is upgraded to V1. Properties this version doesn't know about are kept.
 */
export function convertToAccessFileContents(input: unknown): AccessConfigFileLatest | null {
  if (typeof input !== 'object' || input === null || Array.isArray(input)) {
    return null;
  }
  const version = 'version' in input ? input.version : undefined;
  if (version !== undefined && version !== "1") {
    throw new Error(`unsupported version ${JSON.stringify(version)}`);
  }
  const passwordHash = 'passwordHash' in input ? input.passwordHash : undefined;
  if (passwordHash !== undefined && (typeof passwordHash !== 'string' || !SHA256_HEX.test(passwordHash))) {
    throw new Error('passwordHash should be a lowercase hex SHA-256 digest');
  }
  const contents: AccessConfigFileLatest = {...input, version: "1"};
  if (passwordHash !== undefined) {
    contents.passwordHash = passwordHash;
  }
  return contents;
}

export function loadAccessConfigFile(defaultPasswordHash: string, configPath?: string): AccessConfig {
  const fileConfig = configPath ? FileConfig.create(configPath, convertToAccessFileContents) : undefined;
  return loadAccessConfig(defaultPasswordHash, fileConfig);
}

export function loadAccessConfig(defaultPasswordHash: string,
                                 fileConfig?: FileConfig<AccessConfigFileLatest>): AccessConfig {
  const fileConfigValue = fileConfigAccessorFactory(fileConfig);
  return {
    passwordHash: createConfigValue<string>(defaultPasswordHash, fileConfigValue("passwordHash")),
  };
}
