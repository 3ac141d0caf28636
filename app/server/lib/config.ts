import {ErrorWithCode, getErrorMessage} from 'app/common/ErrorWithCode';
import * as fse from "fs-extra";

// Export dependencies for stubbing in tests.
export const Deps = {
  readFile: fse.readFileSync,
  writeFile: fse.writeFile,
  pathExists: fse.pathExistsSync,
};

/**
 * A config value that can only be read.
 */
export interface IReadableConfigValue<T> {
  get(): T;
}

/**
 * A config value that can also be changed. set() resolves once the change is stored.
 */
export interface IWritableConfigValue<T> extends IReadableConfigValue<T> {
  set(value: T): Promise<void>;
}

/**
 * Checks what was parsed from a config file, and returns it as the file's type. Returns null,
 * or throws, when the contents are not acceptable.
 */
export type FileContentsValidator<T> = (value: unknown) => T | null;

export class ConfigValidationError extends ErrorWithCode {
  public name: string = "ConfigValidationError";

  constructor(message: string, cause?: unknown) {
    super('CONFIG_INVALID', message, {cause});
  }
}

/**
 * How a config value is loaded from and saved to wherever it persists.
 */
export interface ConfigAccessors<ValueType> {
  get: () => ValueType,
  set?: (value: ValueType) => Promise<void>
}

/**
 * Typed access to the properties of a JSON file. A missing file reads as an empty object (for
 * the validator to fill in or refuse), and is created by the first set().
 *
 * Keep to one FileConfig per file: each holds its own copy of the contents.
 */
export class FileConfig<FileContents> {
  /**
   * Loads `configPath` and checks its contents with `validator`. Throws ConfigValidationError if
   * the file is not JSON, or if the validator refuses it.
   */
  public static create<Contents>(configPath: string, validator: FileContentsValidator<Contents>): FileConfig<Contents> {
    let parsed: unknown = {};
    if (Deps.pathExists(configPath)) {
      try {
        parsed = JSON.parse(Deps.readFile(configPath, 'utf8'));
      } catch (error) {
        throw new ConfigValidationError(`Config at ${configPath} is not valid JSON: ${getErrorMessage(error)}`, error);
      }
    }

    let contents: Contents | null;
    try {
      contents = validator(parsed);
    } catch (error) {
      throw new ConfigValidationError(`Config at ${configPath} failed validation: ${getErrorMessage(error)}`, error);
    }
    if (!contents) {
      throw new ConfigValidationError(`Config at ${configPath} failed validation - check the format?`);
    }
    return new FileConfig<Contents>(configPath, contents);
  }

  constructor(private _filePath: string, private _contents: FileContents) {
  }

  public get filePath(): string {
    return this._filePath;
  }

  public get<Key extends keyof FileContents>(key: Key): FileContents[Key] {
    return this._contents[key];
  }

  public async set<Key extends keyof FileContents>(key: Key, value: FileContents[Key]) {
    this._contents[key] = value;
    await this.persistToDisk();
  }

  public async persistToDisk() {
    await Deps.writeFile(this._filePath, JSON.stringify(this._contents, null, 2) + "\n");
  }
}

/**
 * Returns a function giving accessors for a property of `fileConfig`, or undefined for every
 * property when there is no fileConfig.
 */
export function fileConfigAccessorFactory<FileContents>(
  fileConfig?: FileConfig<FileContents>
): <Key extends keyof FileContents>(key: Key) => ConfigAccessors<FileContents[Key]> | undefined {
  if (!fileConfig) { return () => undefined; }
  return (key) => ({
    get: () => fileConfig.get(key),
    set: (value) => fileConfig.set(key, value),
  });
}

/**
 * Creates a config value stored through `persistence`, or only in memory without it. Reads
 * give `defaultValue` until something else is stored.
 */
export function createConfigValue<ValueType>(
  defaultValue: ValueType,
  persistence?: ConfigAccessors<ValueType> | ConfigAccessors<ValueType | undefined>,
): IWritableConfigValue<ValueType> {
  let current = persistence?.get();
  return {
    get(): ValueType {
      return current ?? defaultValue;
    },
    async set(value: ValueType) {
      await persistence?.set?.(value);
      current = value;
    },
  };
}
