import { isAffirmative } from 'app/common/gutil';

/**
 * A tree of settings, each of which may hold a value read from the environment (or set
 * directly), and may have named children. A setting remembers where it looked for its value,
 * so that `workbook-delta settings` can explain where each value came from.
 *
 *    const compare = appSettings.section('compare');
 *    const baseDir = compare.flag('baseDir').requireString({
 *      envVar: 'WORKBOOK_DELTA_BASE_DIR',
 *      defaultValue: process.cwd(),
 *    });
 */
export class AppSettings {
  private _value?: JSONValue;
  private _children = new Map<string, AppSettings>();
  private _lookup?: AppSettingLookup;

  public constructor(public readonly name: string) {}

  /* the current value, undefined if not set */
  public get(): JSONValue|undefined {
    return this._value;
  }

  /* the current value read as a boolean with isAffirmative, undefined if not set */
  public getAsBool(): boolean|undefined {
    return this._value === undefined ? undefined : isAffirmative(this._value);
  }

  /**
   * Looks for the setting in the environment variables of the query, in order, falling back
   * to the query's default. The lookup is recorded even when nothing is found.
   */
  public read(query: AppSettingQuery): this {
    const envVars = getEnvVars(query);
    if (envVars.length === 0) {
      throw new Error(`${this.name}: no environment variable to read`);
    }
    const envVar = envVars.find(name => process.env[name] !== undefined);
    this._lookup = {envVar, found: envVar !== undefined, query};
    this._value = envVar !== undefined ? process.env[envVar] : query.defaultValue;
    return this;
  }

  /**
   * As for read(), with the result as a string.
   */
  public readString(query: AppSettingQuery): string|undefined {
    const value = this.read(query).get();
    if (value === undefined) { return undefined; }
    this._value = String(value);
    return this._value;
  }

  /**
   * As for readString(), failing if there is neither a variable nor a default.
   */
  public requireString(query: AppSettingQuery): string {
    const result = this.readString(query);
    if (result === undefined) {
      throw new Error(`missing environment variable: ${getEnvVars(query)[0]}`);
    }
    return result;
  }

  /**
   * As for read(), keeping the result as a boolean.
   */
  public readBool(query: AppSettingQuery): boolean|undefined {
    this.readString(query);
    const result = this.getAsBool();
    this._value = result;
    return result;
  }

  /**
   * As for requireString(), but the value must be one of `choices`. The check narrows the
   * result to the union of the choices.
   */
  public requireChoice<T extends string>(query: AppSettingQuery & {defaultValue: T},
                                         choices: readonly T[]): T {
    const result = this.requireString(query);
    const choice = choices.find(c => c === result);
    if (choice === undefined) {
      throw new Error(`${this.name}: "${result}" is not one of ${choices.join(', ')}`);
    }
    return choice;
  }

  /**
   * As for readString(), splitting a comma-separated value into a list. Items are trimmed, and
   * empty ones dropped.
   */
  public readList(query: AppSettingQuery): string[]|undefined {
    const result = this.readString(query);
    if (result === undefined) { return undefined; }
    const items = result.split(',').map(item => item.trim()).filter(Boolean);
    this._value = items;
    return items;
  }

  /* set the value directly, e.g. from a command-line argument */
  public set(value: JSONValue): void {
    this._value = value;
    this._lookup = undefined;
  }

  /**
   * Returns the named child, creating it if needed. Meant for a group of related settings.
   */
  public section(name: string): AppSettings {
    let child = this._children.get(name);
    if (!child) {
      child = new AppSettings(name);
      this._children.set(name, child);
    }
    return child;
  }

  /**
   * Same as section(), for a child that holds a single value.
   */
  public flag(name: string): AppSettings {
    return this.section(name);
  }

  /**
   * Describes the value of this setting and how it was found.
   */
  public describe(): AppSettingDescription {
    const lookup = this._lookup;
    return {
      name: this.name,
      value: (lookup?.query.censor && this._value !== undefined) ? '*****' : this._value,
      foundInEnvVar: lookup?.envVar,
      wouldFindInEnvVar: lookup ? getEnvVars(lookup.query)[0] : undefined,
      usedDefault: this._value !== undefined && lookup !== undefined && !lookup.found,
    };
  }

  /**
   * As for describe(), for this setting and all below it, with dotted names. Settings with
   * neither a value nor a known variable are left out.
   */
  public describeAll(): AppSettingDescription[] {
    const items: AppSettingDescription[] = [this.describe()];
    for (const child of this._children.values()) {
      for (const item of child.describeAll()) {
        items.push({...item, name: `${this.name}.${item.name}`});
      }
    }
    return items.filter(item => item.value !== undefined || item.wouldFindInEnvVar !== undefined ||
      item.usedDefault);
  }
}

/**
 * The settings of the comparator.
 */
export const appSettings = new AppSettings('workbookDelta');

/**
 * Where to look for a setting.
 */
export interface AppSettingQuery {
  envVar: string|string[];  // environment variable(s) to check, first match wins.
  defaultValue?: JSONValue; // value to use if none of the variables is set.
  censor?: boolean;         // whether describe() should hide the value.
}

interface AppSettingLookup {
  envVar?: string;
  found: boolean;
  query: AppSettingQuery;
}

/**
 * Output of AppSettings.describe().
 */
export interface AppSettingDescription {
  name: string;
  value?: JSONValue;
  foundInEnvVar?: string;      // variable the value was read from.
  wouldFindInEnvVar?: string;  // variable that was checked first.
  usedDefault: boolean;
}

function getEnvVars(query: AppSettingQuery): string[] {
  return Array.isArray(query.envVar) ? query.envVar : [query.envVar];
}

// Settings are kept JSON-like, so that they can be printed as JSON.
type JSONValue = string | number | boolean | null | { [member: string]: JSONValue } | JSONValue[];
