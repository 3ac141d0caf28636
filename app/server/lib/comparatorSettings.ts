import {MIXED_PARSE_FAILURE_MODES, MixedParseFailure} from 'app/common/cellComparator';
import {AppSettings, appSettings} from 'app/server/lib/AppSettings';
import * as path from 'path';

export const DEFAULT_EXTENSIONS = ['.xlsx'];
export const ACCESS_CONFIG_FILE_NAME = 'workbook-delta.json';

export interface ComparatorSettings {
  baseDir: string;
  extensions: string[];
  mixedParseFailure: MixedParseFailure;
  requirePassword: boolean;
  configPath: string;
  passwordHash?: string;
}

/**
 * Reads the settings for a comparison run from the environment. Values given in `overrides`
 * (typically from the command line) take precedence, and are recorded in the settings so that
 * describeAll() reports them.
 */
export function readComparatorSettings(
  overrides: {baseDir?: string, mixedParseFailure?: MixedParseFailure} = {},
  settings: AppSettings = appSettings,
): ComparatorSettings {
  const compare = settings.section('compare');

  const baseDirSetting = compare.flag('baseDir');
  if (overrides.baseDir !== undefined) {
    baseDirSetting.set(overrides.baseDir);
  }
  const baseDir = path.resolve(overrides.baseDir ?? baseDirSetting.requireString({
    envVar: 'WORKBOOK_DELTA_BASE_DIR',
    defaultValue: process.cwd(),
  }));

  const extensions = compare.flag('extensions').readList({
    envVar: 'WORKBOOK_DELTA_EXTENSIONS',
    defaultValue: DEFAULT_EXTENSIONS.join(','),
  }) || DEFAULT_EXTENSIONS;

  const mixedSetting = compare.flag('mixedParseFailure');
  let mixedParseFailure: MixedParseFailure;
  if (overrides.mixedParseFailure !== undefined) {
    mixedSetting.set(overrides.mixedParseFailure);
    mixedParseFailure = overrides.mixedParseFailure;
  } else {
    mixedParseFailure = mixedSetting.requireChoice({
      envVar: 'WORKBOOK_DELTA_MIXED_PARSE_FAILURE',
      defaultValue: 'skip',
    }, MIXED_PARSE_FAILURE_MODES);
  }

  const access = settings.section('access');
  const requirePassword = access.flag('requirePassword').readBool({
    envVar: 'WORKBOOK_DELTA_REQUIRE_PASSWORD',
    defaultValue: true,
  }) ?? true;
  const configPath = path.resolve(access.flag('configPath').requireString({
    envVar: 'WORKBOOK_DELTA_CONFIG',
    defaultValue: path.join(baseDir, ACCESS_CONFIG_FILE_NAME),
  }));
  const passwordHash = access.flag('passwordHash').readString({
    envVar: 'WORKBOOK_DELTA_PASSWORD_HASH',
    censor: true,
  });

  return {baseDir, extensions, mixedParseFailure, requirePassword, configPath, passwordHash};
}
