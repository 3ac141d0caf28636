import log from 'app/server/lib/log';
import * as fse from 'fs-extra';
import * as path from 'path';

export type FolderRole = 'new' | 'prev' | 'template';

export const FOLDER_ROLES: readonly FolderRole[] = ['new', 'prev', 'template'];

export type InputFolders = Record<FolderRole, string>;

export interface DiscoveryResult {
  matched: string[];          // file names present in all three folders, sorted.
  warnings: string[];         // files found in exactly two of the three folders.
  missingFolders: FolderRole[];
}

/**
 * Lists workbook files directly inside `dir` whose extension is one of `extensions`
 * (compared case-insensitively). Names starting with "~" are lock files left by Excel while a
 * workbook is open, and are skipped.
 */
export async function listWorkbookFiles(dir: string, extensions: string[]): Promise<string[]> {
  const wanted = new Set(extensions.map(normalizeExtension));
  const files: string[] = [];
  for (const name of await fse.readdir(dir)) {
    if (name.startsWith('~') || !wanted.has(path.extname(name).toLowerCase())) { continue; }
    if ((await fse.stat(path.join(dir, name))).isFile()) {
      files.push(name);
    }
  }
  return files;
}

/**
 * Finds the workbook file names present in all three folders, by exact name. A folder that does
 * not exist is reported in missingFolders, and nothing is matched.
 */
export async function discoverMatchingFiles(folders: InputFolders, extensions: string[]): Promise<DiscoveryResult> {
  const missingFolders: FolderRole[] = [];
  for (const role of FOLDER_ROLES) {
    if (!await fse.pathExists(folders[role])) { missingFolders.push(role); }
  }
  if (missingFolders.length > 0) {
    return {matched: [], warnings: [], missingFolders};
  }

  const listings = new Map<FolderRole, Set<string>>();
  for (const role of FOLDER_ROLES) {
    listings.set(role, new Set(await listWorkbookFiles(folders[role], extensions)));
  }
  const inFolder = (role: FolderRole, name: string) => Boolean(listings.get(role)?.has(name));

  const allNames = new Set<string>();
  for (const names of listings.values()) {
    for (const name of names) { allNames.add(name); }
  }

  const matched: string[] = [];
  const warnings: string[] = [];
  for (const name of [...allNames].sort()) {
    const missingFrom = FOLDER_ROLES.filter(role => !inFolder(role, name));
    if (missingFrom.length === 0) {
      matched.push(name);
    } else if (missingFrom.length === 1) {
      warnings.push(`${name} is missing from ${missingFrom[0]}`);
    }
  }

  if (matched.length === 0) {
    log.warn("No matching workbook files found in all three folders (new, prev, template)");
    for (const role of FOLDER_ROLES) {
      log.info("%s folder files: %s", role, [...(listings.get(role) || [])].sort().join(', '));
    }
  } else {
    log.info("Found %s matching files: %s", matched.length, matched.join(', '));
  }
  return {matched, warnings, missingFolders};
}

function normalizeExtension(ext: string): string {
  const lower = ext.trim().toLowerCase();
  return lower.startsWith('.') ? lower : '.' + lower;
}
