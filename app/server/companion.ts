import {isMixedParseFailure, MIXED_PARSE_FAILURE_MODES, MixedParseFailure} from 'app/common/cellComparator';
import {loadAccessConfigFile} from 'app/server/lib/accessConfig';
import {AccessGate, changePassword, DEFAULT_PASSWORD_HASH, hashPassword, isValidPasswordFormat,
        OpenAccessGate, PasswordAccessGate} from 'app/server/lib/AccessGate';
import {appSettings} from 'app/server/lib/AppSettings';
import {ComparatorSettings, readComparatorSettings} from 'app/server/lib/comparatorSettings';
import {ComparisonRunner} from 'app/server/lib/ComparisonRunner';
import {getComparisonLayout} from 'app/server/lib/places';
import {promptHidden} from 'app/server/lib/prompt';
import {writeSampleWorkbooks} from 'app/server/lib/sampleWorkbooks';
import * as commander from 'commander';

// Export dependencies for stubbing in tests.
export const Deps = {
  prompt: (question: string) => promptHidden(question),
  print: (text: string) => console.log(text),
};

/**
 * Main entrypoint for the workbook comparison command line.
 */
export async function main() {
  const program = getProgram();
  await program.parseAsync(process.argv);
}

if (require.main === module) {
  main().then(() => process.exit(0)).catch(e => {
    // tslint:disable-next-line:no-console
    console.error(e);
    process.exit(1);
  });
}

/**
 * Get the comparison program as a commander object.
 * To actually run it, call parseAsync(argv).
 */
export function getProgram(): commander.Command {
  const program = new commander.Command();
  program
    .name('workbook-delta')
    .description('compare new and previous versions of spreadsheet workbooks');

  addCompareCommand(program);
  addPasswordCommand(program);
  addSampleCommand(program);
  addSettingsCommand(program);
  return program;
}

// Add the default command:
//   compare [baseDir]
export function addCompareCommand(program: commander.Command) {
  program.command('compare [baseDir]', {isDefault: true})
    .description('compare the workbooks under baseDir/new and baseDir/prev, writing results to ' +
      'baseDir/comparison_results')
    .addOption(new commander.Option('--mixed-parse-failure <mode>',
      'what to do when a new value looks numeric but cannot be converted')
      .choices(MIXED_PARSE_FAILURE_MODES))
    .option('--no-log-file', 'do not write a log file for this run')
    .action(async (baseDir: string|undefined, options: {mixedParseFailure?: string, logFile: boolean}) => {
      const settings = readComparatorSettings({
        baseDir,
        mixedParseFailure: parseMixedParseFailure(options.mixedParseFailure),
      });
      if (!await createAccessGate(settings).authorize()) {
        program.error('Access denied', {exitCode: 1});
      }
      const layout = getComparisonLayout(settings.baseDir);
      const summary = await new ComparisonRunner({
        layout,
        extensions: settings.extensions,
        compareOptions: {mixedParseFailure: settings.mixedParseFailure},
        runLogFile: options.logFile,
      }).run();
      Deps.print(`Files processed: ${summary.filesProcessed.length}`);
      Deps.print(`Total differences found: ${summary.totalDifferences}`);
      Deps.print(`Results saved in: ${layout.outputDir}`);
      if (summary.errors.length > 0) {
        Deps.print(`Errors encountered: ${summary.errors.length} (see comparison_report.txt)`);
      }
    });
}

// Add commands related to the access password:
//   password change [baseDir]
//   password hash <code>
export function addPasswordCommand(program: commander.Command) {
  const sub = section(program, {
    sectionName: 'password',
    sectionDescription: 'manage the password asked for before a comparison',
  });
  sub('change [baseDir]')
    .description('change the password stored in the access config file')
    .action(async (baseDir: string|undefined) => {
      const settings = readComparatorSettings({baseDir});
      const config = loadAccessConfigFile(DEFAULT_PASSWORD_HASH, settings.configPath);
      if (!await changePassword({config, prompt: Deps.prompt})) {
        program.error('Password not changed', {exitCode: 1});
      }
      Deps.print(`Password saved in ${settings.configPath}`);
    });

  sub('hash <code>')
    .description('show the hash stored for a 4-digit password')
    .action((code: string) => {
      if (!isValidPasswordFormat(code)) {
        program.error('Password must be exactly 4 digits');
      }
      Deps.print(hashPassword(code));
    });
}

export function addSampleCommand(program: commander.Command) {
  program.command('sample <dir>')
    .description('create new, prev and template folders with a sample workbook to compare')
    .action(async (dir: string) => {
      const written = await writeSampleWorkbooks(dir);
      for (const filePath of written) {
        Deps.print(filePath);
      }
    });
}

export function addSettingsCommand(program: commander.Command) {
  program.command('settings [baseDir]')
    .description('show the settings a comparison would use, and where they come from')
    .action((baseDir: string|undefined) => {
      readComparatorSettings({baseDir});
      Deps.print(JSON.stringify(appSettings.describeAll(), null, 2));
    });
}

/**
 * Builds the gate a comparison run must pass. A password hash from the settings takes precedence
 * over the one stored in the access config file.
 */
export function createAccessGate(settings: ComparatorSettings): AccessGate {
  if (!settings.requirePassword) {
    return new OpenAccessGate();
  }
  const passwordHash = settings.passwordHash ||
    loadAccessConfigFile(DEFAULT_PASSWORD_HASH, settings.configPath).passwordHash.get();
  return new PasswordAccessGate({passwordHash, prompt: Deps.prompt});
}

function parseMixedParseFailure(value: string|undefined): MixedParseFailure|undefined {
  if (value === undefined) { return undefined; }
  if (!isMixedParseFailure(value)) {
    throw new commander.InvalidArgumentError(`Allowed choices are ${MIXED_PARSE_FAILURE_MODES.join(', ')}.`);
  }
  return value;
}

// Get a function for adding a subcommand under a command grouping related ones.
function section(program: commander.Command, options: {
  sectionName: string,
  sectionDescription: string,
}) {
  const sub = program.command(options.sectionName).description(options.sectionDescription);
  return (name: string) => sub.command(name);
}
