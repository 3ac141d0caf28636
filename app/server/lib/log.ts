/**
 * Configures logging. This is merely a customization of the 'winston' logging module,
 * and all winston methods are available. Additionally provides log.timestamp(), and
 * log.addRunLogFile() to copy the log of a single comparison run into a file.
 * Usage:
 *    import log from 'app/server/lib/log';
 *    log.info("Found %s matching files", count);
 */

import {formatLogTimestamp} from 'app/common/timeFormat';
import * as winston from 'winston';

interface LogWithTimestamp extends winston.LoggerInstance {
  timestamp(): string;
  addRunLogFile(filename: string): () => void;
}

/**
 * Winston allows two optional arguments at the end: "meta" (if object) and "callback" (if
 * function). We don't use them, but we do use variable number of arguments as in
 * log.info("foo %s", foo). If foo is an object, winston dumps it as meta rather than formatting
 * it into the message. We fix by always appending {} to the end of the arguments, so that
 * winston sees an empty meta object.
 */
const origLog = winston.Logger.prototype.log;
winston.Logger.prototype.log = function(level: string, msg: string, ...args: unknown[]) {
  return origLog.call(this, level, msg, ...args, {});
};

let runLogCounter = 0;

const rawLog = new (winston.Logger)();
const log: LogWithTimestamp = Object.assign(rawLog, {
  timestamp,
  addRunLogFile,
});

/**
 * Returns the current timestamp as a string in the same format as used in logging.
 */
function timestamp() {
  return formatLogTimestamp(new Date());
}

/**
 * Sends a copy of everything logged at info level and above to the given file, until the
 * returned function is called.
 */
function addRunLogFile(filename: string): () => void {
  const name = `runLog${++runLogCounter}`;
  const runLogOptions = {
    name,
    filename,
    level: 'info',
    timestamp: log.timestamp,
    json: false,
  };
  log.add(winston.transports.File, runLogOptions);
  return () => { log.remove(name); };
}

const fileTransportOptions = {
  stream: process.stderr,
  level: process.env.WORKBOOK_DELTA_LOG_LEVEL || 'debug',
  timestamp: log.timestamp,
  colorize: true,
  json: process.env.WORKBOOK_DELTA_LOG_JSON ? true : false
};

// Configure logging to use stderr and simple timestamps.
log.add(winston.transports.File, fileTransportOptions);

// Also update the default logger to use the same format.
winston.remove(winston.transports.Console);
winston.add(winston.transports.File, fileTransportOptions);

export = log;
