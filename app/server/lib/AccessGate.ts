import {ErrorWithCode, isErrorWithCode} from 'app/common/ErrorWithCode';
import {AccessConfig} from 'app/server/lib/accessConfig';
import log from 'app/server/lib/log';
import * as crypto from 'crypto';

export const PASSWORD_PATTERN = /^\d{4}$/;
export const DEFAULT_MAX_ATTEMPTS = 3;

export type PromptFn = (question: string) => Promise<string>;

/**
 * Decides whether a comparison run may go ahead.
 */
export interface AccessGate {
  authorize(): Promise<boolean>;
}

export function hashPassword(password: string): string {
  return crypto.createHash('sha256').update(password, 'utf8').digest('hex');
}

export function isValidPasswordFormat(password: string): boolean {
  return PASSWORD_PATTERN.test(password);
}

// Hash of the password that applies until one is set with "password change".
export const DEFAULT_PASSWORD_HASH = hashPassword('1234');

function hashesMatch(a: string, b: string): boolean {
  const bufA = Buffer.from(a, 'utf8');
  const bufB = Buffer.from(b, 'utf8');
  return bufA.length === bufB.length && crypto.timingSafeEqual(bufA, bufB);
}

export interface PasswordAccessGateOptions {
  passwordHash: string;
  prompt: PromptFn;
  maxAttempts?: number;
}

/**
 * Asks for the 4-digit password up to `maxAttempts` times. Answers not made of 4 digits are
 * refused without being checked, but still use up an attempt.
 */
export class PasswordAccessGate implements AccessGate {
  private _maxAttempts: number;

  constructor(private _options: PasswordAccessGateOptions) {
    this._maxAttempts = _options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
  }

  public async authorize(): Promise<boolean> {
    if (hashesMatch(this._options.passwordHash, DEFAULT_PASSWORD_HASH)) {
      log.warn("Using the default password; set another with \"password change\"");
    }
    for (let attempt = 1; attempt <= this._maxAttempts; attempt++) {
      const remaining = this._maxAttempts - attempt;
      let answer: string;
      try {
        answer = await this._options.prompt(`Enter 4-digit password (Attempt ${attempt}/${this._maxAttempts}): `);
      } catch (e) {
        if (isErrorWithCode(e, 'ACCESS_CANCELLED')) {
          log.warn("Password entry cancelled");
          return false;
        }
        throw e;
      }
      if (!isValidPasswordFormat(answer)) {
        log.warn("Password must be exactly 4 digits. %s attempts remaining", remaining);
        continue;
      }
      if (hashesMatch(hashPassword(answer), this._options.passwordHash)) {
        log.info("Access granted");
        return true;
      }
      log.warn("Incorrect password. %s attempts remaining", remaining);
    }
    log.error("Maximum password attempts exceeded. Access denied.");
    return false;
  }
}

/**
 * Lets every run through, for when the password check is turned off in the settings.
 */
export class OpenAccessGate implements AccessGate {
  public async authorize(): Promise<boolean> {
    log.debug("Password check disabled");
    return true;
  }
}

export interface ChangePasswordOptions {
  config: AccessConfig;
  prompt: PromptFn;
  maxAttempts?: number;
}

/**
 * Changes the stored password after checking the current one. The new password must be 4 digits
 * and is asked for twice. Resolves to false if the current password is not given correctly, or
 * if the new password is refused.
 */
export async function changePassword(options: ChangePasswordOptions): Promise<boolean> {
  const {config, prompt} = options;
  const gate = new PasswordAccessGate({
    passwordHash: config.passwordHash.get(),
    prompt,
    maxAttempts: options.maxAttempts,
  });
  if (!await gate.authorize()) { return false; }

  try {
    const password = await prompt("Enter new 4-digit password: ");
    if (!isValidPasswordFormat(password)) {
      throw new ErrorWithCode('INVALID_PASSWORD_FORMAT', 'Password must be exactly 4 digits');
    }
    const confirmation = await prompt("Confirm new 4-digit password: ");
    if (confirmation !== password) {
      log.error("Passwords do not match. Password not changed.");
      return false;
    }
    await config.passwordHash.set(hashPassword(password));
  } catch (e) {
    if (isErrorWithCode(e, 'ACCESS_CANCELLED')) {
      log.warn("Password change cancelled");
      return false;
    }
    if (isErrorWithCode(e, 'INVALID_PASSWORD_FORMAT')) {
      log.error("%s. Password not changed.", e.message);
      return false;
    }
    throw e;
  }
  log.info("Password changed successfully");
  return true;
}
