import {ErrorWithCode} from 'app/common/ErrorWithCode';
import {loadAccessConfig} from 'app/server/lib/accessConfig';
import {
  changePassword,
  DEFAULT_PASSWORD_HASH,
  hashPassword,
  isValidPasswordFormat,
  OpenAccessGate,
  PasswordAccessGate,
  PromptFn,
} from 'app/server/lib/AccessGate';
import {assert} from 'chai';
import * as sinon from 'sinon';
import {captureLog} from '../testUtils';

// Answers prompts from a list, failing the test if asked more often.
function scriptedPrompt(...answers: Array<string|Error>): sinon.SinonSpy<[string], Promise<string>> {
  const remaining = [...answers];
  return sinon.spy(async (question: string) => {
    const answer = remaining.shift();
    if (answer === undefined) { throw new Error(`unexpected prompt: ${question}`); }
    if (answer instanceof Error) { throw answer; }
    return answer;
  });
}

const cancelled = () => new ErrorWithCode('ACCESS_CANCELLED', 'Input cancelled by user');

describe('AccessGate', function() {
  const passwordHash = hashPassword('2468');

  it('hashes passwords with SHA-256', function() {
    assert.equal(hashPassword('1234'), '03ac674216f3e15c761ee1a5e255f067953623c8b388b4459e13f978d7c846f4');
    assert.equal(DEFAULT_PASSWORD_HASH, hashPassword('1234'));
  });

  it('accepts exactly 4 digits as a password', function() {
    assert.isTrue(isValidPasswordFormat('0042'));
    assert.isFalse(isValidPasswordFormat('123'));
    assert.isFalse(isValidPasswordFormat('12345'));
    assert.isFalse(isValidPasswordFormat('12a4'));
    assert.isFalse(isValidPasswordFormat(' 1234'));
  });

  describe('PasswordAccessGate', function() {
    it('grants access for the right password', async function() {
      const prompt = scriptedPrompt('2468');
      const messages = await captureLog('info', async () => {
        assert.isTrue(await new PasswordAccessGate({passwordHash, prompt}).authorize());
      });
      assert.deepEqual(prompt.args, [['Enter 4-digit password (Attempt 1/3): ']]);
      assert.deepEqual(messages, ['info: Access granted']);
    });

    it('allows retries after bad formats and wrong passwords', async function() {
      const prompt = scriptedPrompt('12', '1111', '2468');
      const messages = await captureLog('info', async () => {
        assert.isTrue(await new PasswordAccessGate({passwordHash, prompt}).authorize());
      });
      assert.deepEqual(prompt.args.map(args => args[0]), [
        'Enter 4-digit password (Attempt 1/3): ',
        'Enter 4-digit password (Attempt 2/3): ',
        'Enter 4-digit password (Attempt 3/3): ',
      ]);
      assert.deepEqual(messages, [
        'warn: Password must be exactly 4 digits. 2 attempts remaining',
        'warn: Incorrect password. 1 attempts remaining',
        'info: Access granted',
      ]);
    });

    it('denies access after the last attempt', async function() {
      const prompt = scriptedPrompt('1111', '2222', '3333');
      const messages = await captureLog('warn', async () => {
        assert.isFalse(await new PasswordAccessGate({passwordHash, prompt}).authorize());
      });
      assert.equal(prompt.callCount, 3);
      assert.equal(messages[messages.length - 1], 'error: Maximum password attempts exceeded. Access denied.');
    });

    it('respects a different number of attempts', async function() {
      const prompt = scriptedPrompt('1111');
      await captureLog('warn', async () => {
        assert.isFalse(await new PasswordAccessGate({passwordHash, prompt, maxAttempts: 1}).authorize());
      });
      assert.deepEqual(prompt.args, [['Enter 4-digit password (Attempt 1/1): ']]);
    });

    it('denies access when input is cancelled', async function() {
      const prompt = scriptedPrompt(cancelled());
      const messages = await captureLog('warn', async () => {
        assert.isFalse(await new PasswordAccessGate({passwordHash, prompt}).authorize());
      });
      assert.deepEqual(messages, ['warn: Password entry cancelled']);
    });

    it('lets other prompt errors through', async function() {
      const prompt = scriptedPrompt(new Error('terminal gone'));
      let error: unknown;
      await captureLog('warn', async () => {
        try {
          await new PasswordAccessGate({passwordHash, prompt}).authorize();
        } catch (e) {
          error = e;
        }
      });
      assert.instanceOf(error, Error);
      assert.equal(String(error), 'Error: terminal gone');
    });

    it('warns when the default password is in use', async function() {
      const prompt = scriptedPrompt('1234');
      const messages = await captureLog('warn', async () => {
        assert.isTrue(await new PasswordAccessGate({passwordHash: DEFAULT_PASSWORD_HASH, prompt}).authorize());
      });
      assert.deepEqual(messages, ['warn: Using the default password; set another with "password change"']);
    });
  });

  describe('OpenAccessGate', function() {
    it('always grants access', async function() {
      assert.isTrue(await new OpenAccessGate().authorize());
    });
  });

  describe('changePassword', function() {
    let prompt: PromptFn;

    it('stores the hash of a confirmed new password', async function() {
      const config = loadAccessConfig(passwordHash);
      prompt = scriptedPrompt('2468', '1357', '1357');
      await captureLog('warn', async () => {
        assert.isTrue(await changePassword({config, prompt}));
      });
      assert.equal(config.passwordHash.get(), hashPassword('1357'));
    });

    it('needs the current password first', async function() {
      const config = loadAccessConfig(passwordHash);
      prompt = scriptedPrompt('0000', '0000');
      await captureLog('warn', async () => {
        assert.isFalse(await changePassword({config, prompt, maxAttempts: 2}));
      });
      assert.equal(config.passwordHash.get(), passwordHash);
    });

    it('refuses a badly formatted new password', async function() {
      const config = loadAccessConfig(passwordHash);
      prompt = scriptedPrompt('2468', 'abcd');
      const messages = await captureLog('error', async () => {
        assert.isFalse(await changePassword({config, prompt}));
      });
      assert.deepEqual(messages, ['error: Password must be exactly 4 digits. Password not changed.']);
      assert.equal(config.passwordHash.get(), passwordHash);
    });

    it('refuses a confirmation that does not match', async function() {
      const config = loadAccessConfig(passwordHash);
      prompt = scriptedPrompt('2468', '1357', '1358');
      const messages = await captureLog('error', async () => {
        assert.isFalse(await changePassword({config, prompt}));
      });
      assert.deepEqual(messages, ['error: Passwords do not match. Password not changed.']);
      assert.equal(config.passwordHash.get(), passwordHash);
    });

    it('stops when input is cancelled', async function() {
      const config = loadAccessConfig(passwordHash);
      prompt = scriptedPrompt('2468', cancelled());
      await captureLog('warn', async () => {
        assert.isFalse(await changePassword({config, prompt}));
      });
      assert.equal(config.passwordHash.get(), passwordHash);
    });
  });
});
