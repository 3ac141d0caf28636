import {ErrorWithCode} from 'app/common/ErrorWithCode';
import * as readline from 'readline';
import {Writable} from 'stream';

/**
 * Asks a question on the terminal and resolves to the answer, without echoing what is typed.
 * Rejects with an ACCESS_CANCELLED error if the user presses Ctrl-C or the input ends.
 */
export function promptHidden(
  question: string,
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): Promise<string> {
  let muted = false;
  const mutedOutput = new Writable({
    write(chunk, encoding, callback) {
      if (!muted) { output.write(chunk); }
      callback();
    }
  });
  const rl = readline.createInterface({input, output: mutedOutput, terminal: true});

  return new Promise<string>((resolve, reject) => {
    let settled = false;
    const cancel = () => {
      if (settled) { return; }
      settled = true;
      output.write("\n");
      rl.close();
      reject(new ErrorWithCode('ACCESS_CANCELLED', 'Input cancelled by user'));
    };
    rl.on('SIGINT', cancel);
    rl.on('close', cancel);
    rl.question(question, (answer) => {
      if (settled) { return; }
      settled = true;
      muted = false;
      output.write("\n");
      rl.close();
      resolve(answer);
    });
    muted = true;
  });
}
