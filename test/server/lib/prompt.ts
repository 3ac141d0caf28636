import {promptHidden} from 'app/server/lib/prompt';
import {assert} from 'chai';
import {PassThrough} from 'stream';
import {expectRejection} from '../testUtils';

describe('prompt', function() {
  let input: PassThrough;
  let output: PassThrough;
  let written: string;

  beforeEach(function() {
    input = new PassThrough();
    output = new PassThrough();
    written = '';
    output.on('data', (chunk) => { written += String(chunk); });
  });

  it('resolves to the typed answer without echoing it', async function() {
    const answer = promptHidden('Code: ', input, output);
    input.write('2468\r');
    assert.equal(await answer, '2468');
    assert.isTrue(written.startsWith('Code: '), written);
    assert.notInclude(written, '2468');
  });

  it('is cancelled by the end of input', async function() {
    const answer = promptHidden('Code: ', input, output);
    input.end();
    await expectRejection(answer, 'ACCESS_CANCELLED', /cancelled/);
  });

  it('is cancelled by Ctrl-C', async function() {
    const answer = promptHidden('Code: ', input, output);
    input.write('24\x03');
    await expectRejection(answer, 'ACCESS_CANCELLED');
    assert.notInclude(written, '24');
  });
});
