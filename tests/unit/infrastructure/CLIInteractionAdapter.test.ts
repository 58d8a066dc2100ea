import { PassThrough, Writable } from 'stream';
import { TaskCancelledError } from '../../../src/domain/errors/AppErrors';
import { CLIInteractionAdapter } from '../../../src/infrastructure/cli/CLIInteractionAdapter';

describe('CLIInteractionAdapter', () => {
  let input: PassThrough;
  let written: string[];
  let adapter: CLIInteractionAdapter;

  beforeEach(() => {
    input = new PassThrough();
    written = [];
    const output = new Writable({
      write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void) {
        written.push(chunk.toString());
        callback();
      },
    });
    adapter = new CLIInteractionAdapter(input, output);
  });

  afterEach(() => {
    adapter.close();
  });

  it('should print the question and resolve the trimmed answer', async () => {
    const answer = adapter.ask('SMS code?');
    input.write('  4242 \n');

    await expect(answer).resolves.toBe('4242');
    expect(written.join('')).toContain('SMS code?');
  });

  it('should reject when the signal fires while waiting', async () => {
    const controller = new AbortController();
    const answer = adapter.ask('Proceed?', controller.signal);

    controller.abort();

    await expect(answer).rejects.toBeInstanceOf(TaskCancelledError);
  });

  it('should reject at once when already cancelled', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(adapter.ask('Proceed?', controller.signal)).rejects.toBeInstanceOf(TaskCancelledError);
    expect(written).toEqual([]);
  });

  it('should print dimmed messages', () => {
    adapter.say('Done: 3 items in the cart');

    expect(written).toEqual(['\x1b[2mDone: 3 items in the cart\x1b[0m\n']);
  });
});
