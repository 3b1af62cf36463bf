import { PassThrough } from 'stream';
import { ReadlinePrompter, Validation, promptUntilValid } from '../src/cli/prompt';
import { UserInterruptError } from '../src/utils/errors';
import { OutputCollector, ScriptedPrompter } from './helpers/fakes';

describe('ReadlinePrompter', () => {
  let input: PassThrough;
  let output: PassThrough;
  let prompter: ReadlinePrompter;

  beforeEach(() => {
    input = new PassThrough();
    output = new PassThrough();
    prompter = new ReadlinePrompter(input, output);
  });

  afterEach(() => {
    prompter.close();
  });

  it('resolves with the typed line', async () => {
    const answer = prompter.question('Name? ');
    input.write('hello world\n');

    await expect(answer).resolves.toBe('hello world');
  });

  it('treats end of input as an interrupt', async () => {
    const answer = prompter.question('Name? ');
    input.end();

    await expect(answer).rejects.toBeInstanceOf(UserInterruptError);
    await expect(prompter.question('Again? ')).rejects.toBeInstanceOf(UserInterruptError);
  });

  it('turns Ctrl-C on a terminal into an interrupt', async () => {
    // readline only handles keypresses when the output is a terminal
    const terminal = Object.assign(new PassThrough(), { isTTY: true });
    const ttyPrompter = new ReadlinePrompter(input, terminal);

    try {
      const answer = ttyPrompter.question('Pick: ');
      input.write('\x03');

      await expect(answer).rejects.toBeInstanceOf(UserInterruptError);
    } finally {
      ttyPrompter.close();
    }
  });
});

describe('promptUntilValid', () => {
  const isEven = (answer: string): Validation<number> => {
    const value = Number(answer);
    return Number.isInteger(value) && value % 2 === 0
      ? { ok: true, value }
      : { ok: false, message: `${answer} is not even` };
  };

  it('asks again until the validator accepts', async () => {
    const prompter = new ScriptedPrompter(['3', ' 5 ', '8']);
    const output = new OutputCollector();

    await expect(promptUntilValid(prompter, 'Even? ', isEven, { output })).resolves.toBe(8);
    expect(prompter.questions).toEqual(['Even? ', 'Even? ', 'Even? ']);
    expect(output.text).toBe('3 is not even\n5 is not even\n');
  });

  it('stops after maxAttempts', async () => {
    const prompter = new ScriptedPrompter(['1', '1', '2']);

    await expect(
      promptUntilValid(prompter, 'Even? ', isEven, {
        output: new OutputCollector(),
        maxAttempts: 2,
      }),
    ).rejects.toThrow('No valid answer after 2 attempts');
  });
});
