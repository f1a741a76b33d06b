// Tests for prompters

import { PassThrough } from 'node:stream';
import { describe, it, expect } from 'vitest';
import { ValidationError } from '@property-tracker/runtime';
import { PromptClosedError, askUntilValid, createReadlinePrompter, createScriptedPrompter } from './prompts.js';

function collect(stream: PassThrough): () => string {
  const chunks: string[] = [];
  stream.on('data', (chunk: Buffer) => chunks.push(chunk.toString()));
  return () => chunks.join('');
}

describe('createReadlinePrompter', () => {
  it('serves piped lines that arrive before they are asked for', async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    const written = collect(output);
    const prompter = createReadlinePrompter(input, output);

    input.end('2\n2020\n');
    await new Promise((resolve) => setImmediate(resolve));

    expect(await prompter.ask('Choose an option: ')).toBe('2');
    expect(await prompter.ask('Start year: ')).toBe('2020');
    await expect(prompter.ask('Start quarter (1-4): ')).rejects.toBeInstanceOf(PromptClosedError);
    prompter.close();
    await new Promise((resolve) => setImmediate(resolve));

    expect(written()).toContain('Choose an option: Start year: ');
  });

  it('waits for a line typed after the question', async () => {
    const input = new PassThrough();
    const prompter = createReadlinePrompter(input, new PassThrough());

    const answer = prompter.ask('Region (name or number): ');
    input.write('Cork\n');

    await expect(answer).resolves.toBe('Cork');
    prompter.close();
  });
});

describe('askUntilValid', () => {
  it('prints the validation message and asks again', async () => {
    const prompter = createScriptedPrompter(['x', '3']);
    const printed: string[] = [];
    const parse = (raw: string) => {
      if (raw !== '3') {
        throw new ValidationError('Quarter must be 1, 2, 3 or 4');
      }
      return 3;
    };

    await expect(askUntilValid(prompter, 'Quarter: ', parse, (text) => printed.push(text))).resolves.toBe(3);
    expect(printed).toEqual(['  Quarter must be 1, 2, 3 or 4']);
    expect(prompter.questions).toEqual(['Quarter: ', 'Quarter: ']);
  });
});
