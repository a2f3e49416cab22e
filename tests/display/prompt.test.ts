import { describe, it, expect } from 'vitest';
import { PassThrough } from 'node:stream';
import { createStdinContinuation, isAffirmative } from '@/display/prompt';

describe('isAffirmative', () => {
  it('should accept y and yes in any case', () => {
    expect(isAffirmative('y')).toBe(true);
    expect(isAffirmative(' YES ')).toBe(true);
  });

  it('should decline anything else', () => {
    expect(isAffirmative('')).toBe(false);
    expect(isAffirmative('n')).toBe(false);
    expect(isAffirmative('yep')).toBe(false);
  });
});

describe('createStdinContinuation', () => {
  it('should ask with the round counter and read the answer', async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    const chunks: string[] = [];
    output.on('data', (chunk: Buffer) => chunks.push(chunk.toString('utf8')));
    const continuation = createStdinContinuation(input, output);

    const answer = continuation.shouldContinue({ round: 1, maxRounds: 150, changedNodes: ['1'] });
    input.write('y\n');

    await expect(answer).resolves.toBe(true);
    expect(chunks.join('')).toContain('[round 1/150] Continue to next round? (y/N) ');
    continuation.close();
  });

  it('should stop on a plain enter', async () => {
    const input = new PassThrough();
    const continuation = createStdinContinuation(input, new PassThrough());

    const answer = continuation.shouldContinue({ round: 2, maxRounds: 150, changedNodes: [] });
    input.write('\n');

    await expect(answer).resolves.toBe(false);
    continuation.close();
  });

  it('should decline when the input ends while a question is pending', async () => {
    const input = new PassThrough();
    const continuation = createStdinContinuation(input, new PassThrough());

    const answer = continuation.shouldContinue({ round: 1, maxRounds: 150, changedNodes: ['1'] });
    input.end();

    await expect(answer).resolves.toBe(false);
    await expect(
      continuation.shouldContinue({ round: 2, maxRounds: 150, changedNodes: ['1'] })
    ).resolves.toBe(false);
    continuation.close();
  });
});
