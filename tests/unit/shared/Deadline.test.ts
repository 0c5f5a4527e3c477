import { describe, it, expect } from 'vitest';
import { withDeadline } from '../../../src/shared/Deadline.js';

describe('withDeadline', () => {
  it('resolves with the work result inside the budget', async () => {
    const result = await withDeadline(async () => 42, 100, () => new Error('late'));
    expect(result).toBe(42);
  });

  it('propagates the work error', async () => {
    await expect(
      withDeadline(async () => {
        throw new Error('broken');
      }, 100, () => new Error('late'))
    ).rejects.toThrow('broken');
  });

  it('rejects with the timeout error and aborts the signal', async () => {
    let captured: AbortSignal | undefined;
    let finish: () => void = () => {};

    const pending = withDeadline((signal) => {
      captured = signal;
      return new Promise<void>((r) => {
        finish = r;
      });
    }, 20, () => new Error('late'));

    await expect(pending).rejects.toThrow('late');
    expect(captured?.aborted).toBe(true);
    expect(captured?.reason).toEqual(new Error('late'));
    finish();
  });
});
