import { describe, it, expect } from 'vitest';
import { AggregatorClosedError } from './errors.js';
import { AsyncResult, createReplyBridge } from './replyBridge.js';
import { settle } from '../test-helpers.js';

describe('reply bridge', () => {
  it('delivers exactly one reply', async () => {
    const { sender, result } = createReplyBridge<number>();

    expect(sender.send(1)).toBe(true);
    expect(sender.send(2)).toBe(false);
    expect(sender.close()).toBe(false);

    await expect(result.toPromise()).resolves.toBe(1);
    expect(await result).toBe(1);
  });

  it('resolves a caller that started waiting before the reply', async () => {
    const { sender, result } = createReplyBridge<string>();
    const waiting = result.toPromise();

    expect(sender.isSettled).toBe(false);
    sender.send('ok');

    await expect(waiting).resolves.toBe('ok');
  });

  it('fails with the closed condition when the sender closes first', async () => {
    const { sender, result } = createReplyBridge<number>();
    const waiting = result.toPromise();

    expect(sender.close()).toBe(true);
    expect(sender.send(3)).toBe(false);

    await expect(waiting).rejects.toBeInstanceOf(AggregatorClosedError);
    await expect(waiting).rejects.toMatchObject({ code: 'closed' });
  });

  it('stays quiet when a discarded result is closed', async () => {
    const { sender } = createReplyBridge<number>();
    sender.close();
    await settle();
    expect(sender.isSettled).toBe(true);
  });

  it('creates already-closed results', async () => {
    await expect(AsyncResult.closed<number>().toPromise()).rejects.toBeInstanceOf(AggregatorClosedError);
  });

  it('lets several awaiters share one result', async () => {
    const { sender, result } = createReplyBridge<string[]>();
    const both = Promise.all([result, result]);
    sender.send(['a']);

    const [first, second] = await both;
    expect(first).toBe(second);
  });
});
