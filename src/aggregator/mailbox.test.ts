import { describe, it, expect } from 'vitest';
import { Mailbox } from './mailbox.js';

describe('Mailbox', () => {
  it('is FIFO', async () => {
    const mailbox = new Mailbox<string>();
    mailbox.push('a');
    mailbox.push('b');

    expect(mailbox.length).toBe(2);
    expect(await mailbox.recv()).toBe('a');
    expect(await mailbox.recv()).toBe('b');
    expect(mailbox.length).toBe(0);
  });

  it('hands a push straight to a waiting receiver', async () => {
    const mailbox = new Mailbox<number>();
    const pending = mailbox.recv();

    expect(mailbox.push(7)).toBe(true);
    expect(mailbox.length).toBe(0);
    await expect(pending).resolves.toBe(7);
  });

  it('delivers queued items after close, then reports the end', async () => {
    const mailbox = new Mailbox<string>();
    mailbox.push('a');
    mailbox.close();

    expect(mailbox.isClosed).toBe(true);
    expect(mailbox.push('b')).toBe(false);
    expect(await mailbox.recv()).toBe('a');
    expect(await mailbox.recv()).toBeUndefined();
  });

  it('wakes a waiting receiver on close', async () => {
    const mailbox = new Mailbox<string>();
    const pending = mailbox.recv();
    mailbox.close();
    await expect(pending).resolves.toBeUndefined();
  });

  it('allows a single receiver at a time', async () => {
    const mailbox = new Mailbox<string>();
    const first = mailbox.recv();
    await expect(mailbox.recv()).rejects.toThrow('mailbox already has a pending receiver');

    mailbox.push('x');
    await expect(first).resolves.toBe('x');
  });

  it('drains whatever is queued', () => {
    const mailbox = new Mailbox<number>();
    mailbox.push(1);
    mailbox.push(2);

    expect(mailbox.drain()).toEqual([1, 2]);
    expect(mailbox.length).toBe(0);
  });
});
