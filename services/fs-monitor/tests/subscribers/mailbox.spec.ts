import { describe, expect, it } from 'vitest';
import { Mailbox } from '../../src/subscribers/mailbox.js';

describe('Mailbox', () => {
  it('keeps items in arrival order', () => {
    const mailbox = new Mailbox<number>(4);
    mailbox.offer(1);
    mailbox.offer(2);
    mailbox.offer(3);

    expect(mailbox.poll()).toBe(1);
    expect(mailbox.drain()).toEqual([2, 3]);
    expect(mailbox.size).toBe(0);
  });

  it('refuses items beyond its capacity without blocking', () => {
    const mailbox = new Mailbox<string>(2);

    expect(mailbox.offer('a')).toBe(true);
    expect(mailbox.offer('b')).toBe(true);
    expect(mailbox.offer('c')).toBe(false);
    expect(mailbox.offer('d')).toBe(false);

    expect(mailbox.dropped).toBe(2);
    expect(mailbox.drain()).toEqual(['a', 'b']);
  });

  it('hands an offered item straight to a waiting taker', async () => {
    const mailbox = new Mailbox<string>(1);
    const taken = mailbox.take();

    expect(mailbox.offer('direct')).toBe(true);
    expect(await taken).toBe('direct');
    expect(mailbox.size).toBe(0);
  });

  it('returns a queued item from take without waiting', async () => {
    const mailbox = new Mailbox<string>(2);
    mailbox.offer('queued');

    expect(await mailbox.take()).toBe('queued');
  });

  it('forces an item past its capacity', () => {
    const mailbox = new Mailbox<string>(1);
    mailbox.offer('a');

    mailbox.force('must-arrive');

    expect(mailbox.dropped).toBe(0);
    expect(mailbox.drain()).toEqual(['a', 'must-arrive']);
  });

  it('stops claiming items for a take that was aborted', async () => {
    const mailbox = new Mailbox<string>(2);
    const controller = new AbortController();
    const abandoned = mailbox.take(controller.signal);

    controller.abort(new Error('gave up'));
    await expect(abandoned).rejects.toThrow('gave up');

    expect(mailbox.offer('next')).toBe(true);
    expect(mailbox.size).toBe(1);
    expect(await mailbox.take()).toBe('next');
  });

  it('rejects a take whose signal is already aborted', async () => {
    const mailbox = new Mailbox<string>(1);

    await expect(mailbox.take(AbortSignal.abort(new Error('too late')))).rejects.toThrow('too late');
  });

  it('rejects a capacity below one', () => {
    expect(() => new Mailbox(0)).toThrow(RangeError);
  });
});
