import { describe, it, expect, vi } from 'vitest';
import { abortable } from './abort.js';
import { AbortedError } from './errors.js';

describe('abortable', () => {
  it('runs the call directly when no signal is given', async () => {
    const run = vi.fn(() => Promise.resolve('done'));

    await expect(abortable('read', run)).resolves.toBe('done');
    expect(run).toHaveBeenCalledOnce();
  });

  it('rejects without running when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort('shutdown');
    const run = vi.fn(() => Promise.resolve('done'));

    const promise = abortable('read', run, controller.signal);

    await expect(promise).rejects.toBeInstanceOf(AbortedError);
    await expect(promise).rejects.toMatchObject({
      code: 'ABORTED',
      cause: 'shutdown',
      context: { operation: 'read' },
    });
    expect(run).not.toHaveBeenCalled();
  });

  it('rejects when the signal fires while the call is in flight', async () => {
    const controller = new AbortController();
    const run = vi.fn(() => new Promise<string>(() => undefined));

    const promise = abortable('update', run, controller.signal);
    controller.abort();

    await expect(promise).rejects.toThrow('Operation "update" was aborted');
  });

  it('does not withdraw a call that was already sent', async () => {
    const controller = new AbortController();
    let finish: () => void = () => undefined;
    let applied = false;
    const sent = new Promise<void>((resolve) => {
      finish = () => {
        applied = true;
        resolve();
      };
    });

    const promise = abortable('delete', () => sent, controller.signal);
    controller.abort();
    await expect(promise).rejects.toBeInstanceOf(AbortedError);

    finish();
    await sent;
    expect(applied).toBe(true);
  });

  it('passes the call rejection through unchanged', async () => {
    const controller = new AbortController();
    const boom = new Error('boom');

    await expect(abortable('delete', () => Promise.reject(boom), controller.signal)).rejects.toBe(
      boom,
    );
  });
});
