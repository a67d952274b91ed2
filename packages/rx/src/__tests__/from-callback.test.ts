import { describe, it, expect, vi } from 'vitest';
import { lastValueFrom, toArray } from 'rxjs';
import { MissingResultError } from '@authflow/core';
import { fromListener, fromResultCallback, fromVoidCallback } from '../from-callback.js';
import type { ResultCallback } from '../types.js';

describe('fromResultCallback', () => {
  it('should treat a zero result as a value, not as missing', async () => {
    const count$ = fromResultCallback<number>((callback) => callback(null, 0), 'count');

    await expect(lastValueFrom(count$.pipe(toArray()))).resolves.toEqual([0]);
  });

  it('should treat an empty string as a value', async () => {
    const email$ = fromResultCallback<string>((callback) => callback(undefined, ''), 'email');

    await expect(lastValueFrom(email$)).resolves.toBe('');
  });

  it('should name the operation in MissingResultError', async () => {
    const empty$ = fromResultCallback<string>((callback) => callback(null), 'verifyPasswordResetCode');

    const error = await lastValueFrom(empty$).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(MissingResultError);
    expect(error).toMatchObject({ operation: 'verifyPasswordResetCode' });
  });

  it('should invoke once per subscriber', () => {
    const invoke = vi.fn<(callback: ResultCallback<string>) => void>();
    const source$ = fromResultCallback(invoke, 'op');

    expect(invoke).not.toHaveBeenCalled();
    source$.subscribe();
    source$.subscribe();
    expect(invoke).toHaveBeenCalledTimes(2);
  });
});

describe('fromVoidCallback', () => {
  it('should treat falsy non-null errors as failures', async () => {
    const failing$ = fromVoidCallback((callback) => callback(0));

    await expect(lastValueFrom(failing$)).rejects.toBe(0);
  });
});

describe('fromListener', () => {
  it('should forward emitted values and remove with the registered handle', () => {
    const remove = vi.fn<(handle: unknown) => void>();
    let emit: ((value: string) => void) | undefined;
    const handle = { id: 'listener-1' };

    const values: string[] = [];
    const subscription = fromListener<string>(
      (next) => {
        emit = next;
        return handle;
      },
      remove
    ).subscribe((value) => values.push(value));

    emit?.('a');
    emit?.('b');
    subscription.unsubscribe();
    emit?.('c');

    expect(values).toEqual(['a', 'b']);
    expect(remove).toHaveBeenCalledTimes(1);
    expect(remove.mock.calls[0]?.[0]).toBe(handle);
  });
});
