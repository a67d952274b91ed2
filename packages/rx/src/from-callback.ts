/**
 * Observable factories for callback-style APIs.
 *
 * Each factory returns a cold observable: nothing is invoked until a
 * subscriber arrives, and every subscriber triggers its own invocation.
 */

import { Observable } from 'rxjs';
import { MissingResultError } from '@authflow/core';
import type { ListenerHandle, ResultCallback, VoidCallback } from './types.js';

function isFailure(error: unknown): boolean {
  return error !== null && error !== undefined;
}

/**
 * Adapt a call that reports `(error, result)` once.
 *
 * The observable emits the result and completes, or errors with the value the
 * callback reported. A callback carrying neither errors with
 * {@link MissingResultError}. Anything the callback reports after the first
 * terminal event, or after the subscriber left, is dropped.
 *
 * @param invoke - Starts the call and hands it the callback
 * @param operation - Operation name used in {@link MissingResultError}
 *
 * @example
 * ```typescript
 * const methods$ = fromResultCallback<string[]>(
 *   (callback) => client.fetchSignInMethodsForEmail(email, callback),
 *   'fetchSignInMethods'
 * );
 * ```
 */
export function fromResultCallback<T>(
  invoke: (callback: ResultCallback<T>) => void,
  operation: string
): Observable<T> {
  return new Observable<T>((subscriber) => {
    invoke((error, result) => {
      if (isFailure(error)) {
        subscriber.error(error);
        return;
      }
      if (result === null || result === undefined) {
        subscriber.error(new MissingResultError(operation));
        return;
      }
      subscriber.next(result);
      subscriber.complete();
    });
  });
}

/**
 * Adapt a call that reports only `(error)` once.
 *
 * Emits `undefined` and completes on success.
 */
export function fromVoidCallback(invoke: (callback: VoidCallback) => void): Observable<void> {
  return new Observable<void>((subscriber) => {
    invoke((error) => {
      if (isFailure(error)) {
        subscriber.error(error);
        return;
      }
      subscriber.next();
      subscriber.complete();
    });
  });
}

/**
 * Adapt a register/remove listener pair into a never-ending stream.
 *
 * Every subscription registers its own listener and removes it with the
 * handle it received, once, when the subscriber unsubscribes.
 *
 * @param register - Registers a listener and returns its handle
 * @param remove - Removes the listener identified by a handle
 */
export function fromListener<T>(
  register: (emit: (value: T) => void) => ListenerHandle,
  remove: (handle: ListenerHandle) => void
): Observable<T> {
  return new Observable<T>((subscriber) => {
    const handle = register((value) => subscriber.next(value));
    return () => remove(handle);
  });
}
