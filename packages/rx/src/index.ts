/**
 * @authflow/rx - RxJS bindings for callback-based auth clients
 *
 * Turns each client operation into a cold observable that emits once and
 * completes (or errors with the client's own error), and turns the client's
 * auth-state and ID-token listeners into never-ending streams that remove
 * their listener on unsubscribe.
 *
 * @example
 * ```typescript
 * import { firstValueFrom } from 'rxjs';
 * import { createRxAuth } from '@authflow/rx';
 *
 * const rxAuth = createRxAuth(client);
 *
 * const subscription = rxAuth.authStateChanges().subscribe(({ user }) => {
 *   render(user);
 * });
 *
 * await firstValueFrom(rxAuth.signInWithEmailAndPassword(email, password));
 * await firstValueFrom(rxAuth.signOut());
 *
 * subscription.unsubscribe();
 * ```
 *
 * @packageDocumentation
 */

// Types
export type {
  ActionCodeInfo,
  ActionCodeOperation,
  ActionCodeSettings,
  AdditionalUserInfo,
  AuthDataResult,
  AuthStateChange,
  AuthStateListener,
  AuthUser,
  CallbackAuthClient,
  ContextRef,
  ListenerHandle,
  ReleasedContextBehavior,
  ResultCallback,
  RxAuthConfig,
  VoidCallback,
} from './types.js';

// Callback adapters
export { fromListener, fromResultCallback, fromVoidCallback } from './from-callback.js';

// Adapter
export { RxAuth, createRxAuth } from './rx-auth.js';
