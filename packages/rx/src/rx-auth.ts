/**
 * RxAuth - Reactive facade over a callback-based auth client
 *
 * Re-exposes every client operation as a cold single-shot observable and the
 * client's listeners as never-ending state-change streams.
 */

import { NEVER, type Observable, defer, tap, throwError } from 'rxjs';
import { type AuthflowLogger, ContextUnavailableError, createLogger, describeError } from '@authflow/core';
import { fromListener, fromResultCallback, fromVoidCallback } from './from-callback.js';
import type {
  ActionCodeInfo,
  ActionCodeSettings,
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

type ListenerKind = 'authState' | 'idToken';

/**
 * Reactive adapter for a {@link CallbackAuthClient}.
 *
 * Holds the client through a {@link ContextRef} and never keeps it alive on
 * its own. Every single-shot observable resolves the client when subscribed
 * to; if it has been released by then the observable errors with
 * {@link ContextUnavailableError}, or never emits when configured with
 * `releasedContext: 'stall'`.
 *
 * Errors reported by the client reach subscribers unchanged.
 *
 * @example
 * ```typescript
 * const rxAuth = createRxAuth(client);
 *
 * rxAuth.authStateChanges().subscribe(({ user }) => {
 *   console.log('Signed in as', user?.email ?? 'nobody');
 * });
 *
 * const { user } = await firstValueFrom(
 *   rxAuth.createUser('ada@example.com', 'correct-horse')
 * );
 * ```
 */
export class RxAuth<TUser extends AuthUser = AuthUser> {
  private readonly logger: AuthflowLogger;
  private readonly releasedContext: ReleasedContextBehavior;

  constructor(
    private readonly context: ContextRef<CallbackAuthClient<TUser>>,
    config: RxAuthConfig = {}
  ) {
    this.logger = config.logger ?? createLogger({ module: 'authflow:rx', debug: config.debug });
    this.releasedContext = config.releasedContext ?? 'error';
  }

  // ── Authentication state ─────────────────────────────────────────────

  /**
   * Stream of auth state changes.
   *
   * Emits when the listener is registered, when a user with a different
   * uid signs in, and when the current user signs out. Each subscription
   * registers its own listener and removes it on unsubscribe.
   */
  authStateChanges(): Observable<AuthStateChange<TUser>> {
    return this.listen('authState');
  }

  /**
   * Stream of ID token changes.
   *
   * Emits on everything {@link authStateChanges} emits on, and additionally
   * whenever the current user's ID token is refreshed.
   */
  idTokenChanges(): Observable<AuthStateChange<TUser>> {
    return this.listen('idToken');
  }

  // ── Anonymous authentication ─────────────────────────────────────────

  /**
   * Create and sign in an anonymous user.
   *
   * If an anonymous user is already signed in, the client returns that user.
   */
  signInAnonymously(): Observable<AuthDataResult<TUser>> {
    return this.valueOperation('signInAnonymously', (client, callback) => client.signInAnonymously(callback));
  }

  // ── Email/password authentication ────────────────────────────────────

  /**
   * Create an account and, on success, sign it in.
   */
  createUser(email: string, password: string): Observable<AuthDataResult<TUser>> {
    return this.valueOperation('createUser', (client, callback) =>
      client.createUserWithEmailAndPassword(email, password, callback)
    );
  }

  /**
   * Sign in with an email address and password.
   */
  signInWithEmailAndPassword(email: string, password: string): Observable<AuthDataResult<TUser>> {
    return this.valueOperation('signInWithEmailAndPassword', (client, callback) =>
      client.signInWithEmailAndPassword(email, password, callback)
    );
  }

  // ── Email link authentication ────────────────────────────────────────

  /**
   * Sign in with an email address and the sign-in link sent to it.
   */
  signInWithEmailLink(email: string, link: string): Observable<AuthDataResult<TUser>> {
    return this.valueOperation('signInWithEmailLink', (client, callback) =>
      client.signInWithEmailLink(email, link, callback)
    );
  }

  /**
   * Send a sign-in link to an email address.
   */
  sendSignInLinkToEmail(email: string, actionCodeSettings: ActionCodeSettings): Observable<void> {
    return this.voidOperation('sendSignInLinkToEmail', (client, callback) =>
      client.sendSignInLinkToEmail(email, actionCodeSettings, callback)
    );
  }

  /**
   * List the sign-in methods previously used with an email address.
   */
  fetchSignInMethods(email: string): Observable<string[]> {
    return this.valueOperation('fetchSignInMethods', (client, callback) =>
      client.fetchSignInMethodsForEmail(email, callback)
    );
  }

  // ── Password reset and action codes ──────────────────────────────────

  /**
   * Set a new password using an out-of-band reset code.
   */
  confirmPasswordReset(code: string, newPassword: string): Observable<void> {
    return this.voidOperation('confirmPasswordReset', (client, callback) =>
      client.confirmPasswordReset(code, newPassword, callback)
    );
  }

  /**
   * Check a password reset code.
   *
   * @returns Observable of the email address the code was issued for
   */
  verifyPasswordResetCode(code: string): Observable<string> {
    return this.valueOperation('verifyPasswordResetCode', (client, callback) =>
      client.verifyPasswordResetCode(code, callback)
    );
  }

  /**
   * Check an out-of-band action code and describe what it is for.
   */
  checkActionCode(code: string): Observable<ActionCodeInfo> {
    return this.valueOperation('checkActionCode', (client, callback) => client.checkActionCode(code, callback));
  }

  /**
   * Apply an out-of-band action code.
   *
   * Codes that need another argument, such as password reset codes, are
   * rejected by the client.
   */
  applyActionCode(code: string): Observable<void> {
    return this.voidOperation('applyActionCode', (client, callback) => client.applyActionCode(code, callback));
  }

  /**
   * Send a password reset email, optionally with link handling settings.
   */
  sendPasswordResetEmail(email: string, actionCodeSettings?: ActionCodeSettings): Observable<void> {
    return this.voidOperation('sendPasswordResetEmail', (client, callback) =>
      client.sendPasswordResetEmail(email, actionCodeSettings, callback)
    );
  }

  // ── Session ──────────────────────────────────────────────────────────

  /**
   * Sign out the current user.
   */
  signOut(): Observable<void> {
    return this.voidOperation('signOut', (client, callback) => client.signOut(callback));
  }

  // ── Private ──────────────────────────────────────────────────────────

  private valueOperation<T>(
    operation: string,
    invoke: (client: CallbackAuthClient<TUser>, callback: ResultCallback<T>) => void
  ): Observable<T> {
    return this.single(operation, (client) =>
      fromResultCallback<T>((callback) => invoke(client, callback), operation)
    );
  }

  private voidOperation(
    operation: string,
    invoke: (client: CallbackAuthClient<TUser>, callback: VoidCallback) => void
  ): Observable<void> {
    return this.single(operation, (client) => fromVoidCallback((callback) => invoke(client, callback)));
  }

  private single<T>(
    operation: string,
    start: (client: CallbackAuthClient<TUser>) => Observable<T>
  ): Observable<T> {
    return defer(() => {
      const client = this.context.deref();
      if (!client) {
        this.logger.warn('Auth context released before activation', {
          operation,
          behavior: this.releasedContext,
        });
        return this.releasedContext === 'stall'
          ? NEVER
          : throwError(() => new ContextUnavailableError(operation));
      }

      this.logger.debug(`${operation} started`, { operation });
      const end = this.logger.time(operation);
      return start(client).pipe(
        tap({
          complete: () => end({ operation }),
          error: (error: unknown) => {
            if (this.logger.isLevelEnabled('debug')) {
              this.logger.debug(`${operation} failed`, { operation, error: describeError(error) });
            }
          },
        })
      );
    });
  }

  private listen(kind: ListenerKind): Observable<AuthStateChange<TUser>> {
    return defer(() => {
      const client = this.context.deref();
      if (!client) {
        this.logger.warn('Auth context released before listener registration', { kind });
        return NEVER;
      }

      return fromListener<AuthStateChange<TUser>>(
        (emit) => {
          const listener: AuthStateListener<TUser> = (auth, user) => emit({ auth, user });
          const handle: ListenerHandle =
            kind === 'authState' ? client.onAuthStateChanged(listener) : client.onIdTokenChanged(listener);
          this.logger.debug('Listener registered', { kind });
          return handle;
        },
        (handle) => {
          if (kind === 'authState') {
            client.removeAuthStateListener(handle);
          } else {
            client.removeIdTokenListener(handle);
          }
          this.logger.debug('Listener removed', { kind });
        }
      );
    });
  }
}

/**
 * Create an RxAuth adapter that holds the client weakly.
 *
 * @param client - The callback-based auth client to adapt
 * @param config - Optional adapter configuration
 */
export function createRxAuth<TUser extends AuthUser = AuthUser>(
  client: CallbackAuthClient<TUser>,
  config?: RxAuthConfig
): RxAuth<TUser> {
  return new RxAuth<TUser>(new WeakRef(client), config);
}
