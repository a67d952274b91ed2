/**
 * Types for the callback-based auth client contract and the reactive adapter
 */

import type { AuthflowLogger } from '@authflow/core';

/**
 * Signed-in principal as reported by the auth client.
 *
 * The adapter never reads these fields; clients may extend the shape and the
 * adapter is generic over the concrete type.
 */
export interface AuthUser {
  /** Stable user identifier */
  readonly uid: string;
  /** Email address, or null for anonymous users */
  readonly email: string | null;
  /** Whether the email address has been verified */
  readonly emailVerified: boolean;
  /** Whether the user signed in anonymously */
  readonly isAnonymous: boolean;
  /** Display name, if any */
  readonly displayName: string | null;
}

/**
 * Additional provider information returned with a sign-in
 */
export interface AdditionalUserInfo {
  /** Whether this sign-in created the account */
  readonly isNewUser: boolean;
  /** Provider that authenticated the user, e.g. 'password' */
  readonly providerId: string | null;
}

/**
 * Result of a sign-in or account creation
 */
export interface AuthDataResult<TUser extends AuthUser = AuthUser> {
  /** The signed-in user */
  readonly user: TUser;
  /** Kind of operation that produced this result */
  readonly operationType: 'signIn' | 'link' | 'reauthenticate';
  /** Provider-specific details, when available */
  readonly additionalUserInfo: AdditionalUserInfo | null;
}

/**
 * Purpose of an out-of-band action code
 */
export type ActionCodeOperation =
  | 'PASSWORD_RESET'
  | 'VERIFY_EMAIL'
  | 'RECOVER_EMAIL'
  | 'EMAIL_SIGNIN'
  | 'VERIFY_AND_CHANGE_EMAIL'
  | 'REVERT_SECOND_FACTOR_ADDITION';

/**
 * Metadata about an out-of-band action code
 */
export interface ActionCodeInfo {
  /** What the code is for */
  readonly operation: ActionCodeOperation;
  /** Addresses associated with the code */
  readonly data: {
    readonly email: string | null;
    readonly previousEmail: string | null;
  };
}

/**
 * Settings that control how an emailed action link is handled
 */
export interface ActionCodeSettings {
  /** Continue URL embedded in the link */
  url: string;
  /** Open the link in the app instead of a web page */
  handleCodeInApp?: boolean;
  /** iOS bundle to open the link in */
  iOS?: { bundleId: string };
  /** Android package to open the link in */
  android?: { packageName: string; installApp?: boolean; minimumVersion?: string };
  /** Custom dynamic link domain */
  dynamicLinkDomain?: string;
}

/**
 * Callback for operations that produce a value.
 *
 * A null or undefined `error` means success, in which case `result` carries
 * the value.
 */
export type ResultCallback<T> = (error: unknown, result?: T | null) => void;

/**
 * Callback for operations that produce no value
 */
export type VoidCallback = (error?: unknown) => void;

/**
 * Opaque token returned when a listener is registered
 */
export type ListenerHandle = unknown;

/**
 * Listener invoked with the client and its current user
 */
export type AuthStateListener<TUser extends AuthUser = AuthUser> = (
  auth: CallbackAuthClient<TUser>,
  user: TUser | null
) => void;

/**
 * The callback-based auth client this package adapts.
 *
 * Every method dispatches its work however the client sees fit and reports
 * back through the callback exactly once. The adapter makes no assumption
 * about the thread, queue or tick the callback fires on.
 */
export interface CallbackAuthClient<TUser extends AuthUser = AuthUser> {
  /** Currently signed-in user, or null */
  readonly currentUser: TUser | null;

  signInAnonymously(callback: ResultCallback<AuthDataResult<TUser>>): void;
  createUserWithEmailAndPassword(
    email: string,
    password: string,
    callback: ResultCallback<AuthDataResult<TUser>>
  ): void;
  signInWithEmailAndPassword(
    email: string,
    password: string,
    callback: ResultCallback<AuthDataResult<TUser>>
  ): void;
  signInWithEmailLink(
    email: string,
    link: string,
    callback: ResultCallback<AuthDataResult<TUser>>
  ): void;
  sendSignInLinkToEmail(
    email: string,
    actionCodeSettings: ActionCodeSettings,
    callback: VoidCallback
  ): void;
  fetchSignInMethodsForEmail(email: string, callback: ResultCallback<string[]>): void;
  confirmPasswordReset(code: string, newPassword: string, callback: VoidCallback): void;
  verifyPasswordResetCode(code: string, callback: ResultCallback<string>): void;
  checkActionCode(code: string, callback: ResultCallback<ActionCodeInfo>): void;
  applyActionCode(code: string, callback: VoidCallback): void;
  sendPasswordResetEmail(
    email: string,
    actionCodeSettings: ActionCodeSettings | undefined,
    callback: VoidCallback
  ): void;
  signOut(callback: VoidCallback): void;

  onAuthStateChanged(listener: AuthStateListener<TUser>): ListenerHandle;
  removeAuthStateListener(handle: ListenerHandle): void;
  onIdTokenChanged(listener: AuthStateListener<TUser>): ListenerHandle;
  removeIdTokenListener(handle: ListenerHandle): void;
}

/**
 * Value emitted by the state-change streams
 */
export interface AuthStateChange<TUser extends AuthUser = AuthUser> {
  /** The client that reported the change */
  readonly auth: CallbackAuthClient<TUser>;
  /** The current user, or null when signed out */
  readonly user: TUser | null;
}

/**
 * Non-owning reference to an auth client.
 *
 * `WeakRef` satisfies this interface.
 */
export interface ContextRef<T> {
  deref(): T | undefined;
}

/**
 * Behavior of single-shot operations whose context has been released
 */
export type ReleasedContextBehavior = 'error' | 'stall';

/**
 * Configuration for the reactive adapter
 */
export interface RxAuthConfig {
  /** What to do when the client is gone at activation (default: 'error') */
  releasedContext?: ReleasedContextBehavior;
  /** Logger to write operation and listener events to */
  logger?: AuthflowLogger;
  /** Log at debug level on the default logger (ignored when `logger` is set) */
  debug?: boolean;
}
