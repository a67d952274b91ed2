import { vi } from 'vitest';
import type {
  ActionCodeInfo,
  ActionCodeSettings,
  AuthDataResult,
  AuthStateListener,
  AuthUser,
  CallbackAuthClient,
  ListenerHandle,
  ResultCallback,
  VoidCallback,
} from '../types.js';

export const TEST_USER: AuthUser = {
  uid: 'user-1',
  email: 'ada@example.com',
  emailVerified: false,
  isAnonymous: false,
  displayName: null,
};

export const TEST_RESULT: AuthDataResult = {
  user: TEST_USER,
  operationType: 'signIn',
  additionalUserInfo: { isNewUser: true, providerId: 'password' },
};

export const TEST_CODE_INFO: ActionCodeInfo = {
  operation: 'VERIFY_EMAIL',
  data: { email: 'ada@example.com', previousEmail: null },
};

/**
 * Auth client whose methods are spies. Callbacks are never invoked on their
 * own; tests pull them out of `mock.calls` and fire them.
 */
export function createMockClient() {
  let nextHandle = 0;

  const client = {
    currentUser: null,
    signInAnonymously: vi.fn<(callback: ResultCallback<AuthDataResult>) => void>(),
    createUserWithEmailAndPassword:
      vi.fn<(email: string, password: string, callback: ResultCallback<AuthDataResult>) => void>(),
    signInWithEmailAndPassword:
      vi.fn<(email: string, password: string, callback: ResultCallback<AuthDataResult>) => void>(),
    signInWithEmailLink:
      vi.fn<(email: string, link: string, callback: ResultCallback<AuthDataResult>) => void>(),
    sendSignInLinkToEmail:
      vi.fn<(email: string, settings: ActionCodeSettings, callback: VoidCallback) => void>(),
    fetchSignInMethodsForEmail: vi.fn<(email: string, callback: ResultCallback<string[]>) => void>(),
    confirmPasswordReset: vi.fn<(code: string, newPassword: string, callback: VoidCallback) => void>(),
    verifyPasswordResetCode: vi.fn<(code: string, callback: ResultCallback<string>) => void>(),
    checkActionCode: vi.fn<(code: string, callback: ResultCallback<ActionCodeInfo>) => void>(),
    applyActionCode: vi.fn<(code: string, callback: VoidCallback) => void>(),
    sendPasswordResetEmail:
      vi.fn<(email: string, settings: ActionCodeSettings | undefined, callback: VoidCallback) => void>(),
    signOut: vi.fn<(callback: VoidCallback) => void>(),
    onAuthStateChanged: vi.fn<(listener: AuthStateListener) => ListenerHandle>(
      () => `auth-state-${++nextHandle}`
    ),
    removeAuthStateListener: vi.fn<(handle: ListenerHandle) => void>(),
    onIdTokenChanged: vi.fn<(listener: AuthStateListener) => ListenerHandle>(
      () => `id-token-${++nextHandle}`
    ),
    removeIdTokenListener: vi.fn<(handle: ListenerHandle) => void>(),
  } satisfies CallbackAuthClient;

  return client;
}

export type MockClient = ReturnType<typeof createMockClient>;

/**
 * Context reference that can be released on demand
 */
export function createReleasableRef<T>(value: T) {
  let current: T | undefined = value;
  return {
    deref: () => current,
    release: () => {
      current = undefined;
    },
  };
}
