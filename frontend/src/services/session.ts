import { sessionUserSchema, type SessionCheck, type SessionUser } from './schemas';
import { STORAGE_KEYS, clearUserStorage, getStorage, setStorage } from '../utils/storage';

export const USER_ID_PREFIX = 'sipadu_';

export interface StoredSession {
  token: string;
  userId: string;
  user: SessionUser;
}

export interface PreviousSession {
  token?: string;
  userId?: string;
}

export type SessionTransition =
  | { kind: 'dev'; user: SessionUser }
  | { kind: 'no_token'; message: string; logout: boolean }
  | { kind: 'failed'; message: string; logout: true }
  | { kind: 'user_switch'; session: StoredSession }
  | { kind: 'token_refresh'; session: StoredSession }
  | { kind: 'login'; session: StoredSession };

export const ensureUserIdPrefix = (userId: string): string =>
  userId.startsWith(USER_ID_PREFIX) ? userId : `${USER_ID_PREFIX}${userId}`;

/**
 * Decide what a validation outcome means for the stored session.
 *
 * A logout only happens when there is something to log out from, or the
 * token was rejected. A new token for the same user only refreshes the token.
 */
export const resolveSessionTransition = (
  previous: PreviousSession,
  token: string | null,
  outcome: SessionCheck
): SessionTransition => {
  switch (outcome.status) {
    case 'DEV_MODE':
      return { kind: 'dev', user: outcome.user };
    case 'NO_TOKEN':
      return { kind: 'no_token', message: outcome.message, logout: Boolean(previous.token) };
    case 'FAILED':
      return { kind: 'failed', message: outcome.message, logout: true };
    case 'SUCCESS': {
      const userId = ensureUserIdPrefix(outcome.user.userId);
      const session: StoredSession = {
        token: token ?? '',
        userId,
        user: { ...outcome.user, userId },
      };
      if (previous.userId && previous.userId !== userId) {
        return { kind: 'user_switch', session };
      }
      if (previous.token && previous.token !== session.token && previous.userId === userId) {
        return { kind: 'token_refresh', session };
      }
      return { kind: 'login', session };
    }
  }
};

export const readPreviousSession = (storage: Storage = window.localStorage): PreviousSession => ({
  token: getStorage(STORAGE_KEYS.token, undefined, storage),
  userId: getStorage(STORAGE_KEYS.userId, undefined, storage),
});

const parseStoredUser = (raw: string | undefined): SessionUser | undefined => {
  if (!raw) return undefined;
  try {
    const parsed = sessionUserSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : undefined;
  } catch {
    return undefined;
  }
};

export const readStoredUser = (storage: Storage = window.localStorage): SessionUser | undefined =>
  parseStoredUser(getStorage(STORAGE_KEYS.session, undefined, storage));

const storeSession = (session: StoredSession, storage: Storage) => {
  setStorage(STORAGE_KEYS.token, session.token, storage);
  setStorage(STORAGE_KEYS.userId, session.userId, storage);
  setStorage(STORAGE_KEYS.session, JSON.stringify(session.user), storage);
};

/**
 * Apply a transition to browser storage
 */
export const applySessionTransition = (
  transition: SessionTransition,
  local: Storage = window.localStorage,
  session: Storage = window.sessionStorage
): void => {
  switch (transition.kind) {
    case 'dev':
      return;
    case 'no_token':
    case 'failed':
      if (transition.logout) clearUserStorage(local, session);
      return;
    case 'user_switch':
      console.log('User switch detected, clearing previous user data');
      clearUserStorage(local, session);
      storeSession(transition.session, local);
      return;
    case 'token_refresh':
      setStorage(STORAGE_KEYS.token, transition.session.token, local);
      return;
    case 'login':
      storeSession(transition.session, local);
      return;
  }
};

export const readTokenFromUrl = (search: string = window.location.search): string | null =>
  new URLSearchParams(search).get('token');
