export const STORAGE_KEYS = {
  session: 'kotaemon_user_session',
  userId: 'current_user_id',
  token: 'current_session_token',
  chatHistory: 'chat_history',
  fileCache: 'file_cache',
  userSettings: 'user_settings',
  sipaduBaseUrl: 'sipadu_base_url',
} as const;

// Everything tied to the signed-in SIPADU user
export const SESSION_STORAGE_KEYS: readonly string[] = [
  STORAGE_KEYS.session,
  STORAGE_KEYS.userId,
  STORAGE_KEYS.chatHistory,
  STORAGE_KEYS.fileCache,
  STORAGE_KEYS.userSettings,
  STORAGE_KEYS.token,
];

export const setStorage = (key: string, value: string, storage: Storage = window.localStorage): void => {
  storage.setItem(key, value);
};

export function getStorage(key: string, fallback: string, storage?: Storage): string;
export function getStorage(key: string, fallback?: string, storage?: Storage): string | undefined;
export function getStorage(key: string, fallback?: string, storage: Storage = window.localStorage): string | undefined {
  const item = storage.getItem(key);
  return item ? item : fallback;
}

export const removeFromStorage = (key: string, storage: Storage = window.localStorage): void => {
  storage.removeItem(key);
};

/**
 * Full logout: drop every user-scoped key and the whole session storage
 */
export const clearUserStorage = (
  local: Storage = window.localStorage,
  session: Storage = window.sessionStorage
): void => {
  SESSION_STORAGE_KEYS.forEach((key) => local.removeItem(key));
  session.clear();
  console.log('User storage cleared');
};
