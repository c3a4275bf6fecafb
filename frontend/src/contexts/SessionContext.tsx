import React, { createContext, useCallback, useContext, useEffect, useMemo, useState, ReactNode } from 'react';
import type { SessionUser } from '../services/schemas';
import { sessionService } from '../services/sessionService';
import {
  applySessionTransition,
  readPreviousSession,
  readStoredUser,
  readTokenFromUrl,
  resolveSessionTransition,
  type SessionTransition,
} from '../services/session';
import { clearUserStorage } from '../utils/storage';
import { getErrorMessage } from '../hooks/useApiError';

export type SessionStatus = 'checking' | SessionTransition['kind'] | 'error' | 'signed_out';

interface SessionState {
  status: SessionStatus;
  user: SessionUser | null;
  message?: string;
}

interface SessionContextType extends SessionState {
  /** The check has finished, whatever its outcome */
  isReady: boolean;
  isAuthenticated: boolean;
  logout: () => void;
}

const SessionContext = createContext<SessionContextType | null>(null);

const stateFromTransition = (transition: SessionTransition): SessionState => {
  switch (transition.kind) {
    case 'dev':
      return { status: 'dev', user: transition.user };
    case 'no_token':
    case 'failed':
      return { status: transition.kind, user: null, message: transition.message };
    default:
      return { status: transition.kind, user: transition.session.user };
  }
};

interface SessionProviderProps {
  children: ReactNode;
  validate?: typeof sessionService.validate;
}

export function SessionProvider({ children, validate = sessionService.validate }: SessionProviderProps) {
  const [state, setState] = useState<SessionState>({ status: 'checking', user: null });

  useEffect(() => {
    let cancelled = false;
    const token = readTokenFromUrl();
    const previous = readPreviousSession();

    validate(token)
      .then((outcome) => {
        if (cancelled) return;
        const transition = resolveSessionTransition(previous, token, outcome);
        applySessionTransition(transition);
        console.log('Session check:', transition.kind);
        setState(stateFromTransition(transition));
      })
      .catch((error: unknown) => {
        if (cancelled) return;
        console.error('Session check failed:', error);
        // Keep whatever was stored; SIPADU may just be unreachable for a moment
        setState({ status: 'error', user: readStoredUser() ?? null, message: getErrorMessage(error) });
      });

    return () => {
      cancelled = true;
    };
  }, [validate]);

  const logout = useCallback(() => {
    clearUserStorage();
    setState({ status: 'signed_out', user: null });
  }, []);

  const value = useMemo(
    () => ({
      ...state,
      isReady: state.status !== 'checking',
      isAuthenticated: state.user !== null,
      logout,
    }),
    [state, logout]
  );

  return <SessionContext.Provider value={value}>{children}</SessionContext.Provider>;
}

export const useSession = () => {
  const context = useContext(SessionContext);
  if (!context) throw new Error('useSession must be used within SessionProvider');
  return context;
};
