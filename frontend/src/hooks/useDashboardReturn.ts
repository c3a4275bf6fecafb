import { useCallback, useEffect, useRef, useState } from 'react';
import { useToast } from '../components/ui';
import { resolveHomeUrl, type RuntimeConfig } from '../config/runtimeConfig';
import { STORAGE_KEYS, setStorage } from '../utils/storage';

export const REDIRECT_DELAY_MS = 800;

export const DASHBOARD_MESSAGES = {
  redirecting: 'Mengarahkan ke Dashboard SIPADU...',
  redirectFailed: 'Gagal mengarahkan ke SIPADU. Silakan buka manual.',
} as const;

export interface DashboardReturnOptions {
  config: Pick<RuntimeConfig, 'homeUrl' | 'apiBase'>;
  onLogout: () => void;
  navigate?: (url: string) => void;
  openWindow?: (url: string) => void;
}

const assignLocation = (url: string) => {
  window.location.assign(url);
};

const openInNewTab = (url: string) => {
  window.open(url, '_blank');
};

/**
 * Confirm-then-redirect flow of the logo button
 */
export function useDashboardReturn({
  config,
  onLogout,
  navigate = assignLocation,
  openWindow = openInNewTab,
}: DashboardReturnOptions) {
  const [isConfirmOpen, setConfirmOpen] = useState(false);
  const timerRef = useRef<ReturnType<typeof setTimeout>>();
  const toast = useToast();

  useEffect(() => () => clearTimeout(timerRef.current), []);

  const requestReturn = useCallback(() => setConfirmOpen(true), []);

  const confirmReturn = useCallback(() => {
    setConfirmOpen(false);
    toast.info(DASHBOARD_MESSAGES.redirecting);

    const url = resolveHomeUrl(config);
    console.log('Redirecting to dashboard:', url);

    clearTimeout(timerRef.current);
    timerRef.current = setTimeout(() => {
      try {
        if (config.apiBase) {
          setStorage(STORAGE_KEYS.sipaduBaseUrl, config.apiBase);
        }
        onLogout();
        navigate(url);
      } catch (error) {
        console.error('Redirect failed:', error);
        toast.error(DASHBOARD_MESSAGES.redirectFailed);
        openWindow(url);
      }
    }, REDIRECT_DELAY_MS);
  }, [config, onLogout, navigate, openWindow, toast]);

  return {
    isConfirmOpen,
    setConfirmOpen,
    requestReturn,
    confirmReturn,
  };
}

export default useDashboardReturn;
