import { useEffect, useState } from 'react';

export const PRELOADER_STATUS_TEXTS = [
  'Memuat sistem',
  'Menginisialisasi komponen',
  'Mempersiapkan antarmuka',
  'Menghubungkan ke server',
  'Memuat konfigurasi',
  'Hampir selesai',
] as const;

export const PRELOADER_READY_TEXT = 'Siap digunakan!';

export const PRELOADER_TIMINGS = {
  statusIntervalMs: 400,
  minDisplayMs: 1800,
  fadeDelayMs: 200,
  removeDelayMs: 500,
};

export type PreloaderPhase = 'loading' | 'ready' | 'fading' | 'done';

const LAST_STATUS = PRELOADER_STATUS_TEXTS.length - 1;

/**
 * Preloader timeline: rotating status texts for at least the minimum display
 * time, then "ready", fade, and removal once the app reports ready
 */
export function usePreloader(appReady: boolean) {
  const [statusIndex, setStatusIndex] = useState(0);
  const [minElapsed, setMinElapsed] = useState(false);
  const [phase, setPhase] = useState<PreloaderPhase>('loading');

  useEffect(() => {
    if (phase !== 'loading') return undefined;
    const interval = setInterval(() => {
      setStatusIndex((index) => Math.min(index + 1, LAST_STATUS));
    }, PRELOADER_TIMINGS.statusIntervalMs);
    return () => clearInterval(interval);
  }, [phase]);

  useEffect(() => {
    const timeout = setTimeout(() => setMinElapsed(true), PRELOADER_TIMINGS.minDisplayMs);
    return () => clearTimeout(timeout);
  }, []);

  useEffect(() => {
    if (phase === 'loading' && minElapsed && appReady) {
      setPhase('ready');
    }
  }, [phase, minElapsed, appReady]);

  useEffect(() => {
    if (phase === 'ready') {
      const timeout = setTimeout(() => setPhase('fading'), PRELOADER_TIMINGS.fadeDelayMs);
      return () => clearTimeout(timeout);
    }
    if (phase === 'fading') {
      const timeout = setTimeout(() => setPhase('done'), PRELOADER_TIMINGS.removeDelayMs);
      return () => clearTimeout(timeout);
    }
    return undefined;
  }, [phase]);

  return {
    phase,
    statusText: phase === 'loading' ? PRELOADER_STATUS_TEXTS[statusIndex] : PRELOADER_READY_TEXT,
    isLoaded: phase === 'done',
  };
}

export default usePreloader;
