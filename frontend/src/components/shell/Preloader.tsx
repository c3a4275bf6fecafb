import React from 'react';
import { motion } from 'framer-motion';
import { clsx } from 'clsx';
import { usePreloader } from '../../hooks/usePreloader';

interface PreloaderProps {
  appName: string;
  appReady: boolean;
  onLoaded?: () => void;
}

export const Preloader: React.FC<PreloaderProps> = ({ appName, appReady, onLoaded }) => {
  const { phase, statusText, isLoaded } = usePreloader(appReady);

  React.useEffect(() => {
    if (isLoaded) onLoaded?.();
  }, [isLoaded, onLoaded]);

  if (isLoaded) return null;

  return (
    <div
      className={clsx('preloader', phase === 'fading' && 'preloader--fade-out')}
      role="status"
      aria-live="polite"
      data-phase={phase}
    >
      <motion.div
        className="preloader__logo"
        animate={{ scale: [1, 1.06, 1], opacity: [0.8, 1, 0.8] }}
        transition={{ duration: 1.5, repeat: Infinity, ease: 'easeInOut' }}
      >
        {appName}
      </motion.div>
      <div className="preloader__bar">
        <div className={clsx('preloader__bar-fill', phase !== 'loading' && 'preloader__bar-fill--complete')} />
      </div>
      <p className="preloader__status">{statusText}</p>
    </div>
  );
};

export default Preloader;
