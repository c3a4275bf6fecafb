import React, { ErrorInfo } from 'react';
import { AlertTriangle, RefreshCw } from 'lucide-react';
import { Button } from './ui';

interface ErrorFallbackProps {
  error: Error | null;
  errorInfo?: ErrorInfo | null;
  onReset?: () => void;
}

const ErrorFallback: React.FC<ErrorFallbackProps> = ({ error, errorInfo, onReset }) => {
  const isDev = process.env.NODE_ENV === 'development';

  return (
    <div className="error-fallback" role="alert">
      <AlertTriangle className="error-fallback__icon" size={32} aria-hidden />
      <h1>Terjadi kesalahan</h1>
      <p>Halaman tidak dapat ditampilkan. Coba lagi atau muat ulang halaman.</p>

      {isDev && error && (
        <details className="error-fallback__details">
          <summary>Detail kesalahan</summary>
          <pre>{error.message}</pre>
          {error.stack && <pre>{error.stack}</pre>}
          {errorInfo?.componentStack && <pre>{errorInfo.componentStack}</pre>}
        </details>
      )}

      <div className="error-fallback__actions">
        {onReset && (
          <Button onClick={onReset} leftIcon={<RefreshCw size={16} />}>
            Coba lagi
          </Button>
        )}
        <Button variant="secondary" onClick={() => window.location.reload()}>
          Muat ulang
        </Button>
      </div>
    </div>
  );
};

export default ErrorFallback;
