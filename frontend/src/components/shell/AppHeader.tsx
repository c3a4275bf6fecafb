import React from 'react';
import { Home } from 'lucide-react';
import { ConfirmModal } from '../ui';
import { useDashboardReturn, type DashboardReturnOptions } from '../../hooks/useDashboardReturn';

export const DASHBOARD_LABEL = 'Kembali ke Dashboard SIPADU';

interface AppHeaderProps extends DashboardReturnOptions {
  appName: string;
  appVersion: string;
  children?: React.ReactNode;
}

export const AppHeader: React.FC<AppHeaderProps> = ({ appName, appVersion, children, ...returnOptions }) => {
  const { isConfirmOpen, setConfirmOpen, requestReturn, confirmReturn } = useDashboardReturn(returnOptions);

  return (
    <header className="app-header">
      <button
        type="button"
        className="app-header__logo"
        title={DASHBOARD_LABEL}
        aria-label={DASHBOARD_LABEL}
        onClick={requestReturn}
      >
        <Home size={18} aria-hidden />
        <span>{appName}</span>
      </button>

      {children}

      <p className="app-header__version">version: {appVersion}</p>

      <ConfirmModal
        open={isConfirmOpen}
        onOpenChange={setConfirmOpen}
        title={DASHBOARD_LABEL}
        description={
          <>
            <p>Anda akan keluar dari AI Tools dan menuju ke Dashboard SIPADU.</p>
            <p>Silakan tekan Lanjutkan untuk melanjutkan.</p>
          </>
        }
        onConfirm={confirmReturn}
      />
    </header>
  );
};

export default AppHeader;
