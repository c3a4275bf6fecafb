import React from 'react';
import { LogOut } from 'lucide-react';
import { Button } from '../ui';
import { useSession } from '../../contexts/SessionContext';

const STATUS_LABELS: Record<string, string> = {
  dev: 'Mode pengembangan',
  login: 'Masuk melalui SIPADU',
  token_refresh: 'Masuk melalui SIPADU',
  user_switch: 'Masuk melalui SIPADU',
  no_token: 'Belum masuk',
  failed: 'Validasi token gagal',
  error: 'SIPADU tidak dapat dihubungi',
  signed_out: 'Keluar',
};

export const AccountPanel: React.FC = () => {
  const { user, status, message, logout } = useSession();

  return (
    <section className="account-panel" aria-label="Akun">
      <h2>Akun</h2>
      {user ? (
        <dl>
          <dt>Nama</dt>
          <dd>{user.fullName}</dd>
          <dt>Pengguna</dt>
          <dd>{user.username}</dd>
          {user.unit && (
            <>
              <dt>Unit kerja</dt>
              <dd>{user.unit}</dd>
            </>
          )}
        </dl>
      ) : (
        <p>Tidak ada sesi aktif.</p>
      )}
      <p className="account-panel__status">
        Status: {STATUS_LABELS[status] ?? status}
        {message && ` (${message})`}
      </p>
      {user && (
        <Button variant="secondary" leftIcon={<LogOut size={16} />} onClick={logout}>
          Hapus sesi
        </Button>
      )}
    </section>
  );
};

export default AccountPanel;
