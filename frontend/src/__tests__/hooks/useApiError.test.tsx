import React from 'react';
import { renderHook, act, render, screen } from '@testing-library/react';
import { useApiError, getErrorMessage } from '../../hooks/useApiError';
import { ToastProvider } from '../../components/ui/Toast';
import { ApiRequestError } from '../../config/api';

jest.mock('@radix-ui/react-toast', () => jest.requireActual('../mocks/radixToast'));

const wrapper = ({ children }: { children: React.ReactNode }) => <ToastProvider>{children}</ToastProvider>;

describe('getErrorMessage', () => {
  it('explains network failures', () => {
    expect(getErrorMessage(new ApiRequestError('Network error', 0, 'NETWORK_ERROR'))).toBe(
      'Gagal terhubung ke server. Periksa koneksi internet Anda.'
    );
  });

  it('keeps the server message for client errors', () => {
    expect(getErrorMessage(new ApiRequestError('Pesan wajib diisi', 400, 'VALIDATION_ERROR'))).toBe(
      'Pesan wajib diisi'
    );
  });

  const statusCases: Array<[number, string]> = [
    [502, 'Layanan sedang bermasalah. Silakan coba lagi.'],
    [503, 'Layanan belum tersedia. Silakan coba lagi nanti.'],
    [504, 'Layanan tidak merespons tepat waktu. Silakan coba lagi.'],
    [500, 'Terjadi kesalahan server. Silakan coba lagi nanti.'],
  ];

  it.each(statusCases)('maps status %i to a fixed message', (status, expected) => {
    expect(getErrorMessage(new ApiRequestError('upstream detail', status))).toBe(expected);
  });

  it('falls back to the status message when a client error has no text', () => {
    expect(getErrorMessage(new ApiRequestError('', 429))).toBe(
      'Terlalu banyak permintaan. Tunggu sebentar lalu coba lagi.'
    );
  });

  it('handles plain errors, strings and unknown values', () => {
    expect(getErrorMessage(new Error('Standard error message'))).toBe('Standard error message');
    expect(getErrorMessage(new Error())).toBe('Terjadi kesalahan tak terduga.');
    expect(getErrorMessage('String error')).toBe('String error');
    expect(getErrorMessage({ unexpected: true })).toBe('Terjadi kesalahan tak terduga.');
    expect(getErrorMessage(null)).toBe('Terjadi kesalahan tak terduga.');
  });
});

describe('useApiError', () => {
  let consoleSpy: jest.SpyInstance;

  beforeEach(() => {
    consoleSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    consoleSpy.mockRestore();
  });

  const Trigger: React.FC<{ error: unknown }> = ({ error }) => {
    const { handleError } = useApiError();
    return <button onClick={() => handleError(error)}>Trigger</button>;
  };

  it('logs the error and shows an error toast', () => {
    const { container } = render(<Trigger error={new ApiRequestError('Data tidak ditemukan', 404)} />, { wrapper });

    act(() => {
      screen.getByRole('button', { name: 'Trigger' }).click();
    });

    expect(screen.getByText('Data tidak ditemukan')).toBeInTheDocument();
    expect(container.querySelector('.sp-toast--error')).not.toBeNull();
    expect(consoleSpy).toHaveBeenCalledWith('API Error:', expect.any(ApiRequestError));
  });

  it('uses a warning toast for temporary failures', () => {
    const { container } = render(<Trigger error={new ApiRequestError('busy', 503)} />, { wrapper });

    act(() => {
      screen.getByRole('button', { name: 'Trigger' }).click();
    });

    expect(screen.getByText('Layanan belum tersedia. Silakan coba lagi nanti.')).toBeInTheDocument();
    expect(container.querySelector('.sp-toast--warning')).not.toBeNull();
  });

  it('exposes getErrorMessage', () => {
    const { result } = renderHook(() => useApiError(), { wrapper });

    expect(result.current.getErrorMessage('String error')).toBe('String error');
  });
});
