import { useCallback } from 'react';
import { useToast } from '../components/ui';
import { ApiRequestError } from '../config/api';

interface UseApiErrorReturn {
  handleError: (error: unknown) => void;
  getErrorMessage: (error: unknown) => string;
}

const statusMessage = (status: number): string => {
  switch (status) {
    case 400:
      return 'Permintaan tidak valid. Periksa kembali masukan Anda.';
    case 401:
      return 'Sesi berakhir. Silakan masuk kembali melalui SIPADU.';
    case 404:
      return 'Data yang diminta tidak ditemukan.';
    case 429:
      return 'Terlalu banyak permintaan. Tunggu sebentar lalu coba lagi.';
    case 502:
      return 'Layanan sedang bermasalah. Silakan coba lagi.';
    case 503:
      return 'Layanan belum tersedia. Silakan coba lagi nanti.';
    case 504:
      return 'Layanan tidak merespons tepat waktu. Silakan coba lagi.';
    default:
      return status >= 500 ? 'Terjadi kesalahan server. Silakan coba lagi nanti.' : 'Terjadi kesalahan tak terduga.';
  }
};

export const getErrorMessage = (error: unknown): string => {
  if (!error) return 'Terjadi kesalahan tak terduga.';

  if (error instanceof ApiRequestError) {
    if (error.code === 'NETWORK_ERROR') {
      return 'Gagal terhubung ke server. Periksa koneksi internet Anda.';
    }
    // Server messages are kept for client errors; 5xx details stay in the log
    if (error.status > 0 && error.status < 500 && error.message) return error.message;
    return statusMessage(error.status);
  }

  if (error instanceof Error) {
    return error.message || 'Terjadi kesalahan tak terduga.';
  }

  if (typeof error === 'string') {
    return error;
  }

  return 'Terjadi kesalahan tak terduga.';
};

// Rate limits and unavailable upstreams are temporary
const isTransient = (error: unknown): boolean =>
  error instanceof ApiRequestError && (error.status === 429 || error.status === 503);

export function useApiError(): UseApiErrorReturn {
  const toast = useToast();

  const handleError = useCallback(
    (error: unknown): void => {
      const message = getErrorMessage(error);
      if (isTransient(error)) {
        toast.warning(message);
      } else {
        toast.error(message);
      }
      console.error('API Error:', error);
    },
    [toast]
  );

  return { handleError, getErrorMessage };
}

export default useApiError;
