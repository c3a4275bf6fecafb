import React from 'react';
import { render, screen, act } from '@testing-library/react';
import App from '../App';
import type { RuntimeConfig } from '../config/runtimeConfig';
import { DEFAULT_HIDDEN_TABS } from '../config/runtimeConfig';
import type { SessionCheck } from '../services/schemas';

jest.mock('@radix-ui/react-toast', () => jest.requireActual('./mocks/radixToast'));

const config: RuntimeConfig = {
  appName: 'SIPADU AI TOOLS',
  appVersion: '2.1.0',
  apiBase: 'http://sipadu.test',
  hiddenTabs: DEFAULT_HIDDEN_TABS,
  devMode: false,
};

const devSession = (): Promise<SessionCheck> =>
  Promise.resolve({ status: 'DEV_MODE', user: { userId: 'dev_1', username: 'dev_user', fullName: 'Development User' } });

describe('App', () => {
  beforeEach(() => {
    jest.useFakeTimers();
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.useRealTimers();
    jest.restoreAllMocks();
  });

  it('shows the preloader until the session check and the minimum display time are done', async () => {
    render(<App config={config} validateSession={devSession} />);

    expect(screen.getByRole('status')).toHaveTextContent('Memuat sistem');

    await act(async () => {
      jest.advanceTimersByTime(1800);
    });
    expect(screen.getByRole('status')).toHaveTextContent('Siap digunakan!');

    act(() => {
      jest.advanceTimersByTime(200);
    });
    act(() => {
      jest.advanceTimersByTime(500);
    });
    expect(screen.queryByText('Siap digunakan!')).not.toBeInTheDocument();
  });

  it('renders only the tabs that are not hidden', () => {
    render(<App config={config} validateSession={devSession} />);

    expect(screen.getAllByRole('tab', { hidden: true }).map((tab) => tab.textContent)).toEqual(['Obrolan']);
    expect(screen.getByText('version: 2.1.0')).toBeInTheDocument();
  });

  it('shows the account tab when it is not hidden', async () => {
    render(<App config={{ ...config, hiddenTabs: [] }} validateSession={devSession} />);
    await act(async () => {
      jest.advanceTimersByTime(2500);
    });

    act(() => {
      screen.getByRole('tab', { name: 'Pengaturan' }).click();
    });

    expect(screen.getByRole('region', { name: 'Akun' })).toHaveTextContent('Development User');
    expect(screen.getByText('Status: Mode pengembangan')).toBeInTheDocument();
  });
});
