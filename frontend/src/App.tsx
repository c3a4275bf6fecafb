import React, { useMemo, useState } from 'react';
import { HelpCircle, MessageSquare, Settings } from 'lucide-react';
import { ToastProvider } from './components/ui';
import { ChatPage } from './components/chat';
import { AccountPanel, AppHeader, HelpPanel, Preloader, TabNav, filterTabs } from './components/shell';
import type { TabDefinition } from './components/shell';
import ErrorBoundary from './components/ErrorBoundary';
import { SessionProvider, useSession } from './contexts/SessionContext';
import { DocumentViewerProvider } from './contexts/DocumentViewerContext';
import { getRuntimeConfig, type RuntimeConfig } from './config/runtimeConfig';
import type { chatService } from './services/chatService';
import type { sessionService } from './services/sessionService';

export const APP_TABS: TabDefinition[] = [
  { id: 'chat-tab', label: 'Obrolan', icon: <MessageSquare size={16} aria-hidden /> },
  { id: 'settings-tab', label: 'Pengaturan', icon: <Settings size={16} aria-hidden /> },
  { id: 'help-tab', label: 'Bantuan', icon: <HelpCircle size={16} aria-hidden /> },
];

interface AppContentProps {
  config: RuntimeConfig;
  ask?: typeof chatService.ask;
  navigate?: (url: string) => void;
}

function AppContent({ config, ask, navigate }: AppContentProps) {
  const session = useSession();
  const [isLoaded, setIsLoaded] = useState(false);
  const visibleTabs = useMemo(() => filterTabs(APP_TABS, config.hiddenTabs), [config.hiddenTabs]);
  const [activeTab, setActiveTab] = useState(() => visibleTabs[0]?.id ?? 'chat-tab');

  const renderTab = () => {
    switch (activeTab) {
      case 'settings-tab':
        return <AccountPanel />;
      case 'help-tab':
        return <HelpPanel />;
      default:
        return <ChatPage ask={ask} />;
    }
  };

  return (
    <>
      {!isLoaded && (
        <Preloader appName={config.appName} appReady={session.isReady} onLoaded={() => setIsLoaded(true)} />
      )}
      <div className="app" aria-busy={!isLoaded}>
        <AppHeader
          appName={config.appName}
          appVersion={config.appVersion}
          config={config}
          onLogout={session.logout}
          navigate={navigate}
        >
          <TabNav tabs={APP_TABS} hiddenTabs={config.hiddenTabs} activeTab={activeTab} onSelect={setActiveTab} />
        </AppHeader>
        {session.status === 'failed' && session.message && (
          <p className="app__notice" role="status">
            {session.message}
          </p>
        )}
        <main className="app__main" role="tabpanel" aria-labelledby={activeTab}>
          <ErrorBoundary>{renderTab()}</ErrorBoundary>
        </main>
      </div>
    </>
  );
}

interface AppProps extends Partial<AppContentProps> {
  validateSession?: typeof sessionService.validate;
}

function App({ config: configOverride, validateSession, ...rest }: AppProps) {
  const config = useMemo(() => configOverride ?? getRuntimeConfig(), [configOverride]);

  return (
    <ErrorBoundary>
      <ToastProvider>
        <SessionProvider validate={validateSession}>
          <DocumentViewerProvider>
            <AppContent config={config} {...rest} />
          </DocumentViewerProvider>
        </SessionProvider>
      </ToastProvider>
    </ErrorBoundary>
  );
}

export default App;
