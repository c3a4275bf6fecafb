import React, { createContext, useCallback, useContext, useMemo, useState, ReactNode } from 'react';

export interface ViewerTarget {
  evidenceId: string;
  title: string;
  url: string;
  page?: number;
  phrase?: string;
}

interface ViewerState {
  isOpen: boolean;
  target: ViewerTarget | null;
}

interface DocumentViewerContextType extends ViewerState {
  open: (target: ViewerTarget) => void;
  close: () => void;
}

const DocumentViewerContext = createContext<DocumentViewerContextType | null>(null);

export function DocumentViewerProvider({ children }: { children: ReactNode }) {
  const [state, setState] = useState<ViewerState>({ isOpen: false, target: null });

  // Opening while already open replaces the target
  const open = useCallback((target: ViewerTarget) => {
    setState({ isOpen: true, target });
  }, []);

  const close = useCallback(() => {
    setState((prev) => ({ ...prev, isOpen: false }));
  }, []);

  const value = useMemo(() => ({ ...state, open, close }), [state, open, close]);

  return <DocumentViewerContext.Provider value={value}>{children}</DocumentViewerContext.Provider>;
}

export const useDocumentViewer = () => {
  const context = useContext(DocumentViewerContext);
  if (!context) throw new Error('useDocumentViewer must be used within DocumentViewerProvider');
  return context;
};
