import type { IndexablePanel } from '../services/evidenceIndex';

export interface EvidencePanelHandle extends IndexablePanel {
  id: string;
  /** Present when the evidence has a source document to open */
  openInViewer?: (phrase?: string) => void;
}

export interface EvidenceRegistry {
  register(handle: EvidencePanelHandle): void;
  unregister(id: string): void;
  get(id: string): EvidencePanelHandle | undefined;
  /** Registered handles in the given id order, skipping unknown ids */
  panels(order: readonly string[]): EvidencePanelHandle[];
}

/**
 * Id-keyed references to rendered evidence panels. Panels register on mount
 * and unregister on unmount, so lookups never walk the DOM.
 */
export const createEvidenceRegistry = (): EvidenceRegistry => {
  const handles = new Map<string, EvidencePanelHandle>();

  return {
    register(handle) {
      handles.set(handle.id, handle);
    },
    unregister(id) {
      handles.delete(id);
    },
    get(id) {
      return handles.get(id);
    },
    panels(order) {
      const result: EvidencePanelHandle[] = [];
      for (const id of order) {
        const handle = handles.get(id);
        if (handle) result.push(handle);
      }
      return result;
    },
  };
};
