export type EvidenceKind = 'text' | 'diagram';

export interface EvidenceSource {
  url: string;
  page?: number;
  name?: string;
}

/**
 * One retrieved supporting chunk, as delivered by the QA service
 */
export interface EvidenceItem {
  id: string;
  title: string;
  html: string; // raw markup rendered inside the panel
  kind: EvidenceKind;
  source?: EvidenceSource;
}

export interface ChatMessage {
  id: string;
  role: 'user' | 'assistant';
  content: string;
  evidence?: EvidenceItem[];
  createdAt?: string;
  isError?: boolean;
}

export interface ChatAnswer {
  answer: string;
  evidence: EvidenceItem[];
}

export const SUGGESTION_PROMPTS = [
  'Apa tujuan utama dokumen RPJMD?',
  'Ringkas rekomendasi dalam laporan ini',
  'Jelaskan indikator kinerja yang digunakan',
];
