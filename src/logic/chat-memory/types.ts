export type Role = 'user' | 'assistant';

export interface ChatMessage {
  id: number;
  role: Role;
  content: string;
  agent: string;
  label: string | null;
  studentId: string | null;
  ts: number;
}

export interface NewTurn {
  role: Role;
  content: string;
  agent: string;
  label?: string | null;
}

export interface HistoryOptions {
  limit?: number;
  includeHidden?: boolean;
}
