export interface CrossReference {
  id: string;
  reference?: string;
  text?: string;
}

// Every field may be missing: the model does not honour the schema reliably.
export interface VerseAnalysis {
  id: string;
  verseReference?: string;
  verseText?: string;
  context?: string;
  exegesis?: string;
  themes?: string;
  crossReferences?: CrossReference[];
}

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface ChatRequestBody {
  messages: ChatMessage[];
  model: string;
  temperature: number;
  max_tokens: number;
  top_p: number;
  stop: string | null;
  stream: boolean;
}

export interface ChatRequest {
  headers: {
    'Content-Type': 'application/json';
    Authorization: string;
  };
  body: ChatRequestBody;
}

export interface ChatChoice {
  message: {
    role: string;
    content: string;
  };
}

export interface ChatResponse {
  choices: ChatChoice[];
}

export type LoadingState =
  | { status: 'idle' }
  | { status: 'loading' }
  | { status: 'success'; analysis: VerseAnalysis }
  | { status: 'error'; message: string };

export type AnalysisTab = 'context' | 'exegesis' | 'themes' | 'crossRef';
