export type SearchMode = 'speak' | 'browser';
export type AudioEncoding = 'LINEAR16';

export type SessionStage =
  | 'idle'
  | 'listening'
  | 'searching'
  | 'speaking'
  | 'stopping'
  | 'stopped'
  | 'error';

export interface SessionStateChange {
  stage: SessionStage;
  detail?: string;
}

export type DispatcherState = 'listening' | 'exit-requested';

export type SessionOutcome = 'exit-requested' | 'exhausted' | 'interrupted';

export interface RecognitionConfig {
  encoding: AudioEncoding;
  sampleRateHertz: number;
  languageCode: string;
}

export interface StreamingConfigRequest {
  streamingConfig: {
    config: RecognitionConfig;
    interimResults: boolean;
  };
}

export interface AudioContentRequest {
  audioContent: Buffer;
}

export type RecognizeRequest = StreamingConfigRequest | AudioContentRequest;

export interface RecognitionAlternative {
  transcript: string;
  confidence: number;
}

export interface RecognitionResult {
  alternatives: RecognitionAlternative[];
  isFinal: boolean;
}

export interface RecognitionStatus {
  code: number;
  message: string;
}

export interface RecognizeResponse {
  error: RecognitionStatus | null;
  results: RecognitionResult[];
}

export interface SearchResult {
  title: string;
  link: string;
  snippet: string;
}

export interface AppConfig {
  sampleRate: number;
  chunkMs: number;
  languageCode: string;
  interimResults: boolean;
  deadlineSecs: number;
  ffmpegBin: string;
  ffmpegFormat: string;
  ffmpegInput: string;
  cseKey?: string;
  cseId?: string;
  resultCount: number;
  searchMode: SearchMode;
  ttsBin: string;
  ttsTimeoutMs: number;
  logDir: string;
}
