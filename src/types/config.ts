export type Language = 'fr' | 'en';

export const SUPPORTED_LANGUAGES: readonly Language[] = ['fr', 'en'];

export interface ServiceAccountCredentials {
  type?: string;
  project_id: string;
  client_email: string;
  private_key: string;
  private_key_id?: string;
}

export interface ApiConfig {
  credentialsPath: string;
  projectId: string;
  location: string;
  geminiModel: string;
  temperature: number;
  retryCount: number;
  retryDelayMs: number;
  timeoutMs: number;
  visionMaxResults: number;
}

export interface ProcessingConfig {
  workers: number;
  recursive: boolean;
  rename: boolean;
  backup: boolean;
  maxFileSizeMb: number;
}

export interface OutputConfig {
  inputPath: string;
  outputPath: string;
  language: Language;
  author?: string;
}

export interface AppConfig {
  api: ApiConfig;
  processing: ProcessingConfig;
  output: OutputConfig;
  verbosity: number;
}
