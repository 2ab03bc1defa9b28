export const TONES = ["professional", "casual", "technical"] as const;
export type Tone = (typeof TONES)[number];

export const LENGTHS = ["short", "medium", "long"] as const;
export type Length = (typeof LENGTHS)[number];

export const MAX_IMAGE_COUNT = 3;

export interface UnsplashCredentials {
  applicationId?: string;
  accessKey?: string;
  secretKey?: string;
}

export interface Settings {
  readonly openaiApiKey: string;
  readonly openaiApiBase?: string;
  readonly model: string;
  readonly defaultLanguage: string;
  readonly defaultTone: Tone;
  readonly defaultLength: Length;
  readonly temperature: number;
  readonly imageCount: number;
  readonly author: string;
  readonly mcpServers: readonly string[];
  readonly researchTool: string;
  readonly requestTimeoutMs: number;
  readonly unsplash: Readonly<UnsplashCredentials>;
}

export interface ResearchSnippet {
  title: string;
  source: string;
  excerpt: string;
}

export interface ImageResult {
  id: string;
  url: string;
  altText: string;
  photographerName: string;
  photographerUrl: string;
  pageUrl: string;
  downloadLocation: string;
}

export interface GeneratedContent {
  title: string;
  body: string;
  keywords: string[];
  abstract: string;
  slug: string;
}

export interface GenerationRequest {
  topic: string;
  language: string;
  tone: Tone;
  length: Length;
  research?: ResearchSnippet[];
  model: string;
  temperature: number;
}

export interface DocumentMeta {
  author: string;
  /** YYYY-MM-DD */
  date: string;
  language: string;
}

export interface FrontMatter {
  title: string;
  date: string;
  author: string;
  language: string;
  slug: string;
  keywords: string[];
  abstract: string;
}
