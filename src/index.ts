/**
 * autoblog - blog posts from an OpenAI-compatible model, MCP research
 * servers and Unsplash photos.
 *
 *   npx autoblog init
 *   npx autoblog generate "Docker Tips" --tone casual --length short
 */

export {
  loadSettings,
  requireApiKey,
  describeSettings,
  renderSettingsTemplate,
  writeSettingsTemplate,
  parseServerList,
  DEFAULTS,
  type LoadSettingsOptions,
} from "./lib/config.js";

export {
  AppError,
  ConfigurationError,
  ExternalServiceError,
  GenerationError,
  OutputError,
  isAppError,
  getErrorMessage,
  type ErrorCode,
} from "./lib/errors.js";

export {
  collectResearch,
  createMcpConnector,
  formatResearchContext,
  type ResearchSession,
  type ResearchConnector,
} from "./lib/research.js";

export { UnsplashClient, fetchImages, type ImageSource } from "./lib/unsplash.js";

export {
  ContentGenerator,
  OpenAIBackend,
  buildArticlePrompt,
  buildMetadataPrompt,
  LENGTH_GUIDELINES,
  type CompletionBackend,
  type ChatMessage,
} from "./lib/generator.js";

export { assembleDocument, renderFrontMatter, formatDate } from "./lib/document.js";
export { toSlug, resolveSlug, SLUG_PATTERN } from "./lib/slug.js";
export { runPipeline, writeDocument, type PostRequest, type PipelineDeps, type PipelineResult } from "./lib/pipeline.js";
export { runCli, createProgram, type CliDeps } from "./cli/program.js";

export type {
  Settings,
  ResearchSnippet,
  ImageResult,
  GeneratedContent,
  GenerationRequest,
  DocumentMeta,
  FrontMatter,
  Tone,
  Length,
} from "./lib/types.js";
