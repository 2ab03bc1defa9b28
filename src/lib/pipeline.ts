import { mkdir, rename, rm, writeFile } from "fs/promises";
import { basename, dirname, join } from "path";
import { hasUnsplashCredentials } from "./config.js";
import { assembleDocument, formatDate } from "./document.js";
import { OutputError, getErrorMessage } from "./errors.js";
import type { ContentGenerator } from "./generator.js";
import logger from "./logger.js";
import { collectResearch, type ResearchConnector } from "./research.js";
import { fetchImages, type ImageSource } from "./unsplash.js";
import type {
  GeneratedContent,
  ImageResult,
  Length,
  ResearchSnippet,
  Settings,
  Tone,
} from "./types.js";

export interface PostRequest {
  topic: string;
  language: string;
  tone: Tone;
  length: Length;
  author: string;
  research: boolean;
  imageCount: number;
  /** Search terms for images; the topic when omitted. */
  imageQuery?: string[];
  model: string;
  temperature: number;
}

export interface PipelineDeps {
  settings: Settings;
  generator: ContentGenerator;
  connectResearch: ResearchConnector;
  /** Absent when no Unsplash credentials are configured. */
  images?: ImageSource;
  now?: () => Date;
}

export interface PipelineResult {
  markdown: string;
  content: GeneratedContent;
  images: ImageResult[];
  research: ResearchSnippet[];
}

async function gatherResearch(request: PostRequest, deps: PipelineDeps): Promise<ResearchSnippet[]> {
  if (!request.research) return [];

  const servers = deps.settings.mcpServers;
  if (servers.length === 0) {
    logger.warn("Research enabled but no MCP servers configured (MCP_SERVERS)");
    return [];
  }

  try {
    return await collectResearch(request.topic, servers, {
      connect: deps.connectResearch,
      preferredTool: deps.settings.researchTool,
    });
  } catch (error) {
    logger.warn(`Research failed: ${getErrorMessage(error)}`);
    return [];
  }
}

async function gatherImages(request: PostRequest, deps: PipelineDeps): Promise<ImageResult[]> {
  if (request.imageCount <= 0) return [];

  if (!deps.images) {
    if (!hasUnsplashCredentials(deps.settings)) {
      logger.warn("Images requested but UNSPLASH_ACCESS_KEY is not set; continuing without images");
    }
    return [];
  }

  const keywords = request.imageQuery?.length ? request.imageQuery : [request.topic];
  try {
    return await fetchImages(deps.images, keywords, request.imageCount);
  } catch (error) {
    logger.warn(`Image fetch failed: ${getErrorMessage(error)}`);
    return [];
  }
}

/**
 * Research and images run side by side and are both settled before the
 * generator starts, since the prompt embeds the research.
 */
export async function runPipeline(request: PostRequest, deps: PipelineDeps): Promise<PipelineResult> {
  const now = deps.now ?? (() => new Date());

  logger.step(1, 3, "Gathering research and images");
  const [research, images] = await Promise.all([gatherResearch(request, deps), gatherImages(request, deps)]);
  if (request.research) {
    logger.info(`Research snippets: ${research.length}`);
  }
  if (request.imageCount > 0) {
    logger.info(`Images: ${images.length}/${request.imageCount}`);
  }

  logger.step(2, 3, "Generating content");
  logger.startSpinner(`Writing "${request.topic}" with ${request.model}...`);
  let content: GeneratedContent;
  try {
    content = await deps.generator.generate({
      topic: request.topic,
      language: request.language,
      tone: request.tone,
      length: request.length,
      research,
      model: request.model,
      temperature: request.temperature,
    });
  } catch (error) {
    logger.failSpinner("Generation failed");
    throw error;
  }
  logger.succeedSpinner(`Generated "${content.title}"`);

  logger.step(3, 3, "Assembling document");
  const markdown = assembleDocument(content, images, {
    author: request.author,
    date: formatDate(now()),
    language: request.language,
  });

  return { markdown, content, images, research };
}

/**
 * Write through a temporary sibling and rename it into place, so a failed
 * write leaves no partial file behind.
 */
export async function writeDocument(path: string, markdown: string): Promise<void> {
  const dir = dirname(path);
  const temp = join(dir, `.${basename(path)}.${process.pid}.tmp`);
  try {
    await mkdir(dir, { recursive: true });
    await writeFile(temp, markdown, "utf-8");
    await rename(temp, path);
  } catch (error) {
    await rm(temp, { force: true }).catch((cleanupError: unknown) => {
      logger.debug(`Could not remove ${temp}: ${getErrorMessage(cleanupError)}`);
    });
    throw new OutputError(path, getErrorMessage(error), error);
  }
}
