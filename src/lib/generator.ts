import OpenAI from "openai";
import { z } from "zod";
import { GenerationError, getErrorMessage } from "./errors.js";
import { formatResearchContext } from "./research.js";
import { resolveSlug } from "./slug.js";
import type { GeneratedContent, GenerationRequest, Length, Tone } from "./types.js";

export interface ChatMessage {
  role: "system" | "user";
  content: string;
}

export interface CompletionOptions {
  model: string;
  temperature: number;
  json?: boolean;
}

/** Anything that can answer a chat prompt with text. */
export interface CompletionBackend {
  complete(messages: ChatMessage[], options: CompletionOptions): Promise<string>;
}

export interface OpenAIBackendOptions {
  apiKey: string;
  baseURL?: string;
  timeoutMs?: number;
}

export const LENGTH_GUIDELINES: Record<Length, string> = {
  short: "300-500 words",
  medium: "800-1200 words",
  long: "1500-2500 words",
};

const TONE_DESCRIPTIONS: Record<Tone, string> = {
  professional: "professional, polished and authoritative, written for practitioners",
  casual: "casual, conversational and friendly, like explaining to a colleague over coffee",
  technical: "technical and precise, with concrete details, code samples where they help, and exact terminology",
};

const METADATA_INPUT_LIMIT = 3000;

export class OpenAIBackend implements CompletionBackend {
  private client: OpenAI;

  constructor(options: OpenAIBackendOptions) {
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseURL,
      timeout: options.timeoutMs,
      maxRetries: 0,
    });
  }

  async complete(messages: ChatMessage[], options: CompletionOptions): Promise<string> {
    let content: string | null | undefined;
    try {
      const response = await this.client.chat.completions.create({
        model: options.model,
        temperature: options.temperature,
        messages: messages.map((message) =>
          message.role === "system"
            ? { role: "system" as const, content: message.content }
            : { role: "user" as const, content: message.content }
        ),
        ...(options.json && { response_format: { type: "json_object" as const } }),
      });
      content = response.choices[0]?.message?.content;
    } catch (error) {
      const status = error instanceof OpenAI.APIError ? error.status : undefined;
      throw new GenerationError(`Completion request failed: ${getErrorMessage(error)}`, {
        context: { model: options.model, status },
        cause: error,
      });
    }

    if (!content?.trim()) {
      throw new GenerationError("Completion endpoint returned no content", {
        context: { model: options.model },
      });
    }
    return content;
  }
}

export function buildArticlePrompt(request: GenerationRequest): ChatMessage[] {
  const lengthGuideline = LENGTH_GUIDELINES[request.length];
  const research = formatResearchContext(request.research ?? []);

  let system = `You are an expert blog writer who creates engaging, well-structured and informative blog posts.
Your writing is clear, compelling and tailored to the requested tone and audience.

FORMATTING RULES:
- Write clean Markdown that passes markdown linters
- Start with exactly one level-1 heading holding the article title: "# Title"
- Do not number headings (write "## Introduction", never "## 1. Introduction")
- Do not add an AI disclosure, author signature, date or other metadata; they are added separately
- Leave blank lines around headings, lists and code blocks
- Use "-" for unordered lists and "1." for ordered lists
- Give every code block a language identifier
- No trailing spaces

CONTENT STRUCTURE:
- An attention-grabbing introduction
- Well-organized sections with clear "##" headings
- Relevant examples or insights
- A strong conclusion`;

  if (research) {
    system += "\n\nYou are given reference materials. Use them to keep facts accurate and enrich the article.";
  }

  let user = `Write a blog post with the following specifications:

Topic: ${request.topic}
Language: ${request.language}
Tone: ${TONE_DESCRIPTIONS[request.tone]}
Target length: ${lengthGuideline}`;

  if (research) {
    user += `\n\n${research}`;
  }

  user += `

Write the complete post in ${request.language}. Keep the ${request.tone} tone throughout and aim for about ${lengthGuideline}.`;

  if (research) {
    user += " Weave insights from the reference materials in naturally.";
  }

  return [
    { role: "system", content: system },
    { role: "user", content: user },
  ];
}

export function buildMetadataPrompt(body: string, language: string): ChatMessage[] {
  return [
    {
      role: "system",
      content: `You are an SEO and content marketing expert.
Analyze the blog post and respond with a JSON object with these fields:
- "keywords": an array of 5-8 relevant SEO keywords or phrases, in ${language}
- "abstract": a compelling 2-3 sentence summary, in ${language}
- "slug": a short URL slug in English, lowercase ASCII letters, digits and hyphens only (translate or transliterate non-Latin titles)`,
    },
    {
      role: "user",
      content: `Generate SEO metadata for this blog post:\n\n${body.slice(0, METADATA_INPUT_LIMIT)}`,
    },
  ];
}

const metadataSchema = z.object({
  keywords: z
    .array(z.string())
    .transform((keywords) => keywords.map((k) => k.trim()).filter(Boolean))
    .pipe(z.array(z.string()).min(1)),
  abstract: z.string().trim().min(1),
  slug: z.string().optional(),
});

export type ArticleMetadata = z.infer<typeof metadataSchema>;

export function parseMetadata(raw: string): ArticleMetadata {
  const text = raw
    .trim()
    .replace(/^```(?:json)?\s*/i, "")
    .replace(/\s*```$/, "");

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new GenerationError(`Metadata response is not valid JSON: ${text.slice(0, 200)}`, { cause: error });
  }

  const parsed = metadataSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new GenerationError(
      `Metadata response is missing required fields (${issue?.path.join(".") || "root"}: ${issue?.message ?? "invalid"})`
    );
  }
  return parsed.data;
}

/**
 * Split a leading "# Title" off the article. Falls back to the topic.
 */
export function extractTitle(markdown: string, fallback: string): { title: string; body: string } {
  const text = markdown
    .trim()
    .replace(/^```(?:markdown|md)?\s*\n/i, "")
    .replace(/\n```$/, "")
    .trim();
  const match = /^#[ \t]+(.+?)(?:[ \t]+#+)?[ \t]*(?:\n|$)/.exec(text);
  if (!match?.[1]) {
    return { title: fallback, body: text };
  }
  return {
    title: match[1].trim(),
    body: text.slice(match[0].length).trim(),
  };
}

export class ContentGenerator {
  constructor(private backend: CompletionBackend) {}

  async generate(request: GenerationRequest): Promise<GeneratedContent> {
    const options = { model: request.model, temperature: request.temperature };

    const article = await this.backend.complete(buildArticlePrompt(request), options);
    const { title, body } = extractTitle(article, request.topic);
    if (!body) {
      throw new GenerationError("Completion contained a title but no article body");
    }

    const rawMetadata = await this.backend.complete(buildMetadataPrompt(body, request.language), {
      ...options,
      json: true,
    });
    const metadata = parseMetadata(rawMetadata);

    return {
      title,
      body,
      keywords: metadata.keywords,
      abstract: metadata.abstract,
      slug: resolveSlug([metadata.slug, title, request.topic], request.topic),
    };
  }
}
