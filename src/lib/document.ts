import { stringify } from "yaml";
import type { DocumentMeta, FrontMatter, GeneratedContent, ImageResult } from "./types.js";

const DISCLOSURES: Record<string, string> = {
  korean: "이 글은 생성형 AI의 도움을 받아 작성되었습니다.",
  english: "This article was written with partial assistance from generative AI.",
  japanese: "この記事は生成AIの支援を受けて作成されました。",
  chinese: "本文在生成式人工智能的部分协助下撰写。",
  spanish: "Este artículo fue escrito con la ayuda parcial de inteligencia artificial generativa.",
  french: "Cet article a été rédigé avec l'aide partielle d'une intelligence artificielle générative.",
  german: "Dieser Artikel wurde mit teilweiser Unterstützung durch generative KI verfasst.",
};

const LANGUAGE_ALIASES: Record<string, string> = {
  ko: "korean",
  "한국어": "korean",
  en: "english",
  ja: "japanese",
  "日本語": "japanese",
  zh: "chinese",
  "中文": "chinese",
  es: "spanish",
  fr: "french",
  de: "german",
};

export function disclosureFor(language: string): string {
  const key = language.trim().toLowerCase();
  const text = DISCLOSURES[key] ?? DISCLOSURES[LANGUAGE_ALIASES[key] ?? ""] ?? DISCLOSURES.english;
  return `> ${text}`;
}

export function formatDate(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  return `${year}-${month}-${day}`;
}

export function buildFrontMatter(content: GeneratedContent, meta: DocumentMeta): FrontMatter {
  return {
    title: content.title,
    date: meta.date,
    author: meta.author,
    language: meta.language,
    slug: content.slug,
    keywords: [...content.keywords],
    abstract: content.abstract,
  };
}

export function renderFrontMatter(frontMatter: FrontMatter): string {
  return `---\n${stringify(frontMatter, { lineWidth: 0 })}---`;
}

function escapeAlt(text: string): string {
  return text.replace(/[[\]\n\r]+/g, " ").trim();
}

export function renderImageBlock(image: ImageResult): string {
  return [
    `![${escapeAlt(image.altText)}](${image.url})`,
    "",
    `*Photo by [${escapeAlt(image.photographerName)}](${image.photographerUrl}) on [Unsplash](${image.pageUrl})*`,
  ].join("\n");
}

/**
 * Put each extra image in front of the 2nd, 3rd, ... "## " heading.
 * Images without a heading to precede go to the end.
 */
export function insertImages(body: string, images: ImageResult[]): string {
  if (images.length === 0) return body;

  const lines = body.split("\n");
  const pending = [...images];
  const output: string[] = [];
  let headings = 0;
  let inFence = false;

  for (const line of lines) {
    if (/^\s*(```|~~~)/.test(line)) inFence = !inFence;
    if (!inFence && /^##\s/.test(line)) {
      headings++;
      const image = headings >= 2 ? pending.shift() : undefined;
      if (image) {
        output.push(renderImageBlock(image), "");
      }
    }
    output.push(line);
  }

  for (const image of pending) {
    output.push("", renderImageBlock(image));
  }
  return output.join("\n");
}

/**
 * Front matter, first image, AI disclosure, then the body. No I/O.
 */
export function assembleDocument(
  content: GeneratedContent,
  images: ImageResult[],
  meta: DocumentMeta
): string {
  const [lead, ...rest] = images;
  const parts = [renderFrontMatter(buildFrontMatter(content, meta))];

  if (lead) {
    parts.push(renderImageBlock(lead));
  }
  parts.push(disclosureFor(meta.language));
  parts.push(insertImages(content.body.trim(), rest));

  return `${parts.join("\n\n")}\n`;
}
