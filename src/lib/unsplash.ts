import { z } from "zod";
import { ExternalServiceError, getErrorMessage } from "./errors.js";
import logger from "./logger.js";
import { MAX_IMAGE_COUNT, type ImageResult } from "./types.js";

export const UNSPLASH_API_URL = "https://api.unsplash.com";

export type Orientation = "landscape" | "portrait" | "squarish";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface UnsplashClientOptions {
  accessKey: string;
  baseUrl?: string;
  timeoutMs?: number;
  fetch?: FetchLike;
}

const photoSchema = z.object({
  id: z.string(),
  description: z.string().nullish(),
  alt_description: z.string().nullish(),
  urls: z.object({ regular: z.string() }),
  links: z.object({ html: z.string(), download_location: z.string() }),
  user: z.object({
    name: z.string(),
    links: z.object({ html: z.string() }),
  }),
});

const searchResponseSchema = z.object({
  results: z.array(photoSchema),
});

export type UnsplashPhoto = z.infer<typeof photoSchema>;

export interface ImageSource {
  searchPhotos(query: string, perPage?: number): Promise<ImageResult[]>;
  trackDownload(downloadLocation: string): Promise<void>;
}

export class UnsplashClient implements ImageSource {
  private accessKey: string;
  private baseUrl: string;
  private timeoutMs: number;
  private fetchImpl: FetchLike;

  constructor(options: UnsplashClientOptions) {
    if (!options.accessKey) {
      throw new ExternalServiceError("Unsplash", "UNSPLASH_ACCESS_KEY is required");
    }
    this.accessKey = options.accessKey;
    this.baseUrl = (options.baseUrl ?? UNSPLASH_API_URL).replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  async searchPhotos(
    query: string,
    perPage: number = 5,
    orientation: Orientation = "landscape"
  ): Promise<ImageResult[]> {
    const params = new URLSearchParams({
      query,
      per_page: String(Math.min(Math.max(perPage, 1), 30)),
      orientation,
    });

    const response = await this.request(`${this.baseUrl}/search/photos?${params}`);
    let data: unknown;
    try {
      data = await response.json();
    } catch (error) {
      throw new ExternalServiceError("Unsplash", `invalid JSON in search response: ${getErrorMessage(error)}`, {
        cause: error,
      });
    }
    const parsed = searchResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new ExternalServiceError("Unsplash", "unexpected search response shape");
    }

    return parsed.data.results.map((photo) => toImageResult(photo, query));
  }

  /** Required by the Unsplash API guidelines whenever a photo is used. */
  async trackDownload(downloadLocation: string): Promise<void> {
    const response = await this.request(downloadLocation);
    await response.body?.cancel();
  }

  private async request(url: string): Promise<Response> {
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        headers: {
          Authorization: `Client-ID ${this.accessKey}`,
          "Accept-Version": "v1",
        },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new ExternalServiceError("Unsplash", `request failed: ${getErrorMessage(error)}`, {
        cause: error,
      });
    }

    if (!response.ok) {
      const text = await response.text().catch(() => "");
      throw new ExternalServiceError("Unsplash", `HTTP ${response.status}${text ? ` - ${text.slice(0, 200)}` : ""}`, {
        context: { status: response.status },
      });
    }

    return response;
  }
}

export function toImageResult(photo: UnsplashPhoto, query: string): ImageResult {
  return {
    id: photo.id,
    url: photo.urls.regular,
    altText: photo.alt_description || photo.description || query,
    photographerName: photo.user.name,
    photographerUrl: photo.user.links.html,
    pageUrl: photo.links.html,
    downloadLocation: photo.links.download_location,
  };
}

/**
 * Select up to `count` distinct photos, searching keyword by keyword, and ping
 * the download tracking URL of each selected photo. Search and tracking
 * failures are logged; whatever was gathered is returned.
 */
export async function fetchImages(
  source: ImageSource,
  keywords: string[],
  count: number
): Promise<ImageResult[]> {
  const wanted = Math.min(Math.max(Math.trunc(count), 0), MAX_IMAGE_COUNT);
  if (wanted === 0) {
    return [];
  }

  const selected: ImageResult[] = [];
  const seen = new Set<string>();

  for (const keyword of keywords.map((k) => k.trim()).filter(Boolean)) {
    if (selected.length >= wanted) break;

    let candidates: ImageResult[];
    try {
      candidates = await source.searchPhotos(keyword, Math.max(wanted, 5));
    } catch (error) {
      logger.warn(`Image search for "${keyword}" failed: ${getErrorMessage(error)}`);
      break;
    }

    for (const image of candidates) {
      if (selected.length >= wanted) break;
      if (seen.has(image.id)) continue;
      seen.add(image.id);
      selected.push(image);
    }
  }

  await Promise.all(
    selected.map(async (image) => {
      try {
        await source.trackDownload(image.downloadLocation);
      } catch (error) {
        logger.warn(`Could not trigger Unsplash download tracking for ${image.id}: ${getErrorMessage(error)}`);
      }
    })
  );

  return selected;
}
