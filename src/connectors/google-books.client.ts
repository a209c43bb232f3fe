/**
 * Google Books Client
 *
 * Volume search by free text or ISBN. Covers fall back to Open Library when
 * Google has no thumbnail.
 */

import { z } from 'zod';
import { config } from '../config';
import { GoalTrackerError, GoalTrackerErrorCode } from '../core-domain';
import type { BookMetadataProvider, BookSearchResult } from './interfaces';

const OPEN_LIBRARY_COVERS_URL = 'https://covers.openlibrary.org/b/isbn';

const VolumeSchema = z.object({
  id: z.string(),
  volumeInfo: z.object({
    title: z.string(),
    authors: z.array(z.string()).optional(),
    description: z.string().optional(),
    pageCount: z.number().int().optional(),
    publishedDate: z.string().optional(),
    industryIdentifiers: z.array(z.object({ type: z.string(), identifier: z.string() })).optional(),
    imageLinks: z.object({ thumbnail: z.string().optional() }).optional(),
  }),
});

const VolumesResponseSchema = z.object({
  totalItems: z.number(),
  items: z.array(VolumeSchema).optional(),
});

type Volume = z.infer<typeof VolumeSchema>;

export interface GoogleBooksClientOptions {
  baseUrl?: string;
  fetch?: typeof fetch;
}

export function openLibraryCoverUrl(isbn: string, size: 'S' | 'M' | 'L' = 'M'): string {
  return `${OPEN_LIBRARY_COVERS_URL}/${isbn}-${size}.jpg`;
}

export function normalizeIsbn(isbn: string): string {
  return isbn.replace(/[-\s]/g, '');
}

export function toBookSearchResult(volume: Volume): BookSearchResult {
  const info = volume.volumeInfo;
  const isbn10 = info.industryIdentifiers?.find((id) => id.type === 'ISBN_10')?.identifier;
  const isbn13 = info.industryIdentifiers?.find((id) => id.type === 'ISBN_13')?.identifier;
  const bestIsbn = isbn13 ?? isbn10;
  const thumbnail = info.imageLinks?.thumbnail?.replace(/^http:\/\//, 'https://');

  return {
    title: info.title,
    authors: info.authors ?? [],
    isbn10,
    isbn13,
    coverUrl: thumbnail ?? (bestIsbn ? openLibraryCoverUrl(bestIsbn) : undefined),
    pageCount: info.pageCount,
    description: info.description,
    publishedDate: info.publishedDate,
  };
}

export class GoogleBooksClient implements BookMetadataProvider {
  readonly id = 'google-books';

  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: GoogleBooksClientOptions = {}) {
    this.baseUrl = options.baseUrl ?? config.books.baseUrl;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async search(query: string, limit = 20): Promise<BookSearchResult[]> {
    const trimmed = query.trim();
    if (!trimmed) return [];
    const volumes = await this.fetchVolumes(trimmed, limit);
    return volumes.map(toBookSearchResult);
  }

  async searchByIsbn(isbn: string): Promise<BookSearchResult | undefined> {
    const clean = normalizeIsbn(isbn);
    if (!clean) {
      throw new GoalTrackerError(GoalTrackerErrorCode.INVALID_INPUT, 'ISBN is empty');
    }
    const [first] = await this.fetchVolumes(`isbn:${clean}`, 1);
    return first ? toBookSearchResult(first) : undefined;
  }

  private async fetchVolumes(query: string, limit: number): Promise<Volume[]> {
    const url = new URL(this.baseUrl);
    url.searchParams.set('q', query);
    url.searchParams.set('maxResults', String(limit));

    let response: Response;
    try {
      response = await this.fetchImpl(url.toString());
    } catch (error) {
      throw new GoalTrackerError(
        GoalTrackerErrorCode.NETWORK_ERROR,
        'Book search request failed',
        true,
        { cause: error }
      );
    }
    if (!response.ok) {
      throw new GoalTrackerError(
        GoalTrackerErrorCode.NETWORK_ERROR,
        `Book search answered ${response.status}`
      );
    }

    const result = VolumesResponseSchema.safeParse(await response.json().catch(() => undefined));
    if (!result.success) {
      throw new GoalTrackerError(GoalTrackerErrorCode.PARSING_FAILED, 'Unexpected book search response');
    }
    return result.data.items ?? [];
  }
}
