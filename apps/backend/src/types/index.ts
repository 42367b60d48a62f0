import type { AssistantError } from '@/errors';

export interface BookRecord {
  title?: string;
  authors: string[];
  description: string;
  categories: string[];
  previewLink?: string;
  pageCount?: number;
}

// Raw shape of a Google Books volumes response; every field may be absent.
export interface VolumeInfo {
  title?: unknown;
  authors?: unknown;
  description?: unknown;
  categories?: unknown;
  previewLink?: unknown;
  pageCount?: unknown;
}

export interface VolumesResponse {
  items?: unknown;
}

export type OperationResult<T> = { ok: true; value: T } | { ok: false; error: AssistantError };

// Book shape used on the HTTP API.
export interface BookResponse {
  title?: string;
  authors: string[];
  description: string;
  categories: string[];
  preview_link?: string;
  page_count?: number;
}

export interface ApiErrorResponse {
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
  request_id?: string;
}
