// Windowed pagination over a fixed-size paged API.
//
// Callers ask for `amt` items starting at the zero-based `index`; the upstream
// only serves 1-based pages of PAGE_SIZE items. fetchWindow requests every page
// that overlaps the window at once and slices the concatenation back down.

import { z } from 'zod';
import { DEFAULT_AMOUNT, DEFAULT_INDEX, PAGE_SIZE } from '../config/api.js';
import type { Logger } from '../plugins/logger.js';
import { ValidationError } from './errors.js';
import { clamp } from './utils.js';

export type Page<T> = {
  items: T[];
  totalEntries: number;
  perPage: number;
  page: number; // 1-based
};

export type PageFetcher<T> = (page: number) => Promise<Page<T>>;

export type Window = { amt: number; index: number };

export type WindowQuery = { amt?: number; index?: number };

export type PageRange = { startPage: number; endPage: number };

export type FetchWindowOptions = {
  pageSize?: number;
  logger?: Logger;
};

// Pagination metadata as the API sends it
export type PageMeta = { total_entries: number; per_page: number; page: number };

const windowSchema = z.object({
  amt: z.number().int().nonnegative().default(DEFAULT_AMOUNT),
  index: z.number().int().nonnegative().default(DEFAULT_INDEX),
});

export function normalizeWindow(q: WindowQuery = {}): Window {
  const parsed = windowSchema.safeParse(q);
  if (!parsed.success) {
    throw new ValidationError('amt and index must be non-negative integers', parsed.error.issues);
  }
  return parsed.data;
}

// 1-based, inclusive range of pages overlapping the window; null when nothing is requested.
export function pageRange(window: Window, pageSize = PAGE_SIZE): PageRange | null {
  if (window.amt <= 0) return null;
  const startPage = Math.floor(window.index / pageSize) + 1;
  const endPage = Math.floor((window.index + window.amt - 1) / pageSize) + 1;
  return { startPage, endPage };
}

export function toPage<R extends { meta: PageMeta }, T>(response: R, extract: (response: R) => T[]): Page<T> {
  return {
    items: extract(response),
    totalEntries: response.meta.total_entries,
    perPage: response.meta.per_page,
    page: response.meta.page,
  };
}

export async function fetchWindow<T>(
  fetchPage: PageFetcher<T>,
  amt: number = DEFAULT_AMOUNT,
  index: number = DEFAULT_INDEX,
  options?: FetchWindowOptions
): Promise<T[]> {
  const pageSize = options?.pageSize ?? PAGE_SIZE;
  const range = pageRange({ amt, index }, pageSize);
  if (!range) return [];

  const { startPage, endPage } = range;
  const pageNumbers = Array.from({ length: endPage - startPage + 1 }, (_, i) => startPage + i);
  options?.logger?.debug({ amt, index, startPage, endPage }, 'fetching window');

  // Promise.all keeps input order, so completion order never leaks into the result
  const pages = await Promise.all(pageNumbers.map((n) => fetchPage(n)));
  const items = pages.flatMap((p) => p.items);

  const offset = index - (startPage - 1) * pageSize;
  const start = clamp(offset, 0, items.length);
  return items.slice(start, start + amt);
}
