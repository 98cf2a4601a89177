import pino from 'pino';
import { ValidationError } from '../errors.js';
import { fetchWindow, normalizeWindow, pageRange, toPage, type Page } from '../pagination.js';

// Upstream with `total` items numbered 0..total-1, paged at `pageSize`
function pageOf(page: number, total: number, pageSize = 20): Page<number> {
  const first = (page - 1) * pageSize;
  const last = Math.min(page * pageSize, total);
  const items: number[] = [];
  for (let i = first; i < last; i++) items.push(i);
  return { items, totalEntries: total, perPage: pageSize, page };
}

function upstream(total: number, pageSize = 20) {
  return jest.fn(async (page: number) => pageOf(page, total, pageSize));
}

function range(from: number, to: number): number[] {
  return Array.from({ length: to - from }, (_, i) => from + i);
}

describe('pageRange', () => {
  it('returns null when nothing is requested', () => {
    expect(pageRange({ amt: 0, index: 35 })).toBeNull();
  });

  it('covers the pages the window overlaps', () => {
    expect(pageRange({ amt: 20, index: 0 })).toEqual({ startPage: 1, endPage: 1 });
    expect(pageRange({ amt: 25, index: 15 })).toEqual({ startPage: 1, endPage: 2 });
    expect(pageRange({ amt: 1, index: 19 })).toEqual({ startPage: 1, endPage: 1 });
    expect(pageRange({ amt: 2, index: 19 })).toEqual({ startPage: 1, endPage: 2 });
    expect(pageRange({ amt: 20, index: 1000 })).toEqual({ startPage: 51, endPage: 51 });
  });

  it('honours a custom page size', () => {
    expect(pageRange({ amt: 5, index: 8 }, 10)).toEqual({ startPage: 1, endPage: 2 });
  });
});

describe('normalizeWindow', () => {
  it('applies defaults', () => {
    expect(normalizeWindow()).toEqual({ amt: 20, index: 0 });
    expect(normalizeWindow({ amt: 5 })).toEqual({ amt: 5, index: 0 });
  });

  it('rejects negative and fractional values', () => {
    expect(() => normalizeWindow({ amt: -1 })).toThrow(ValidationError);
    expect(() => normalizeWindow({ index: 1.5 })).toThrow(ValidationError);
  });
});

describe('toPage', () => {
  it('copies metadata and extracts items', () => {
    const page = toPage(
      { meta: { total_entries: 41, per_page: 20, page: 3 }, films: [{ id: 1, name: 'A' }] },
      (r) => r.films.map((f) => f.name)
    );
    expect(page).toEqual({ items: ['A'], totalEntries: 41, perPage: 20, page: 3 });
  });
});

describe('fetchWindow', () => {
  it('issues no fetch when amt is 0', async () => {
    const fetchPage = upstream(100);
    await expect(fetchWindow(fetchPage, 0, 10)).resolves.toEqual([]);
    expect(fetchPage).not.toHaveBeenCalled();
  });

  it('fetches exactly page 1 for the default window', async () => {
    const fetchPage = upstream(100);
    const items = await fetchWindow(fetchPage);
    expect(fetchPage.mock.calls).toEqual([[1]]);
    expect(items).toEqual(range(0, 20));
  });

  it('spans two pages for amt=25, index=15', async () => {
    const fetchPage = upstream(100);
    const items = await fetchWindow(fetchPage, 25, 15);
    expect(fetchPage.mock.calls).toEqual([[1], [2]]);
    expect(items).toEqual(range(15, 40));
  });

  it('returns an empty list past the end but still requests the computed page', async () => {
    const fetchPage = upstream(50);
    const items = await fetchWindow(fetchPage, 20, 1000);
    expect(items).toEqual([]);
    expect(fetchPage.mock.calls).toEqual([[51]]);
  });

  it('truncates at the end of the data', async () => {
    const fetchPage = upstream(53);
    const items = await fetchWindow(fetchPage, 30, 40);
    expect(fetchPage.mock.calls).toEqual([[3], [4]]);
    expect(items).toEqual(range(40, 53));
  });

  it('returns min(amt, total - index) items for a spread of windows', async () => {
    const total = 53;
    for (const amt of [0, 1, 19, 20, 21, 45]) {
      for (const index of [0, 5, 19, 20, 40, 52, 53, 60]) {
        const items = await fetchWindow(upstream(total), amt, index);
        const expected = Math.min(amt, Math.max(0, total - index));
        expect(items).toEqual(range(index, index + expected));
      }
    }
  });

  it('starts every page fetch before any completes and orders by page number', async () => {
    const resolvers = new Map<number, (page: Page<number>) => void>();
    const fetchPage = jest.fn(
      (page: number) => new Promise<Page<number>>((resolve) => resolvers.set(page, resolve))
    );

    const pending = fetchWindow(fetchPage, 60, 0);
    expect(fetchPage.mock.calls).toEqual([[1], [2], [3]]);

    // complete in reverse order
    for (const page of [3, 2, 1]) {
      resolvers.get(page)?.(pageOf(page, 100));
      await Promise.resolve();
    }

    await expect(pending).resolves.toEqual(range(0, 60));
  });

  it('fails as a whole when one page fails', async () => {
    const fetchPage = jest.fn(async (page: number) => {
      if (page === 2) throw new Error('page 2 unavailable');
      return pageOf(page, 100);
    });
    await expect(fetchWindow(fetchPage, 30, 10)).rejects.toThrow('page 2 unavailable');
    expect(fetchPage.mock.calls).toEqual([[1], [2]]);
  });

  it('uses the page size from options', async () => {
    const fetchPage = upstream(100, 10);
    const items = await fetchWindow(fetchPage, 5, 8, { pageSize: 10 });
    expect(fetchPage.mock.calls).toEqual([[1], [2]]);
    expect(items).toEqual([8, 9, 10, 11, 12]);
  });

  it('logs the page range through the given logger', async () => {
    const lines: string[] = [];
    const logger = pino({ level: 'debug' }, { write: (line: string) => { lines.push(line); } });
    await fetchWindow(upstream(100), 25, 15, { logger });
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0])).toMatchObject({ msg: 'fetching window', amt: 25, index: 15, startPage: 1, endPage: 2 });
  });
});
