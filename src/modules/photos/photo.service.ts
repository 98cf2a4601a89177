import type { HttpClient } from '../api/http.client.js';
import { photosResponseSchema } from '../api/api.schemas.js';
import { toPhoto } from '../api/api.mapper.js';
import type { Photo } from '../api/api.types.js';
import { toPage, type PageFetcher } from '../../shared/pagination.js';

export type PhotoFeed = 'popular' | 'recent' | 'selected';

// Page fetcher for any endpoint answering with { meta, photos }
export function photoPages(http: HttpClient, path: string): PageFetcher<Photo> {
  return async (page) => {
    const res = await http.get(path, photosResponseSchema, { page });
    return toPage(res, (r) => r.photos.map(toPhoto));
  };
}

// popular: most popular photos uploaded in the last month
// recent: newest uploads
// selected: handpicked collection
export function feedPhotoPages(http: HttpClient, feed: PhotoFeed): PageFetcher<Photo> {
  return photoPages(http, `/photos/${feed}`);
}
