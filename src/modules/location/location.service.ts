import type { HttpClient } from '../api/http.client.js';
import type { Photo } from '../api/api.types.js';
import type { PageFetcher } from '../../shared/pagination.js';
import { ValidationError } from '../../shared/errors.js';
import { photoPages } from '../photos/photo.service.js';
import { boundingBoxSchema, nearPointSchema, type BoundingBox, type NearPoint, type NearPointInput } from './location.schemas.js';

export type BoundingBoxPhotoOrder = 'popular' | 'recent';
// distance: closest to the point first
export type NearPointPhotoOrder = 'distance' | 'popular' | 'recent';

export function parseBoundingBox(input: BoundingBox): BoundingBox {
  const parsed = boundingBoxSchema.safeParse(input);
  if (!parsed.success) throw new ValidationError('Invalid bounding box', parsed.error.issues);
  return parsed.data;
}

export function parseNearPoint(input: NearPointInput): NearPoint {
  const parsed = nearPointSchema.safeParse(input);
  if (!parsed.success) throw new ValidationError('Invalid point', parsed.error.issues);
  return parsed.data;
}

export function boundingBoxPhotoPages(http: HttpClient, box: BoundingBox, order: BoundingBoxPhotoOrder): PageFetcher<Photo> {
  const { north, east, south, west } = parseBoundingBox(box);
  return photoPages(http, `/location/within/${north}/${east}/${south}/${west}/photos/${order}`);
}

export function nearPointPhotoPages(http: HttpClient, point: NearPointInput, order: NearPointPhotoOrder): PageFetcher<Photo> {
  const { latitude, longitude, distanceKm } = parseNearPoint(point);
  return photoPages(http, `/location/around/${latitude}/${longitude}/${distanceKm}/photos/${order}`);
}
