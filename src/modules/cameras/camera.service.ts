import type { HttpClient } from '../api/http.client.js';
import { cameraSchema, camerasResponseSchema } from '../api/api.schemas.js';
import { toNamedEntity } from '../api/api.mapper.js';
import type { Camera, Photo } from '../api/api.types.js';
import { toPage, type PageFetcher } from '../../shared/pagination.js';
import { photoPages } from '../photos/photo.service.js';

export type CameraPhotoOrder = 'popular' | 'recent';

export function cameraPages(http: HttpClient): PageFetcher<Camera> {
  return async (page) => {
    const res = await http.get('/cameras', camerasResponseSchema, { page });
    return toPage(res, (r) => r.cameras.map(toNamedEntity));
  };
}

export async function fetchCameraById(http: HttpClient, cameraId: number): Promise<Camera> {
  return toNamedEntity(await http.get(`/cameras/${cameraId}`, cameraSchema));
}

export function cameraPhotoPages(http: HttpClient, cameraId: number, order: CameraPhotoOrder): PageFetcher<Photo> {
  return photoPages(http, `/cameras/${cameraId}/photos/${order}`);
}
