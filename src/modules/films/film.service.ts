import type { HttpClient } from '../api/http.client.js';
import { filmSchema, filmsResponseSchema } from '../api/api.schemas.js';
import { toNamedEntity } from '../api/api.mapper.js';
import type { Film, Photo } from '../api/api.types.js';
import { toPage, type PageFetcher } from '../../shared/pagination.js';
import { photoPages } from '../photos/photo.service.js';

export type FilmPhotoOrder = 'popular' | 'recent';

export function filmPages(http: HttpClient): PageFetcher<Film> {
  return async (page) => {
    const res = await http.get('/films', filmsResponseSchema, { page });
    return toPage(res, (r) => r.films.map(toNamedEntity));
  };
}

export async function fetchFilmById(http: HttpClient, filmId: number): Promise<Film> {
  return toNamedEntity(await http.get(`/films/${filmId}`, filmSchema));
}

export function filmPhotoPages(http: HttpClient, filmId: number, order: FilmPhotoOrder): PageFetcher<Photo> {
  return photoPages(http, `/films/${filmId}/photos/${order}`);
}
