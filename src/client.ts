import { callbackify } from 'node:util';
import { AUTH_PROBE_CAMERA_ID } from './config/api.js';
import { loadEnv } from './config/env.js';
import logger, { type Logger } from './plugins/logger.js';
import { AuthenticationError, ConfigurationError, ValidationError } from './shared/errors.js';
import { fetchWindow, normalizeWindow, type PageFetcher, type WindowQuery } from './shared/pagination.js';
import { HttpClient } from './modules/api/http.client.js';
import { idSchema } from './modules/api/api.schemas.js';
import type { Camera, Film, Photo } from './modules/api/api.types.js';
import { verifyAuthentication } from './modules/auth/auth.service.js';
import { feedPhotoPages } from './modules/photos/photo.service.js';
import { cameraPages, cameraPhotoPages, fetchCameraById } from './modules/cameras/camera.service.js';
import { fetchFilmById, filmPages, filmPhotoPages } from './modules/films/film.service.js';
import { boundingBoxPhotoPages, nearPointPhotoPages } from './modules/location/location.service.js';
import type { BoundingBox, NearPointInput } from './modules/location/location.schemas.js';

export type ClientOptions = {
  apiKey?: string;
  baseUrl?: string;
  timeoutMs?: number;
  logger?: Logger;
};

export type CreateOptions = ClientOptions & {
  // Probe the API key before handing out the client
  verify?: boolean;
};

function requireId(id: number, what: string): number {
  const parsed = idSchema.safeParse(id);
  if (!parsed.success) throw new ValidationError(`${what} id must be a positive integer`, parsed.error.issues);
  return parsed.data;
}

/**
 * Promise-based client for the Lomography API.
 *
 * Listing methods take a window: `amt` items starting at the zero-based
 * `index` (defaults 20 and 0). The API pages at 20 items; every page the
 * window touches is requested at once and the result is trimmed to the window.
 *
 * @example
 * const lomo = await AsyncLomography.create({ apiKey: process.env.LOMOGRAPHY_API_KEY });
 * const photos = await lomo.fetchPopularPhotos(40, 10);
 * lomo.close();
 */
export class AsyncLomography {
  private readonly http: HttpClient;
  private readonly log: Logger;
  private readonly verifyOnCreate: boolean;

  constructor(options: ClientOptions = {}) {
    const env = loadEnv();
    const apiKey = options.apiKey ?? env.LOMOGRAPHY_API_KEY;
    if (!apiKey) throw new ConfigurationError('API key is missing: pass apiKey or set LOMOGRAPHY_API_KEY');

    this.log = (options.logger ?? logger).child({ module: 'client' });
    this.http = new HttpClient({
      apiKey,
      baseUrl: options.baseUrl ?? env.LOMOGRAPHY_BASE_URL,
      timeoutMs: options.timeoutMs ?? env.LOMOGRAPHY_TIMEOUT_MS,
      logger: options.logger,
    });
    this.verifyOnCreate = env.LOMOGRAPHY_VERIFY;
  }

  static async create(options: CreateOptions = {}): Promise<AsyncLomography> {
    const client = new AsyncLomography(options);
    if (options.verify ?? client.verifyOnCreate) {
      let ok: boolean;
      try {
        ok = await client.verifyAuthentication();
      } catch (e) {
        client.close();
        throw e;
      }
      if (!ok) {
        client.close();
        throw new AuthenticationError(401, `/cameras/${AUTH_PROBE_CAMERA_ID}`, 'API key was rejected');
      }
    }
    return client;
  }

  get closed(): boolean {
    return this.http.closed;
  }

  verifyAuthentication(): Promise<boolean> {
    return verifyAuthentication(this.http);
  }

  // Photos

  async fetchPopularPhotos(amt?: number, index?: number): Promise<Photo[]> {
    return this.window(feedPhotoPages(this.http, 'popular'), amt, index);
  }

  async fetchRecentPhotos(amt?: number, index?: number): Promise<Photo[]> {
    return this.window(feedPhotoPages(this.http, 'recent'), amt, index);
  }

  async fetchSelectedPhotos(amt?: number, index?: number): Promise<Photo[]> {
    return this.window(feedPhotoPages(this.http, 'selected'), amt, index);
  }

  // Cameras

  async fetchCameras(amt?: number, index?: number): Promise<Camera[]> {
    return this.window(cameraPages(this.http), amt, index);
  }

  async fetchCameraById(cameraId: number): Promise<Camera> {
    return fetchCameraById(this.http, requireId(cameraId, 'camera'));
  }

  async fetchPopularPhotosByCamera(cameraId: number, amt?: number, index?: number): Promise<Photo[]> {
    return this.window(cameraPhotoPages(this.http, requireId(cameraId, 'camera'), 'popular'), amt, index);
  }

  async fetchRecentPhotosByCamera(cameraId: number, amt?: number, index?: number): Promise<Photo[]> {
    return this.window(cameraPhotoPages(this.http, requireId(cameraId, 'camera'), 'recent'), amt, index);
  }

  // Films

  async fetchFilms(amt?: number, index?: number): Promise<Film[]> {
    return this.window(filmPages(this.http), amt, index);
  }

  async fetchFilmById(filmId: number): Promise<Film> {
    return fetchFilmById(this.http, requireId(filmId, 'film'));
  }

  async fetchPopularPhotosByFilm(filmId: number, amt?: number, index?: number): Promise<Photo[]> {
    return this.window(filmPhotoPages(this.http, requireId(filmId, 'film'), 'popular'), amt, index);
  }

  async fetchRecentPhotosByFilm(filmId: number, amt?: number, index?: number): Promise<Photo[]> {
    return this.window(filmPhotoPages(this.http, requireId(filmId, 'film'), 'recent'), amt, index);
  }

  // Location

  async fetchPopularPhotosWithin(box: BoundingBox, amt?: number, index?: number): Promise<Photo[]> {
    return this.window(boundingBoxPhotoPages(this.http, box, 'popular'), amt, index);
  }

  async fetchRecentPhotosWithin(box: BoundingBox, amt?: number, index?: number): Promise<Photo[]> {
    return this.window(boundingBoxPhotoPages(this.http, box, 'recent'), amt, index);
  }

  // Closest to the point first
  async fetchPhotosNear(point: NearPointInput, amt?: number, index?: number): Promise<Photo[]> {
    return this.window(nearPointPhotoPages(this.http, point, 'distance'), amt, index);
  }

  async fetchPopularPhotosNear(point: NearPointInput, amt?: number, index?: number): Promise<Photo[]> {
    return this.window(nearPointPhotoPages(this.http, point, 'popular'), amt, index);
  }

  async fetchRecentPhotosNear(point: NearPointInput, amt?: number, index?: number): Promise<Photo[]> {
    return this.window(nearPointPhotoPages(this.http, point, 'recent'), amt, index);
  }

  // Aborts in-flight requests; later calls fail with ClientClosedError
  close(): void {
    this.http.close();
  }

  private async window<T>(pages: PageFetcher<T>, amt?: number, index?: number): Promise<T[]> {
    const w = normalizeWindow({ amt, index });
    return fetchWindow(pages, w.amt, w.index, { logger: this.log });
  }
}

export type Callback<T> = (error: NodeJS.ErrnoException | null, result: T) => void;

/**
 * Callback-style client for code that does not use promises. Every method runs
 * the same operation as its AsyncLomography counterpart to completion and then
 * calls back once with `(error, result)`.
 *
 * @example
 * const lomo = new Lomography({ apiKey: 'my-key' });
 * lomo.fetchRecentPhotos({ amt: 5 }, (err, photos) => {
 *   if (err) throw err;
 *   console.log(photos.map((p) => p.url));
 *   lomo.close();
 * });
 */
export class Lomography {
  private readonly client: AsyncLomography;

  constructor(options: ClientOptions | AsyncLomography = {}) {
    this.client = options instanceof AsyncLomography ? options : new AsyncLomography(options);
  }

  static create(options: CreateOptions, callback: Callback<Lomography>): void {
    callbackify(async () => new Lomography(await AsyncLomography.create(options)))(callback);
  }

  get closed(): boolean {
    return this.client.closed;
  }

  verifyAuthentication(callback: Callback<boolean>): void {
    this.run(() => this.client.verifyAuthentication(), callback);
  }

  fetchPopularPhotos(window: WindowQuery, callback: Callback<Photo[]>): void {
    this.run(() => this.client.fetchPopularPhotos(window.amt, window.index), callback);
  }

  fetchRecentPhotos(window: WindowQuery, callback: Callback<Photo[]>): void {
    this.run(() => this.client.fetchRecentPhotos(window.amt, window.index), callback);
  }

  fetchSelectedPhotos(window: WindowQuery, callback: Callback<Photo[]>): void {
    this.run(() => this.client.fetchSelectedPhotos(window.amt, window.index), callback);
  }

  fetchCameras(window: WindowQuery, callback: Callback<Camera[]>): void {
    this.run(() => this.client.fetchCameras(window.amt, window.index), callback);
  }

  fetchCameraById(cameraId: number, callback: Callback<Camera>): void {
    this.run(() => this.client.fetchCameraById(cameraId), callback);
  }

  fetchPopularPhotosByCamera(cameraId: number, window: WindowQuery, callback: Callback<Photo[]>): void {
    this.run(() => this.client.fetchPopularPhotosByCamera(cameraId, window.amt, window.index), callback);
  }

  fetchRecentPhotosByCamera(cameraId: number, window: WindowQuery, callback: Callback<Photo[]>): void {
    this.run(() => this.client.fetchRecentPhotosByCamera(cameraId, window.amt, window.index), callback);
  }

  fetchFilms(window: WindowQuery, callback: Callback<Film[]>): void {
    this.run(() => this.client.fetchFilms(window.amt, window.index), callback);
  }

  fetchFilmById(filmId: number, callback: Callback<Film>): void {
    this.run(() => this.client.fetchFilmById(filmId), callback);
  }

  fetchPopularPhotosByFilm(filmId: number, window: WindowQuery, callback: Callback<Photo[]>): void {
    this.run(() => this.client.fetchPopularPhotosByFilm(filmId, window.amt, window.index), callback);
  }

  fetchRecentPhotosByFilm(filmId: number, window: WindowQuery, callback: Callback<Photo[]>): void {
    this.run(() => this.client.fetchRecentPhotosByFilm(filmId, window.amt, window.index), callback);
  }

  fetchPopularPhotosWithin(box: BoundingBox, window: WindowQuery, callback: Callback<Photo[]>): void {
    this.run(() => this.client.fetchPopularPhotosWithin(box, window.amt, window.index), callback);
  }

  fetchRecentPhotosWithin(box: BoundingBox, window: WindowQuery, callback: Callback<Photo[]>): void {
    this.run(() => this.client.fetchRecentPhotosWithin(box, window.amt, window.index), callback);
  }

  fetchPhotosNear(point: NearPointInput, window: WindowQuery, callback: Callback<Photo[]>): void {
    this.run(() => this.client.fetchPhotosNear(point, window.amt, window.index), callback);
  }

  fetchPopularPhotosNear(point: NearPointInput, window: WindowQuery, callback: Callback<Photo[]>): void {
    this.run(() => this.client.fetchPopularPhotosNear(point, window.amt, window.index), callback);
  }

  fetchRecentPhotosNear(point: NearPointInput, window: WindowQuery, callback: Callback<Photo[]>): void {
    this.run(() => this.client.fetchRecentPhotosNear(point, window.amt, window.index), callback);
  }

  close(): void {
    this.client.close();
  }

  private run<T>(task: () => Promise<T>, callback: Callback<T>): void {
    callbackify(task)(callback);
  }
}
