export { AsyncLomography, Lomography, type Callback, type ClientOptions, type CreateOptions } from './client.js';
export type { Camera, Film, Image, Lens, Location, Photo, PhotoImage, Tag, User } from './modules/api/api.types.js';
export type { BoundingBox, NearPointInput } from './modules/location/location.schemas.js';
export {
  fetchWindow,
  normalizeWindow,
  pageRange,
  toPage,
  type Page,
  type PageFetcher,
  type PageRange,
  type Window,
  type WindowQuery,
} from './shared/pagination.js';
export { PAGE_SIZE } from './config/api.js';
export { loadEnv, type LomographyEnv } from './config/env.js';
export {
  AuthenticationError,
  ClientClosedError,
  ConfigurationError,
  HttpError,
  LomographyError,
  NetworkError,
  NotFoundError,
  RequestTimeoutError,
  ResponseValidationError,
  ValidationError,
} from './shared/errors.js';
