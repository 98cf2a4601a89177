import type {
  ImagePayload,
  NamedEntityPayload,
  PhotoImagePayload,
  PhotoPayload,
  UserPayload,
} from './api.schemas.js';
import type { Camera, Film, Image, Lens, Photo, PhotoImage, Tag, User } from './api.types.js';

export function toNamedEntity(data: NamedEntityPayload): Camera | Film | Lens | Tag {
  return { id: data.id, name: data.name };
}

// Absent, null and the string "None" all mean "no entity"
function optionalEntity(data: NamedEntityPayload | string | null | undefined): Camera | Film | Lens | null {
  if (data == null || typeof data === 'string') return null;
  return toNamedEntity(data);
}

// Empty strings from the API are treated as missing
function nonEmpty(s: string | null | undefined): string | null {
  return s ? s : null;
}

export function toImage(data: ImagePayload): Image {
  return { url: data.url, width: data.width, height: data.height };
}

export function toPhotoImage(data: PhotoImagePayload): PhotoImage {
  return { ...toImage(data), ratio: data.ratio, filename: data.filename };
}

export function toUser(data: UserPayload): User {
  return {
    id: data.id ?? null,
    username: data.username,
    url: data.url,
    avatar: data.avatar ? toImage(data.avatar) : null,
  };
}

export function toPhoto(data: PhotoPayload): Photo {
  return {
    id: data.id,
    title: nonEmpty(data.title),
    description: nonEmpty(data.description),
    url: data.url,
    camera: optionalEntity(data.camera),
    film: optionalEntity(data.film),
    lens: optionalEntity(data.lens),
    tags: (data.tags ?? []).map(toNamedEntity),
    user: toUser(data.user),
    small: toPhotoImage(data.assets.small),
    large: toPhotoImage(data.assets.large),
    location: data.location ? { latitude: data.location.latitude, longitude: data.location.longitude } : null,
    assetHash: data.asset_hash,
    assetWidth: data.asset_width,
    assetHeight: data.asset_height,
    assetRatio: data.asset_ratio,
    assetPreview: data.asset_preview,
  };
}
