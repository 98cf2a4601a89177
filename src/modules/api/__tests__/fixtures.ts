import type { PhotoPayload } from '../api.schemas.js';

// Made-up payloads shaped like the API's responses

export function photoPayload(id: number, overrides: Partial<PhotoPayload> = {}): PhotoPayload {
  return {
    id,
    title: `Photo ${id}`,
    description: 'Expired slide film, cross-processed',
    url: `https://photos.example.test/photos/${id}`,
    assets: {
      small: { url: `https://cdn.example.test/${id}/small.jpg`, width: 96, height: 64, ratio: 1.5, filename: '96x64.jpg' },
      large: { url: `https://cdn.example.test/${id}/large.jpg`, width: 576, height: 384, ratio: 1.5, filename: '576x384.jpg' },
    },
    asset_hash: `hash-${id}`,
    asset_width: 3000,
    asset_height: 2000,
    asset_ratio: 1.5,
    asset_preview: 'data:image/gif;base64,AAAA',
    camera: { id: 11, name: 'Test Camera' },
    film: { id: 22, name: 'Test Film 400' },
    lens: null,
    tags: [{ id: 33, name: 'street' }],
    user: {
      id: 44,
      username: 'tester',
      url: 'https://photos.example.test/homes/tester',
      avatar: { url: 'https://cdn.example.test/avatar.jpg', width: 192, height: 192 },
    },
    ...overrides,
  };
}

export function photosResponse(ids: number[], page: number, total: number) {
  return {
    meta: { total_entries: total, per_page: 20, page },
    photos: ids.map((id) => photoPayload(id)),
  };
}

export function jsonResponse(body: unknown, status = 200, statusText = 'OK'): Response {
  return new Response(JSON.stringify(body), {
    status,
    statusText,
    headers: { 'Content-Type': 'application/json' },
  });
}
