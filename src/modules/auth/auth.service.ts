import { AUTH_PROBE_CAMERA_ID } from '../../config/api.js';
import { HttpError } from '../../shared/errors.js';
import type { HttpClient } from '../api/http.client.js';
import { fetchCameraById } from '../cameras/camera.service.js';

/**
 * Checks whether the API accepts the client's key by fetching a known camera.
 * There is no real authentication endpoint, so any HTTP error counts as a
 * rejected key. Network failures and timeouts are rethrown.
 */
export async function verifyAuthentication(http: HttpClient): Promise<boolean> {
  try {
    await fetchCameraById(http, AUTH_PROBE_CAMERA_ID);
    return true;
  } catch (e) {
    if (e instanceof HttpError) return false;
    throw e;
  }
}
