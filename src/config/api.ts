// Fixed facts about the upstream API. The page size is not negotiated: every
// listing endpoint pages at exactly this many items.
export const PAGE_SIZE = 20;

// Window defaults used by every windowed operation
export const DEFAULT_AMOUNT = 20;
export const DEFAULT_INDEX = 0;

export const DEFAULT_BASE_URL = 'https://api.lomography.com/v1';
export const DEFAULT_TIMEOUT_MS = 10_000;

// Default search radius (km) for "near a point" queries
export const DEFAULT_NEAR_DISTANCE_KM = 10;

// Known camera (Lomo LC-A) used to probe whether an API key is accepted.
// The API has no dedicated authentication endpoint.
export const AUTH_PROBE_CAMERA_ID = 3314883;

// Query parameter carrying the API key; masked in logs
export const API_KEY_PARAM = 'api_key';
