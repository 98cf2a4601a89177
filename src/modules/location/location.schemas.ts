import { z } from 'zod';
import { DEFAULT_NEAR_DISTANCE_KM } from '../../config/api.js';

const latitude = z.number().min(-90).max(90);
const longitude = z.number().min(-180).max(180);

export const boundingBoxSchema = z
  .object({
    north: latitude,
    east: longitude,
    south: latitude,
    west: longitude,
  })
  .refine((b) => b.north >= b.south, { message: 'north must not be below south' });

export type BoundingBox = z.infer<typeof boundingBoxSchema>;

export const nearPointSchema = z.object({
  latitude,
  longitude,
  distanceKm: z.number().int().positive().default(DEFAULT_NEAR_DISTANCE_KM),
});

export type NearPointInput = z.input<typeof nearPointSchema>;
export type NearPoint = z.infer<typeof nearPointSchema>;
