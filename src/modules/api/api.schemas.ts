import { z } from 'zod';

// Raw payloads as returned by the Lomography API (snake_case, little processing)

export const metaSchema = z.object({
    total_entries: z.number().int(),
    per_page: z.number().int(),
    page: z.number().int()
});

// Cameras, films, lenses and tags share the same { id, name } shape
export const namedEntitySchema = z.object({
    id: z.number().int(),
    name: z.string()
});

export const cameraSchema = namedEntitySchema;
export const filmSchema = namedEntitySchema;
export const lensSchema = namedEntitySchema;
export const tagSchema = namedEntitySchema;

export const imageSchema = z.object({
    url: z.string(),
    width: z.number(),
    height: z.number()
});

export const photoImageSchema = imageSchema.extend({
    ratio: z.number(),
    filename: z.string()
});

export const locationSchema = z.object({
    latitude: z.number(),
    longitude: z.number()
});

export const userSchema = z.object({
    id: z.number().int().optional(),
    username: z.string(),
    url: z.string(),
    avatar: imageSchema.nullable().optional()
});

// The API has been seen sending the literal string "None" for a missing camera/film
const optionalEntity = z.union([namedEntitySchema, z.string(), z.null()]).optional();

export const photoSchema = z.object({
    id: z.number().int(),
    title: z.string().nullable().optional(),
    description: z.string().nullable().optional(),
    url: z.string(),
    assets: z.object({
        small: photoImageSchema,
        large: photoImageSchema
    }),
    asset_hash: z.string(),
    asset_width: z.number(),
    asset_height: z.number(),
    asset_ratio: z.number(),
    asset_preview: z.string(),
    camera: optionalEntity,
    film: optionalEntity,
    lens: optionalEntity,
    tags: z.array(tagSchema).optional(),
    // documented upstream but not always present
    location: locationSchema.nullable().optional(),
    user: userSchema
});

export const photosResponseSchema = z.object({
    meta: metaSchema,
    photos: z.array(photoSchema)
});

export const camerasResponseSchema = z.object({
    meta: metaSchema,
    cameras: z.array(cameraSchema)
});

export const filmsResponseSchema = z.object({
    meta: metaSchema,
    films: z.array(filmSchema)
});

export type NamedEntityPayload = z.infer<typeof namedEntitySchema>;
export type ImagePayload = z.infer<typeof imageSchema>;
export type PhotoImagePayload = z.infer<typeof photoImageSchema>;
export type UserPayload = z.infer<typeof userSchema>;
export type PhotoPayload = z.infer<typeof photoSchema>;
export type PhotosResponse = z.infer<typeof photosResponseSchema>;
export type CamerasResponse = z.infer<typeof camerasResponseSchema>;
export type FilmsResponse = z.infer<typeof filmsResponseSchema>;

// Camera and film ids in request paths
export const idSchema = z.number().int().positive();
