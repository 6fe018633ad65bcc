import { z } from 'zod';

/**
 * Stored profile shape. Every record held by the profile store satisfies this
 * schema, including the age range and email format.
 */
export const ProfileSchema = z.object({
  name: z.string(),
  email: z.string().email(),
  age: z.number().int().min(18).max(120),
  bio: z.string().nullable(),
});

export type Profile = z.infer<typeof ProfileSchema>;

export const PROFILE_FIELDS = ['name', 'email', 'age', 'bio'] as const;

export type ProfileField = (typeof PROFILE_FIELDS)[number];

/**
 * Body accepted by PUT /user/profile.
 *
 * Only the wire shape is checked here (types, unknown keys). Business rules such
 * as the age range live in the core update validator so that every violation is
 * reported in one pass.
 */
export const UpdateProfileSchema = z
  .object({
    name: z.string().optional(),
    email: z.string().optional(),
    age: z.number().int().optional(),
    // null clears the bio
    bio: z.string().nullable().optional(),
  })
  .strict();

export type UpdateProfileInput = z.infer<typeof UpdateProfileSchema>;
