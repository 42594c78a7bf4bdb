import { z } from 'zod';

/**
 * One conference / call-for-papers listing as the CFPTime API returns it.
 *
 * Every field is required. Unknown fields are stripped, so the API can grow
 * without breaking decoding, and decoded records are frozen.
 */
export const conferenceSchema = z
  .object({
    id: z.number().int(),
    name: z.string(),
    /** Call-for-papers deadline, a date string such as `2026-03-01` */
    cfp_deadline: z.string(),
    /** First day of the conference, a date string */
    conf_start_date: z.string(),
    city: z.string(),
    province: z.string(),
    country: z.string(),
    /** Social-media handle of the conference */
    twitter: z.string(),
    website: z.string(),
    cfp_details: z.string(),
    speaker_benefits: z.string(),
    code_of_conduct: z.string(),
    /** Creation timestamp of the listing */
    created_at: z.string(),
    number_of_days: z.number().int(),
  })
  .readonly();

/** A decoded conference / CFP listing. */
export type Conference = z.output<typeof conferenceSchema>;

/** Decoder for the list endpoints, keeping server order. */
export const conferenceListSchema = z.array(conferenceSchema);

/** Path params of the by-id endpoints. */
export const idParamsSchema = z.object({
  id: z.number().int().nonnegative(),
});
