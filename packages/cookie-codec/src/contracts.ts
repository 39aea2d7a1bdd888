import {z} from 'zod';

export const SAME_SITE_VALUES = ['strict', 'lax', 'none'] as const;
export type SameSite = (typeof SAME_SITE_VALUES)[number];

/** Stand-in for "expire immediately": the start of the Unix epoch. */
export const EXPIRED_COOKIE_DATE = new Date(0);

export const SetCookieInputSchema = z
  .object({
    name: z.string().min(1),
    value: z.union([z.string(), z.number(), z.boolean()]).transform(value => String(value)),
    // A number is a lifetime in seconds from now; negative numbers expire the cookie.
    expires: z.union([z.date(), z.number().int()]).optional(),
    domain: z.string().min(1).optional(),
    path: z.string().min(1).optional(),
    secure: z.boolean().default(false),
    httpOnly: z.boolean().default(false),
    sameSite: z.string().optional()
  })
  .strict();

export type SetCookieInput = z.input<typeof SetCookieInputSchema>;
export type ParsedSetCookieInput = z.output<typeof SetCookieInputSchema>;

export type CookieEncodingContext = {
  /** Mount path of the application; the default cookie path is `${homePath}/`. */
  homePath: string;
  now?: () => Date;
};

export type CookieRecord = Record<string, string>;
