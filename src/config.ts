import { z } from 'zod';

import { CATEGORIES, DEFAULT_DIRECTION_ID, INPUT_DEFAULTS } from './constants.js';
import { InvalidInputError } from './errors.js';
import type { Input } from './types.js';

const coordinatesSchema = z.object({
    lat: z.number().min(-90).max(90),
    lng: z.number().min(-180).max(180),
});

const districtSchema = z.object({
    id: z.number().int(),
    name: z.string().trim().min(1),
    directionId: z.number().int().default(DEFAULT_DIRECTION_ID),
    expectedCount: z.number().int().nonnegative().nullable().default(null),
});

const optionalLimit = z.number().nonnegative().nullable().default(null);

const inputObjectSchema = z.object({
    apiUrl: z.string().url(),
    listingBaseUrl: z.string().url().nullable().default(INPUT_DEFAULTS.listingBaseUrl),
    cityId: z.number().int().default(INPUT_DEFAULTS.cityId),
    districts: z.array(districtSchema).min(1, 'at least one district is required'),
    candidateCategories: z.array(z.enum(CATEGORIES)).min(1).default(INPUT_DEFAULTS.candidateCategories),
    pageSize: z.number().int().positive().default(INPUT_DEFAULTS.pageSize),
    rateLimitSeconds: z.number().nonnegative().default(INPUT_DEFAULTS.rateLimitSeconds),
    requestTimeoutSecs: z.number().positive().default(INPUT_DEFAULTS.requestTimeoutSecs),
    maxPageRetries: z.number().int().nonnegative().default(INPUT_DEFAULTS.maxPageRetries),
    retryBackoffMs: z.number().int().nonnegative().default(INPUT_DEFAULTS.retryBackoffMs),
    afterDate: z
        .string()
        .regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD')
        .refine((value) => !Number.isNaN(Date.parse(value)), 'not a calendar date')
        .nullable()
        .default(INPUT_DEFAULTS.afterDate),
    minRooms: optionalLimit,
    maxRooms: optionalLimit,
    maxPrice: optionalLimit,
    referencePoint: coordinatesSchema,
    distanceProvider: z.enum(['haversine', 'google']).default(INPUT_DEFAULTS.distanceProvider),
    googleApiKey: z.string().min(1).nullable().default(null),
    distanceRateLimitSeconds: z.number().nonnegative().default(INPUT_DEFAULTS.distanceRateLimitSeconds),
    storeName: z.string().min(1).nullable().default(INPUT_DEFAULTS.storeName),
});

const inputSchema = inputObjectSchema.refine(
    (input) => input.minRooms === null || input.maxRooms === null || input.minRooms <= input.maxRooms,
    { message: 'minRooms must not exceed maxRooms', path: ['minRooms'] },
);

/** Provider settings on their own, so a missing key is reported even when the rest of the input is broken. */
const distanceSettingsSchema = (env: NodeJS.ProcessEnv) =>
    inputObjectSchema
        .pick({ distanceProvider: true, googleApiKey: true })
        .transform((settings) => ({ ...settings, googleApiKey: settings.googleApiKey ?? (env.GOOGLE_API_KEY || null) }))
        .refine((settings) => settings.distanceProvider !== 'google' || settings.googleApiKey !== null, {
            message: 'required when distanceProvider is "google"',
            path: ['googleApiKey'],
        });

const formatIssue = (issue: z.ZodIssue): string =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message;

/**
 * Validates raw actor input and fills in defaults.
 * The Google API key falls back to `GOOGLE_API_KEY` from the environment.
 */
export const parseInput = (rawInput: unknown, env: NodeJS.ProcessEnv = process.env): Input => {
    const parsed = inputSchema.safeParse(rawInput ?? {});
    const distance = distanceSettingsSchema(env).safeParse(rawInput ?? {});

    const issues = [
        ...(parsed.success ? [] : parsed.error.issues.map(formatIssue)),
        ...(distance.success ? [] : distance.error.issues.map(formatIssue)),
    ];
    if (!parsed.success || !distance.success) {
        throw new InvalidInputError([...new Set(issues)]);
    }

    return { ...parsed.data, googleApiKey: distance.data.googleApiKey };
};
