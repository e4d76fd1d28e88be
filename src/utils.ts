import { log } from 'apify';

import type { Category, Coordinates, RawListing } from './types.js';

/** Drops repeated categories, keeping the first occurrence so the tie-break order stays stable. */
export const normalizeCategories = (categories: Category[], logPrefix: string): Category[] => {
    const unique = [...new Set(categories)];
    if (unique.length < categories.length) {
        log.warning(`${logPrefix} Ignoring repeated candidate categories: ${categories.join(', ')}`);
    }
    return unique;
};

export const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error));

export const formatRunDate = (date: Date): string => date.toISOString().slice(0, 10);

/** Unix seconds of UTC midnight for a YYYY-MM-DD date. */
export const toUnixSeconds = (isoDate: string): number => Math.floor(Date.parse(`${isoDate}T00:00:00Z`) / 1000);

const isRecord = (value: unknown): value is Record<string, unknown> => typeof value === 'object' && value !== null;

export const readNumber = (value: unknown): number | null =>
    typeof value === 'number' && Number.isFinite(value) ? value : null;

export const readCoordinates = (listing: RawListing): Coordinates | null => {
    const { location } = listing;
    if (!isRecord(location)) return null;

    const lat = readNumber(location.lat);
    const lng = readNumber(location.lng);
    return lat !== null && lng !== null ? { lat, lng } : null;
};

export const buildFullUrl = (listing: RawListing, listingBaseUrl: string | null): string | null => {
    const { path } = listing;
    if (!listingBaseUrl || typeof path !== 'string' || path === '') return null;
    return `${listingBaseUrl.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;
};
