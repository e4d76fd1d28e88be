import { log } from 'apify';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import {
    buildFullUrl,
    describeError,
    formatRunDate,
    normalizeCategories,
    readCoordinates,
    toUnixSeconds,
} from '../utils.js';

describe('normalizeCategories', () => {
    beforeEach(() => {
        vi.spyOn(log, 'warning').mockReturnValue(undefined);
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('should return distinct categories unchanged without warning', () => {
        expect(normalizeCategories(['families', 'singles'], '[test]')).toEqual(['families', 'singles']);
        expect(log.warning).not.toHaveBeenCalled();
    });

    it('should keep the first occurrence of a repeated category', () => {
        expect(normalizeCategories(['families', 'singles', 'families'], '[test]')).toEqual(['families', 'singles']);
    });

    it('should warn about repeated categories', () => {
        normalizeCategories(['singles', 'singles'], '[test]');

        expect(log.warning).toHaveBeenCalledWith('[test] Ignoring repeated candidate categories: singles, singles');
    });
});

describe('formatRunDate', () => {
    it('should use the UTC calendar day', () => {
        expect(formatRunDate(new Date('2026-03-01T23:59:59.000Z'))).toBe('2026-03-01');
    });
});

describe('toUnixSeconds', () => {
    it('should convert a date to seconds at UTC midnight', () => {
        expect(toUnixSeconds('1970-01-02')).toBe(86_400);
    });
});

describe('readCoordinates', () => {
    it('should read lat and lng from the location object', () => {
        expect(readCoordinates({ location: { lat: 24.7, lng: 46.6, __typename: 'Location' } })).toEqual({
            lat: 24.7,
            lng: 46.6,
        });
    });

    it('should return null without a location', () => {
        expect(readCoordinates({ id: 1 })).toBeNull();
    });

    it('should return null when a coordinate is not a finite number', () => {
        expect(readCoordinates({ location: { lat: '24.7', lng: 46.6 } })).toBeNull();
        expect(readCoordinates({ location: { lat: Number.NaN, lng: 46.6 } })).toBeNull();
        expect(readCoordinates({ location: { lat: 24.7 } })).toBeNull();
    });
});

describe('buildFullUrl', () => {
    it('should join the base URL and the listing path with one slash', () => {
        expect(buildFullUrl({ path: '/ad/123' }, 'https://listings.test/')).toBe('https://listings.test/ad/123');
    });

    it('should return null without a base URL', () => {
        expect(buildFullUrl({ path: '/ad/123' }, null)).toBeNull();
    });

    it('should return null without a path', () => {
        expect(buildFullUrl({ id: 1 }, 'https://listings.test')).toBeNull();
    });
});

describe('describeError', () => {
    it('should use the message of an Error', () => {
        expect(describeError(new Error('boom'))).toBe('boom');
    });

    it('should stringify anything else', () => {
        expect(describeError(503)).toBe('503');
    });
});
