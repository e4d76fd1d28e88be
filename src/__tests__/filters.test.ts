import { describe, expect, it } from 'vitest';

import { filterListings, hasActiveFilters } from '../filters.js';

const NO_FILTERS = { minRooms: null, maxRooms: null, maxPrice: null };

const listings = [
    { id: 'a', rooms: 1, price: 30_000 },
    { id: 'b', rooms: 3, price: 45_000 },
    { id: 'c', rooms: 4, price: 70_000 },
    { id: 'd', rooms: 5, price: 50_000 },
    { id: 'e', price: 20_000 },
];

describe('hasActiveFilters', () => {
    it('should be false when every bound is null', () => {
        expect(hasActiveFilters(NO_FILTERS)).toBe(false);
    });

    it('should be true when any bound is set', () => {
        expect(hasActiveFilters({ ...NO_FILTERS, maxPrice: 0 })).toBe(true);
    });
});

describe('filterListings', () => {
    it('should keep everything when no filter is set', () => {
        expect(filterListings(listings, NO_FILTERS)).toEqual({ kept: listings, filteredOut: 0 });
    });

    it('should keep listings within the room range, in order', () => {
        const { kept, filteredOut } = filterListings(listings, { ...NO_FILTERS, minRooms: 2, maxRooms: 4 });

        expect(kept.map((l) => l.id)).toEqual(['b', 'c']);
        expect(filteredOut).toBe(3);
    });

    it('should drop listings priced above the maximum', () => {
        const { kept } = filterListings(listings, { ...NO_FILTERS, maxPrice: 50_000 });

        expect(kept.map((l) => l.id)).toEqual(['a', 'b', 'd', 'e']);
    });

    it('should combine bounds', () => {
        const { kept } = filterListings(listings, { minRooms: 2, maxRooms: 4, maxPrice: 60_000 });

        expect(kept.map((l) => l.id)).toEqual(['b']);
    });

    it('should drop a listing missing the field a bound checks', () => {
        const { kept } = filterListings([{ id: 'x', rooms: '3', price: 10 }], { ...NO_FILTERS, minRooms: 1 });

        expect(kept).toEqual([]);
    });
});
