import { FetchError } from '../errors.js';
import type { AnnotatedListing, Category, District, Page, PageSource, RawListing, ResultDocument } from '../types.js';

export const centro: District = { id: 7, name: 'Centro', directionId: 1, expectedCount: 40 };

export const makeListings = (count: number, prefix = 'listing'): RawListing[] =>
    Array.from({ length: count }, (_, i) => ({
        id: `${prefix}-${i + 1}`,
        rooms: 3,
        price: 40_000,
        path: `/ad/${prefix}-${i + 1}`,
        location: { lat: 24.7, lng: 46.6 },
    }));

interface FakeCategoryData {
    records: RawListing[];
    totalCount?: number; // defaults to records.length
}

/** Serves slices of fixed record lists; a category without data answers like an HTTP 500. */
export class FakePageSource implements PageSource {
    readonly calls: { category: Category; offset: number; pageSize: number }[] = [];

    constructor(private readonly data: Partial<Record<Category, FakeCategoryData>>) {}

    async fetchPage(_district: District, category: Category, offset: number, pageSize: number): Promise<Page> {
        this.calls.push({ category, offset, pageSize });

        const entry = this.data[category];
        if (!entry) throw new FetchError('HTTP 500', { statusCode: 500 });

        return {
            records: entry.records.slice(offset, offset + pageSize),
            totalCount: entry.totalCount ?? entry.records.length,
        };
    }

    offsetsFor(category: Category): number[] {
        return this.calls.filter((call) => call.category === category).map((call) => call.offset);
    }
}

export const noSleep = async (): Promise<void> => undefined;

/** A stored document for `district`; only the fields the storage and run tests look at are meaningful. */
export const makeDocument = (district: District, listings: AnnotatedListing[] = []): ResultDocument => ({
    metadata: {
        district: { id: district.id, name: district.name, directionId: district.directionId },
        chosenCategory: 'singles',
        alternatives: {},
        counts: { expected: null, reported: listings.length, fetched: listings.length, filteredOut: 0 },
        totalFetched: listings.length,
        pagination: { offset: 0, totalCount: listings.length, pages: 1 },
        filters: { minRooms: null, maxRooms: null, maxPrice: null, afterDate: null },
        referencePoint: { lat: 0, lng: 0 },
        distanceProvider: 'haversine',
        unavailableDistances: 0,
        scrapedAt: '2026-03-01T08:30:00.000Z',
    },
    listings,
});
