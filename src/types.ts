import type { CATEGORIES } from './constants.js';

export type Category = (typeof CATEGORIES)[number];
export type DistanceProviderName = 'haversine' | 'google';

export interface Coordinates {
    lat: number;
    lng: number;
}

export interface District {
    id: number;
    name: string;
    directionId: number;
    expectedCount: number | null; // advisory only
}

export interface ListingFilters {
    minRooms: number | null; // null = no limit
    maxRooms: number | null;
    maxPrice: number | null;
}

export interface Input extends ListingFilters {
    apiUrl: string;
    listingBaseUrl: string | null;
    cityId: number;
    districts: District[];
    candidateCategories: Category[];
    pageSize: number;
    rateLimitSeconds: number;
    requestTimeoutSecs: number;
    maxPageRetries: number;
    retryBackoffMs: number;
    afterDate: string | null; // YYYY-MM-DD
    referencePoint: Coordinates;
    distanceProvider: DistanceProviderName;
    googleApiKey: string | null;
    distanceRateLimitSeconds: number;
    storeName: string | null; // named KV store for result documents
}

/** One record exactly as the listings API returned it. */
export type RawListing = Record<string, unknown>;

export interface Page {
    records: RawListing[];
    totalCount: number;
}

export interface PageSource {
    fetchPage(district: District, category: Category, offset: number, pageSize: number): Promise<Page>;
}

export interface PaginationStats {
    offset: number; // offset of the last page requested
    totalCount: number;
    pages: number;
    fetched: number;
}

export interface CategoryFetch {
    listings: RawListing[];
    stats: PaginationStats;
}

export type CategoryOutcome =
    | { failed: false; count: number; totalCount: number; pages: number }
    | { failed: true; error: string };

export type PerCategoryOutcomes = Partial<Record<Category, CategoryOutcome>>;

export type UnavailableReason = 'NO_COORDINATES' | 'NO_ROUTE' | 'PROVIDER_ERROR';

export type DistanceResult =
    | {
          status: 'OK';
          distanceMeters: number;
          distanceKm: number;
          durationSeconds: number | null;
          durationText: string | null;
      }
    | { status: 'UNAVAILABLE'; reason: UnavailableReason };

export type AnnotatedListing = RawListing & {
    distanceFromReference: DistanceResult;
    fullUrl: string | null;
};

export interface ResultMetadata {
    district: { id: number; name: string; directionId: number };
    chosenCategory: Category;
    alternatives: PerCategoryOutcomes;
    counts: { expected: number | null; reported: number; fetched: number; filteredOut: number };
    totalFetched: number;
    pagination: { offset: number; totalCount: number; pages: number };
    filters: ListingFilters & { afterDate: string | null };
    referencePoint: Coordinates;
    distanceProvider: DistanceProviderName;
    unavailableDistances: number;
    scrapedAt: string; // ISO date
}

export interface ResultDocument {
    metadata: ResultMetadata;
    listings: AnnotatedListing[];
}

export interface RunSummary {
    runDate: string;
    succeeded: { id: number; name: string; key: string; category: Category; listings: number }[];
    failed: { id: number; name: string; error: string }[];
}
