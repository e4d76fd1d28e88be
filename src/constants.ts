export const CATEGORIES = ['singles', 'families'] as const;

/** Listings API `family` filter value for each category. */
export const CATEGORY_FAMILY_FILTER = { singles: 0, families: 1 } as const;

export const INPUT_DEFAULTS = {
    listingBaseUrl: null,
    cityId: 21,
    candidateCategories: ['singles' as const, 'families' as const],
    pageSize: 20,
    rateLimitSeconds: 1,
    requestTimeoutSecs: 30,
    maxPageRetries: 0,
    retryBackoffMs: 1000,
    afterDate: null,
    minRooms: null,
    maxRooms: null,
    maxPrice: null,
    distanceProvider: 'haversine' as const,
    distanceRateLimitSeconds: 0.2,
    storeName: null,
};

export const DEFAULT_DIRECTION_ID = 1;

// `category: 1` is the apartments-for-rent listing category of the API
export const LISTING_CATEGORY_ID = 1;

export const RUN_SUMMARY_KEY = 'RUN_SUMMARY';

export const GOOGLE_DISTANCE_MATRIX_URL = 'https://maps.googleapis.com/maps/api/distancematrix/json';

export const FETCH_HEADERS = {
    'Content-Type': 'application/json',
    Accept: 'application/json',
};
