import type { Category, District } from './types.js';

/** A single listings API call failed or returned a body we could not decode. */
export class FetchError extends Error {
    readonly statusCode: number | null;

    constructor(message: string, options: { statusCode?: number | null; cause?: unknown } = {}) {
        super(message, { cause: options.cause });
        this.name = 'FetchError';
        this.statusCode = options.statusCode ?? null;
    }
}

/** A full category fetch could not complete. Listings fetched so far are dropped. */
export class PaginationError extends Error {
    readonly districtId: number;
    readonly category: Category;
    readonly offset: number;

    constructor(district: District, category: Category, offset: number, cause: FetchError) {
        super(`Fetching ${category} for district ${district.id} failed at offset ${offset}: ${cause.message}`, {
            cause,
        });
        this.name = 'PaginationError';
        this.districtId = district.id;
        this.category = category;
        this.offset = offset;
    }
}

export class DistrictScrapeError extends Error {
    readonly districtId: number;
    readonly districtName: string;

    constructor(message: string, district: District, cause?: unknown) {
        super(message, { cause });
        this.name = 'DistrictScrapeError';
        this.districtId = district.id;
        this.districtName = district.name;
    }
}

export class InvalidInputError extends Error {
    readonly issues: string[];

    constructor(issues: string[]) {
        super(`Invalid actor input: ${issues.join('; ')}`);
        this.name = 'InvalidInputError';
        this.issues = issues;
    }
}
