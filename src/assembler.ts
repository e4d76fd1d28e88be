import { log } from 'apify';

import type { DistanceAnnotator } from './distance.js';
import { filterListings } from './filters.js';
import type {
    AnnotatedListing,
    Category,
    Coordinates,
    District,
    ListingFilters,
    PaginationStats,
    PerCategoryOutcomes,
    RawListing,
    ResultDocument,
} from './types.js';
import { buildFullUrl, readCoordinates } from './utils.js';

const LOG_PREFIX = '[assembler]';

export interface ResultAssemblerOptions {
    annotator: DistanceAnnotator;
    referencePoint: Coordinates;
    filters: ListingFilters;
    afterDate: string | null;
    listingBaseUrl: string | null;
}

export interface AssembleParams {
    district: District;
    chosenCategory: Category;
    listings: RawListing[];
    stats: PaginationStats;
    perCategory: PerCategoryOutcomes;
    timestamp: Date;
}

export interface ResultAssembler {
    assemble(params: AssembleParams): Promise<ResultDocument>;
}

export const createResultAssembler = ({
    annotator,
    referencePoint,
    filters,
    afterDate,
    listingBaseUrl,
}: ResultAssemblerOptions): ResultAssembler => ({
    async assemble({ district, chosenCategory, listings, stats, perCategory, timestamp }) {
        const { kept, filteredOut } = filterListings(listings, filters);

        if (filteredOut > 0) {
            log.info(`${LOG_PREFIX} Filtered out ${filteredOut} of ${listings.length} listings (${district.name})`);
        }

        // One at a time, so a rate-limited provider never sees parallel requests.
        const annotated: AnnotatedListing[] = [];
        for (const listing of kept) {
            const distanceFromReference = await annotator.distanceFrom(referencePoint, readCoordinates(listing));
            annotated.push({ ...listing, distanceFromReference, fullUrl: buildFullUrl(listing, listingBaseUrl) });
        }

        const unavailableDistances = annotated.filter((l) => l.distanceFromReference.status === 'UNAVAILABLE').length;

        return {
            metadata: {
                district: { id: district.id, name: district.name, directionId: district.directionId },
                chosenCategory,
                alternatives: perCategory,
                counts: {
                    expected: district.expectedCount,
                    reported: stats.totalCount,
                    fetched: listings.length,
                    filteredOut,
                },
                totalFetched: annotated.length,
                pagination: { offset: stats.offset, totalCount: stats.totalCount, pages: stats.pages },
                filters: { ...filters, afterDate },
                referencePoint,
                distanceProvider: annotator.provider,
                unavailableDistances,
                scrapedAt: timestamp.toISOString(),
            },
            listings: annotated,
        };
    },
});
