import { log } from 'apify';

import { DistrictScrapeError, PaginationError } from './errors.js';
import type { Category, CategoryFetch, District, PerCategoryOutcomes } from './types.js';

const LOG_PREFIX = '[category-selector]';

export interface CategoryFetcher {
    fetchAll(district: District, category: Category): Promise<CategoryFetch>;
}

export interface CategorySelection {
    chosen: Category;
    result: CategoryFetch;
    perCategory: PerCategoryOutcomes;
}

export interface CategorySelector {
    selectCategory(district: District, candidates: Category[]): Promise<CategorySelection>;
}

/**
 * Fetches every candidate category in full and keeps the one with the most listings.
 * The winning fetch doubles as the district's data. Ties go to the earlier candidate.
 */
export const createCategorySelector = (fetcher: CategoryFetcher): CategorySelector => ({
    async selectCategory(district, candidates) {
        if (candidates.length === 0) {
            throw new DistrictScrapeError(`No candidate categories configured for ${district.name}`, district);
        }
        if (candidates.length === 1) {
            log.info(`${LOG_PREFIX} Using the only configured category ${candidates[0]} (${district.name})`);
        }

        const perCategory: PerCategoryOutcomes = {};
        const failures: PaginationError[] = [];
        let best: { category: Category; result: CategoryFetch } | null = null;

        for (const category of candidates) {
            let result: CategoryFetch;
            try {
                result = await fetcher.fetchAll(district, category);
            } catch (error) {
                if (!(error instanceof PaginationError)) throw error;
                log.warning(`${LOG_PREFIX} Category ${category} failed for ${district.name}`, { error: error.message });
                perCategory[category] = { failed: true, error: error.message };
                failures.push(error);
                continue;
            }

            const { listings, stats } = result;
            perCategory[category] = {
                failed: false,
                count: listings.length,
                totalCount: stats.totalCount,
                pages: stats.pages,
            };
            if (best === null || listings.length > best.result.listings.length) {
                best = { category, result };
            }
        }

        if (best === null) {
            throw new DistrictScrapeError(
                `All ${candidates.length} categories failed for ${district.name}`,
                district,
                new AggregateError(failures, 'Every candidate category fetch failed'),
            );
        }

        log.info(`${LOG_PREFIX} Using ${best.category} (${best.result.listings.length} listings) for ${district.name}`, {
            perCategory,
        });

        return { chosen: best.category, result: best.result, perCategory };
    },
});
