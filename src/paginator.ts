import { setTimeout } from 'node:timers/promises';

import { log } from 'apify';

import { FetchError, PaginationError } from './errors.js';
import type { Category, CategoryFetch, District, Page, PageSource, RawListing } from './types.js';

const LOG_PREFIX = '[paginator]';

export interface PaginatorOptions {
    pageSize: number;
    maxPageRetries: number;
    retryBackoffMs: number;
    sleep?: (ms: number) => Promise<unknown>;
}

/**
 * Walks the listings API page by page for one (district, category) query.
 *
 * Stops on a short page or once the collected count reaches the total the first page reported.
 * An empty page before that total also ends the walk: the API occasionally reports more records
 * than it serves, and looping on empty pages would never finish.
 */
export class Paginator {
    private readonly sleep: (ms: number) => Promise<unknown>;

    constructor(
        private readonly source: PageSource,
        private readonly options: PaginatorOptions,
    ) {
        this.sleep = options.sleep ?? (async (ms) => setTimeout(ms));
    }

    async fetchAll(district: District, category: Category): Promise<CategoryFetch> {
        const { pageSize } = this.options;
        const listings: RawListing[] = [];
        let offset = 0;
        let pages = 0;
        let totalCount = 0;

        for (;;) {
            const page = await this.fetchPageWithRetry(district, category, offset);
            pages += 1;

            if (pages === 1) {
                totalCount = page.totalCount;
                log.info(`${LOG_PREFIX} Total available: ${totalCount} (${district.name}/${category})`);
            }

            listings.push(...page.records);
            log.info(`${LOG_PREFIX} Fetched ${page.records.length} listings (offset ${offset})`);

            const reachedTotal = listings.length >= totalCount;
            if (page.records.length === 0 && !reachedTotal) {
                log.warning(
                    `${LOG_PREFIX} Empty page at offset ${offset} with ${listings.length}/${totalCount} fetched, stopping (${district.name}/${category})`,
                );
            }
            if (page.records.length < pageSize || reachedTotal) break;

            offset += pageSize;
        }

        log.info(`${LOG_PREFIX} Done. Fetched ${listings.length}/${totalCount} listings in ${pages} pages.`);

        return { listings, stats: { offset, totalCount, pages, fetched: listings.length } };
    }

    private async fetchPageWithRetry(district: District, category: Category, offset: number): Promise<Page> {
        const { pageSize, maxPageRetries, retryBackoffMs } = this.options;

        for (let attempt = 0; ; attempt++) {
            try {
                return await this.source.fetchPage(district, category, offset, pageSize);
            } catch (error) {
                if (!(error instanceof FetchError)) throw error;
                if (attempt >= maxPageRetries) throw new PaginationError(district, category, offset, error);

                const delayMs = retryBackoffMs * 2 ** attempt;
                log.warning(`${LOG_PREFIX} Attempt ${attempt + 1} at offset ${offset} failed, retrying in ${delayMs} ms`, {
                    error: error.message,
                });
                await this.sleep(delayMs);
            }
        }
    }
}
