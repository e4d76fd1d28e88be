import { log } from 'apify';

import { createResultAssembler, type ResultAssembler } from './assembler.js';
import { type CategorySelector, createCategorySelector } from './category-selector.js';
import { type DistanceAnnotator, GoogleDistanceAnnotator, HaversineDistanceAnnotator } from './distance.js';
import { DistrictScrapeError } from './errors.js';
import type { HttpTransport } from './http.js';
import { Paginator } from './paginator.js';
import { RateLimiter } from './rate-limiter.js';
import { PageFetcher } from './scrapers/listings-api.js';
import { buildDocumentKey, type DocumentSink } from './storage.js';
import type { Category, District, Input, RunSummary } from './types.js';
import { describeError, formatRunDate, normalizeCategories } from './utils.js';

const LOG_PREFIX = '[run]';

export interface RunOrchestratorDeps {
    selector: CategorySelector;
    assembler: ResultAssembler;
    sink: DocumentSink;
    candidateCategories: Category[];
    clock?: () => Date;
}

/** Processes districts strictly one after another; a failed district is recorded and the run moves on. */
export class RunOrchestrator {
    private readonly clock: () => Date;

    constructor(private readonly deps: RunOrchestratorDeps) {
        this.clock = deps.clock ?? (() => new Date());
    }

    async run(districts: District[]): Promise<RunSummary> {
        const runDate = formatRunDate(this.clock());
        const summary: RunSummary = { runDate, succeeded: [], failed: [] };

        for (const [index, district] of districts.entries()) {
            log.info(`${LOG_PREFIX} District ${index + 1}/${districts.length}: ${district.name} (id ${district.id})`);

            try {
                summary.succeeded.push(await this.processDistrict(district, runDate));
            } catch (error) {
                const failure =
                    error instanceof DistrictScrapeError
                        ? error
                        : new DistrictScrapeError(`Unexpected failure: ${describeError(error)}`, district, error);
                log.error(`${LOG_PREFIX} District ${district.name} failed`, { error: failure.message });
                summary.failed.push({ id: district.id, name: district.name, error: failure.message });
            }
        }

        log.info(`${LOG_PREFIX} Run summary`, {
            runDate,
            succeeded: summary.succeeded.length,
            failed: summary.failed.length,
        });

        return summary;
    }

    private async processDistrict(district: District, runDate: string): Promise<RunSummary['succeeded'][number]> {
        const { selector, assembler, sink, candidateCategories } = this.deps;
        const { chosen, result, perCategory } = await selector.selectCategory(district, candidateCategories);
        const key = buildDocumentKey(runDate, district);

        try {
            const document = await assembler.assemble({
                district,
                chosenCategory: chosen,
                listings: result.listings,
                stats: result.stats,
                perCategory,
                timestamp: this.clock(),
            });
            await sink.save(key, document);

            log.info(`${LOG_PREFIX} Saved ${document.metadata.totalFetched} listings for ${district.name} to ${key}`);
            return { id: district.id, name: district.name, key, category: chosen, listings: document.metadata.totalFetched };
        } catch (error) {
            throw new DistrictScrapeError(
                `Assembling or saving the document failed: ${describeError(error)}`,
                district,
                error,
            );
        }
    }
}

export interface RunOrchestratorOverrides {
    transport?: HttpTransport;
    sleep?: (ms: number) => Promise<unknown>;
    clock?: () => Date;
}

const createAnnotator = (input: Input, overrides: RunOrchestratorOverrides): DistanceAnnotator => {
    if (input.distanceProvider === 'google' && input.googleApiKey) {
        return new GoogleDistanceAnnotator({
            apiKey: input.googleApiKey,
            rateLimiter: new RateLimiter({ intervalMs: input.distanceRateLimitSeconds * 1000, sleep: overrides.sleep }),
            requestTimeoutMs: input.requestTimeoutSecs * 1000,
            transport: overrides.transport,
        });
    }
    return new HaversineDistanceAnnotator();
};

/** Wires the whole pipeline from validated input. One rate limiter is shared by every listings API call. */
export const createRunOrchestrator = (
    input: Input,
    sink: DocumentSink,
    overrides: RunOrchestratorOverrides = {},
): RunOrchestrator => {
    const rateLimiter = new RateLimiter({ intervalMs: input.rateLimitSeconds * 1000, sleep: overrides.sleep });
    const pageFetcher = new PageFetcher({
        apiUrl: input.apiUrl,
        cityId: input.cityId,
        afterDate: input.afterDate,
        requestTimeoutMs: input.requestTimeoutSecs * 1000,
        rateLimiter,
        transport: overrides.transport,
    });
    const paginator = new Paginator(pageFetcher, {
        pageSize: input.pageSize,
        maxPageRetries: input.maxPageRetries,
        retryBackoffMs: input.retryBackoffMs,
        sleep: overrides.sleep,
    });

    return new RunOrchestrator({
        selector: createCategorySelector(paginator),
        assembler: createResultAssembler({
            annotator: createAnnotator(input, overrides),
            referencePoint: input.referencePoint,
            filters: { minRooms: input.minRooms, maxRooms: input.maxRooms, maxPrice: input.maxPrice },
            afterDate: input.afterDate,
            listingBaseUrl: input.listingBaseUrl,
        }),
        sink,
        candidateCategories: normalizeCategories(input.candidateCategories, LOG_PREFIX),
        clock: overrides.clock,
    });
};
