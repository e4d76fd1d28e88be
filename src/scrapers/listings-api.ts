import { log } from 'apify';
import { z } from 'zod';

import { CATEGORY_FAMILY_FILTER, LISTING_CATEGORY_ID } from '../constants.js';
import { FetchError } from '../errors.js';
import { gotTransport, type HttpResponse, type HttpTransport } from '../http.js';
import type { RateLimiter } from '../rate-limiter.js';
import type { Category, District, Page, PageSource } from '../types.js';
import { describeError, toUnixSeconds } from '../utils.js';

const LOG_PREFIX = '[listings-api]';

// Only the fields the result document and the filters rely on, plus the ones exporters show.
const FIND_LISTINGS_QUERY = `query findListings($size: Int, $from: Int, $sort: SortInput, $where: WhereInput) {
  Web {
    find(size: $size, from: $from, sort: $sort, where: $where) {
      total
      listings {
        id
        title
        price
        rooms
        beds
        wc
        livings
        area
        age
        fl
        furnished
        ac
        lift
        family
        rent_period
        address
        district
        direction
        city
        location {
          lat
          lng
        }
        create_time
        published_at
        last_update
        path
        uri
        district_id
        direction_id
        city_id
      }
    }
  }
}`;

const envelopeSchema = z.object({
    data: z
        .object({
            Web: z.object({
                find: z.object({
                    total: z.number().int().nonnegative(),
                    listings: z.array(z.record(z.unknown())),
                }),
            }),
        })
        .nullish(),
    errors: z.array(z.object({ message: z.string() })).optional(),
});

export interface ListingsApiOptions {
    apiUrl: string;
    cityId: number;
    afterDate: string | null;
    requestTimeoutMs: number;
    rateLimiter: RateLimiter;
    transport?: HttpTransport;
}

export interface FindListingsPayload {
    operationName: 'findListings';
    query: string;
    variables: {
        size: number;
        from: number;
        sort: Record<string, 'asc' | 'desc'>;
        where: Record<string, { eq: number } | { gte: number }>;
    };
}

export const buildFindListingsPayload = (
    district: District,
    category: Category,
    offset: number,
    pageSize: number,
    { cityId, afterDate }: Pick<ListingsApiOptions, 'cityId' | 'afterDate'>,
): FindListingsPayload => {
    const where: FindListingsPayload['variables']['where'] = {
        category: { eq: LISTING_CATEGORY_ID },
        city_id: { eq: cityId },
        direction_id: { eq: district.directionId },
        district_id: { eq: district.id },
        family: { eq: CATEGORY_FAMILY_FILTER[category] },
    };
    if (afterDate !== null) {
        where.create_time = { gte: toUnixSeconds(afterDate) };
    }

    return {
        operationName: 'findListings',
        query: FIND_LISTINGS_QUERY,
        variables: {
            size: pageSize,
            from: offset,
            sort: { create_time: 'desc', has_img: 'desc' },
            where,
        },
    };
};

/** Decodes a `findListings` response body into the page records and the API's reported total. */
export const decodeListingsPage = (body: string, statusCode: number): Page => {
    let json: unknown;
    try {
        json = JSON.parse(body);
    } catch (error) {
        throw new FetchError('Response body is not valid JSON', { statusCode, cause: error });
    }

    const parsed = envelopeSchema.safeParse(json);
    if (!parsed.success) {
        throw new FetchError(`Unexpected response shape: ${parsed.error.issues[0]?.message ?? 'unknown'}`, {
            statusCode,
            cause: parsed.error,
        });
    }

    const { data, errors } = parsed.data;
    if (errors && errors.length > 0) {
        throw new FetchError(`GraphQL error: ${errors.map((e) => e.message).join('; ')}`, { statusCode });
    }
    if (!data) {
        throw new FetchError('Response carries no data', { statusCode });
    }

    return { records: data.Web.find.listings, totalCount: data.Web.find.total };
};

export class PageFetcher implements PageSource {
    private readonly transport: HttpTransport;

    constructor(private readonly options: ListingsApiOptions) {
        this.transport = options.transport ?? gotTransport;
    }

    async fetchPage(district: District, category: Category, offset: number, pageSize: number): Promise<Page> {
        if (!Number.isInteger(offset) || offset < 0) {
            throw new RangeError(`Offset must be a non-negative integer, got ${offset}`);
        }

        await this.options.rateLimiter.wait();

        log.debug(`${LOG_PREFIX} Requesting offset ${offset} (${district.name}/${category})`);

        let response: HttpResponse;
        try {
            response = await this.transport({
                url: this.options.apiUrl,
                method: 'POST',
                json: buildFindListingsPayload(district, category, offset, pageSize, this.options),
                timeoutMs: this.options.requestTimeoutMs,
            });
        } catch (error) {
            throw new FetchError(`Request failed: ${describeError(error)}`, { cause: error });
        }

        const { statusCode, body } = response;
        if (statusCode < 200 || statusCode >= 300) {
            throw new FetchError(`HTTP ${statusCode}: ${body.slice(0, 200)}`, { statusCode });
        }

        return decodeListingsPage(body, statusCode);
    }
}
