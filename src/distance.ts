import { log } from 'apify';
import { z } from 'zod';

import { GOOGLE_DISTANCE_MATRIX_URL } from './constants.js';
import { gotTransport, type HttpTransport } from './http.js';
import type { RateLimiter } from './rate-limiter.js';
import type { Coordinates, DistanceProviderName, DistanceResult, UnavailableReason } from './types.js';
import { describeError } from './utils.js';

const LOG_PREFIX = '[distance]';
const EARTH_RADIUS_M = 6_371_000;

export interface DistanceAnnotator {
    readonly provider: DistanceProviderName;
    /** Resolves with an unavailable marker instead of rejecting when no distance can be had. */
    distanceFrom(referencePoint: Coordinates, coordinates: Coordinates | null): Promise<DistanceResult>;
}

export const unavailable = (reason: UnavailableReason): DistanceResult => ({ status: 'UNAVAILABLE', reason });

const roundKm = (meters: number): number => Math.round(meters / 10) / 100;

/** Great-circle distance in meters. */
export const haversineMeters = (from: Coordinates, to: Coordinates): number => {
    const toRad = (deg: number) => (deg * Math.PI) / 180;
    const dLat = toRad(to.lat - from.lat);
    const dLng = toRad(to.lng - from.lng);

    const a = Math.sin(dLat / 2) ** 2 + Math.cos(toRad(from.lat)) * Math.cos(toRad(to.lat)) * Math.sin(dLng / 2) ** 2;

    return EARTH_RADIUS_M * 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));
};

export class HaversineDistanceAnnotator implements DistanceAnnotator {
    readonly provider = 'haversine';

    async distanceFrom(referencePoint: Coordinates, coordinates: Coordinates | null): Promise<DistanceResult> {
        if (!coordinates) return unavailable('NO_COORDINATES');

        const distanceMeters = Math.round(haversineMeters(referencePoint, coordinates));
        return {
            status: 'OK',
            distanceMeters,
            distanceKm: roundKm(distanceMeters),
            durationSeconds: null,
            durationText: null,
        };
    }
}

const matrixSchema = z.object({
    status: z.string(),
    error_message: z.string().optional(),
    rows: z
        .array(
            z.object({
                elements: z.array(
                    z.object({
                        status: z.string(),
                        distance: z.object({ value: z.number(), text: z.string() }).optional(),
                        duration: z.object({ value: z.number(), text: z.string() }).optional(),
                    }),
                ),
            }),
        )
        .default([]),
});

export interface GoogleDistanceOptions {
    apiKey: string;
    rateLimiter: RateLimiter;
    requestTimeoutMs: number;
    transport?: HttpTransport;
}

/**
 * Driving distance from the Google Distance Matrix API, one origin/destination pair per request.
 *
 * The API accepts up to 25 destinations per call and bills per element, but each call here covers a
 * single listing. A district of N listings therefore costs N requests instead of `ceil(N / 25)`, and
 * `distanceRateLimitSeconds` applies to every one of them. Batching would need a many-destination
 * lookup on `DistanceAnnotator`.
 */
export class GoogleDistanceAnnotator implements DistanceAnnotator {
    readonly provider = 'google';
    private readonly transport: HttpTransport;

    constructor(private readonly options: GoogleDistanceOptions) {
        this.transport = options.transport ?? gotTransport;
    }

    async distanceFrom(referencePoint: Coordinates, coordinates: Coordinates | null): Promise<DistanceResult> {
        if (!coordinates) return unavailable('NO_COORDINATES');

        await this.options.rateLimiter.wait();

        try {
            const { statusCode, body } = await this.transport({
                url: GOOGLE_DISTANCE_MATRIX_URL,
                method: 'GET',
                searchParams: {
                    origins: `${referencePoint.lat},${referencePoint.lng}`,
                    destinations: `${coordinates.lat},${coordinates.lng}`,
                    mode: 'driving',
                    units: 'metric',
                    key: this.options.apiKey,
                },
                timeoutMs: this.options.requestTimeoutMs,
            });
            if (statusCode !== 200) {
                log.warning(`${LOG_PREFIX} Distance Matrix request failed with HTTP ${statusCode}`);
                return unavailable('PROVIDER_ERROR');
            }

            const data = matrixSchema.parse(JSON.parse(body));
            if (data.status !== 'OK') {
                log.warning(`${LOG_PREFIX} Distance Matrix returned ${data.status}`, { message: data.error_message });
                return unavailable('PROVIDER_ERROR');
            }

            const element = data.rows[0]?.elements[0];
            if (!element || element.status !== 'OK' || !element.distance) return unavailable('NO_ROUTE');

            return {
                status: 'OK',
                distanceMeters: element.distance.value,
                distanceKm: roundKm(element.distance.value),
                durationSeconds: element.duration?.value ?? null,
                durationText: element.duration?.text ?? null,
            };
        } catch (error) {
            log.warning(`${LOG_PREFIX} Distance lookup failed`, { error: describeError(error) });
            return unavailable('PROVIDER_ERROR');
        }
    }
}
