import type { ListingFilters, RawListing } from './types.js';
import { readNumber } from './utils.js';

export const hasActiveFilters = ({ minRooms, maxRooms, maxPrice }: ListingFilters): boolean =>
    minRooms !== null || maxRooms !== null || maxPrice !== null;

// A listing without the field a set bound looks at cannot satisfy it.
const matches = (listing: RawListing, { minRooms, maxRooms, maxPrice }: ListingFilters): boolean => {
    const rooms = readNumber(listing.rooms);
    const price = readNumber(listing.price);

    if (minRooms !== null && (rooms === null || rooms < minRooms)) return false;
    if (maxRooms !== null && (rooms === null || rooms > maxRooms)) return false;
    if (maxPrice !== null && (price === null || price > maxPrice)) return false;
    return true;
};

export const filterListings = (
    listings: RawListing[],
    filters: ListingFilters,
): { kept: RawListing[]; filteredOut: number } => {
    if (!hasActiveFilters(filters)) return { kept: listings, filteredOut: 0 };

    const kept = listings.filter((listing) => matches(listing, filters));
    return { kept, filteredOut: listings.length - kept.length };
};
