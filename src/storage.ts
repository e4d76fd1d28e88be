import { Actor } from 'apify';

import type { District, ResultDocument } from './types.js';

export interface DocumentSink {
    save(key: string, document: ResultDocument): Promise<void>;
}

const KEY_UNSAFE_CHARS = /[^a-zA-Z0-9!\-_.'()]+/g;

/**
 * Key-value store record key for one district's document of one run day.
 * Characters a store key may not hold are collapsed to dashes; a name with none left is dropped.
 */
export const buildDocumentKey = (runDate: string, district: District): string => {
    const safeName = district.name.replace(KEY_UNSAFE_CHARS, '-').replace(/^-+|-+$/g, '');
    return [runDate, String(district.id), safeName].filter((part) => part !== '').join('_');
};

export interface DocumentRecordStore {
    setValue(key: string, value: ResultDocument): Promise<void>;
}

export type RowWriter = (rows: Record<string, unknown>[]) => Promise<void>;

/**
 * The record is written last, after the dataset rows, so a district whose rows could not be pushed
 * leaves no document behind.
 */
export const createDocumentSink = (store: DocumentRecordStore, pushRows: RowWriter): DocumentSink => ({
    async save(key, document) {
        if (document.listings.length > 0) {
            const { district, chosenCategory } = document.metadata;
            await pushRows(
                document.listings.map((listing) => ({
                    districtId: district.id,
                    districtName: district.name,
                    category: chosenCategory,
                    ...listing,
                })),
            );
        }

        await store.setValue(key, document);
    },
});

/** Documents go to the key-value store; their listings also land in the dataset, one row each, for tabular export. */
export const openDocumentStore = async (storeName: string | null): Promise<DocumentSink> => {
    const store = await Actor.openKeyValueStore(storeName ?? undefined);

    return createDocumentSink(store, async (rows) => {
        await Actor.pushData(rows);
    });
};
