import { setTimeout } from 'node:timers/promises';

import { Actor, log } from 'apify';

import { parseInput } from './config.js';
import { RUN_SUMMARY_KEY } from './constants.js';
import { createRunOrchestrator } from './orchestrator.js';
import { openDocumentStore } from './storage.js';

await Actor.init();

Actor.on('aborting', async () => {
    // Temporary workaround until SDK implements proper state persistence in the aborting event:
    // https://github.com/apify/apify-sdk-js/pull/561
    await setTimeout(1000);
    await Actor.exit();
});

const input = parseInput(await Actor.getInput());

log.info('Starting district listings scraper', {
    districts: input.districts.map((d) => d.name),
    candidateCategories: input.candidateCategories,
    pageSize: input.pageSize,
    rateLimitSeconds: input.rateLimitSeconds,
    afterDate: input.afterDate,
    distanceProvider: input.distanceProvider,
    storeName: input.storeName,
});

const sink = await openDocumentStore(input.storeName);
const summary = await createRunOrchestrator(input, sink).run(input.districts);
await Actor.setValue(RUN_SUMMARY_KEY, summary);

if (summary.succeeded.length === 0) {
    await Actor.fail(`All ${summary.failed.length} districts failed.`);
} else {
    log.info(`Done. ${summary.succeeded.length} districts saved, ${summary.failed.length} failed.`);
    await Actor.exit();
}
