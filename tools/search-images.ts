import { createConsoleLogger, parseLogLevel } from '@libs/http-client-core';
import { PageTrigger } from '@libs/paged-search';
import { createPixabayClientFromEnv, createPixabayImageSearch } from '@libs/pixabay-client';

async function main() {
  const [query, pagesArg] = process.argv.slice(2);
  if (!query) {
    throw new Error('Usage: npm run search -- <query> [pages]');
  }
  const maxPages = pagesArg ? Number.parseInt(pagesArg, 10) : 3;
  if (!Number.isInteger(maxPages) || maxPages < 1) {
    throw new Error(`pages must be a positive integer, got "${pagesArg}"`);
  }

  const logger = createConsoleLogger(parseLogLevel(process.env.LOG_LEVEL) ?? 'info');
  const search = createPixabayImageSearch(createPixabayClientFromEnv({ logger }), { logger });
  const trigger = new PageTrigger();

  let pages = 0;
  for await (const response of search.search(query, trigger)) {
    pages += 1;
    const latest = response.images[response.images.length - 1];
    console.log(
      `page ${pages}: ${response.images.length}/${response.totalAvailable} images` +
        (latest ? ` (last: #${latest.id} ${latest.imageWidth}x${latest.imageHeight} ${latest.previewUrl})` : ''),
    );

    if (pages < maxPages) {
      trigger.fire();
    } else {
      trigger.close();
    }
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
