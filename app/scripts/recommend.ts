/**
 * Recommend runner — loads data/catalog.json, asks the model which products
 * suit a free-text interest, and prints the ranked products.
 *
 * Prerequisites:
 *   .env set:  OPENAI_API_KEY (optionally OPENAI_BASE_URL, RECOMMENDER_MODEL)
 *
 * Usage:  npm run recommend -- "I like photographing landscapes when I travel"
 *         npm run recommend -- --check
 */
import 'dotenv/config';
import { loadCatalog, toCandidates, toProductDisplays } from '../lib/catalog';
import { loadEngineOptions } from '../lib/engine/config';
import { InMemoryResultCache } from '../lib/engine/cache';
import { describeFailure, isRecommendationError } from '../lib/engine/errors';
import { createConsoleEventSink } from '../lib/engine/events';
import { Recommender } from '../lib/engine/orchestrator';
import { createOpenAIModelClient } from '../lib/providers/ai-sdk';

async function main() {
  const args = process.argv.slice(2);
  const modelClient = createOpenAIModelClient();

  if (args[0] === '--check') {
    await modelClient.ping();
    console.log('✓ Model connection OK');
    return;
  }

  const interest = args.join(' ').trim();
  if (!interest) {
    console.error('Usage: tsx app/scripts/recommend.ts "<what you are interested in>"');
    process.exitCode = 1;
    return;
  }

  const catalog = loadCatalog();
  const candidates = toCandidates(catalog);
  const { options, cacheMaxEntries } = loadEngineOptions();

  const recommender = new Recommender({
    modelClient,
    cache: new InMemoryResultCache({ maxEntries: cacheMaxEntries }),
    events: createConsoleEventSink({ verbose: process.env.RECOMMENDER_VERBOSE === '1' }),
    options,
  });

  console.log(`Ranking ${candidates.length} products for: "${interest}"\n`);

  try {
    const list = await recommender.recommend({ id: 'cli', attributes: { interest } }, candidates, {
      maxResults: 5,
    });

    for (const item of toProductDisplays(list, catalog)) {
      const confidence = Math.round(item.confidence * 100);
      console.log(`${item.rank}. ${item.product} — ${item.category}`);
      console.log(`   Price: ${item.price.toLocaleString('en-US')} · Match: ${confidence}%`);
      console.log(`   ${item.reason}\n`);
    }
  } catch (err: unknown) {
    if (!isRecommendationError(err)) throw err;
    const { message } = describeFailure(err.kind);
    console.error(`✗ ${message}`);
    console.error(`  (${err.kind}: ${err.message})`);
    process.exitCode = 1;
  }
}

main().catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  console.error('Recommend failed:', message);
  process.exitCode = 1;
});
