import { loadConfig } from '../server/config.js';
import { createServices } from '../server/services.js';
import { createStorage } from '../server/storage/index.js';
import { loadChallengeSeeds } from '../src/data/challengeDefinitions.js';

async function seedChallenges() {
  const config = loadConfig();
  const { storage, close } = await createStorage(config);

  try {
    const seeds = loadChallengeSeeds();
    const { catalog } = createServices(storage, config);
    const result = await catalog.seedDefinitions(seeds);
    console.log(`✅ Seeded challenge catalog: ${result.created} created, ${result.skipped} already present`);
  } finally {
    await close();
  }
}

seedChallenges().catch((error: unknown) => {
  console.error('❌ Error seeding challenges:', error);
  process.exit(1);
});
