// Prints the most popular photos of the month. Reads LOMOGRAPHY_API_KEY from the environment (or .env).
// Usage: tsx scripts/popular-photos.ts [amt] [index]
import { AsyncLomography } from '../src/index.js';
import logger from '../src/plugins/logger.js';

async function main() {
  const amt = Number(process.argv[2] ?? 20);
  const index = Number(process.argv[3] ?? 0);

  const lomo = await AsyncLomography.create({ verify: true });
  try {
    const photos = await lomo.fetchPopularPhotos(amt, index);
    for (const [i, photo] of photos.entries()) {
      logger.info(`${index + i}. ${photo.title ?? '(untitled)'} by ${photo.user.username} ${photo.url}`);
    }
  } finally {
    lomo.close();
  }
}

main().catch((err) => {
  logger.error(err);
  process.exit(1);
});
