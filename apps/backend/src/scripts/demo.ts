import dotenv from 'dotenv';
import { loadConfig } from '@/config';
import { createLogger } from '@/lib/logger';
import { createBookAssistant } from '@/services/bookAssistant';
import type { BookRecord } from '@/types';

dotenv.config();

function formatRecommendation(book: BookRecord): string {
  return `- ${book.title ?? 'Unknown title'} by ${book.authors.join(', ')}`;
}

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel });
  const assistant = createBookAssistant(config, logger);

  const books = await assistant.searchBooks('artificial intelligence ethics');

  const analysis = await assistant.analyzeBooks(
    books,
    'What are the main ethical concerns discussed in these books regarding AI?'
  );

  const recommendations = await assistant.recommendSimilarBooks('Superintelligence by Nick Bostrom');

  console.log('Analysis:', analysis);
  console.log('\nRecommended Books:');
  for (const book of recommendations) {
    console.log(formatRecommendation(book));
  }
}

main().catch((error) => {
  console.error('Demo failed:', error);
  process.exit(1);
});
