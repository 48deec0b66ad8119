import dotenv from 'dotenv';
import { loadConfig } from '../config/env.js';
import { getErrorMessage } from '../core/errors.js';
import { fileExists } from '../core/sentinels.js';

dotenv.config();

function main(): number {
  const config = loadConfig();

  console.log(`\n--- Cache sentinels in ${config.dataDir} ---`);
  let missing = 0;
  for (const sentinel of config.sentinels) {
    const present = fileExists(sentinel);
    if (!present) missing++;
    console.log(`${present ? 'present' : 'missing'}  ${sentinel}`);
  }

  if (missing > 0) {
    console.log(`\n${missing} sentinel(s) missing: ingestion will run on next boot.`);
    return 1;
  }
  console.log('\nCache ready: ingestion will be skipped on next boot.');
  return 0;
}

try {
  process.exit(main());
} catch (error) {
  console.error(`Cache check failed: ${getErrorMessage(error)}`);
  process.exit(1);
}
