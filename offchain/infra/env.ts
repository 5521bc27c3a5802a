import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import dotenvExpand from 'dotenv-expand';

// Load .env from project root (../.. from this file) or its parent as fallback
const ROOT = path.resolve(__dirname, '..', '..');
const CANDIDATES = [
  path.join(ROOT, '.env'),
  path.resolve(ROOT, '..', '.env'),
];

for (const p of CANDIDATES) {
  if (fs.existsSync(p)) {
    // variables already exported by the process manager win over the file
    const result = dotenv.config({ path: p });
    dotenvExpand.expand(result);
    break;
  }
}
