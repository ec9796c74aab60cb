import dotenv from 'dotenv';
import path from 'path';
import fs from 'fs';

const candidates = [
  path.resolve(__dirname, '..', '.env'),             // apps/backend/.env
  path.resolve(__dirname, '..', '..', '..', '.env'), // repo root .env
];

export let envLoadedFrom: string | null = null;

for (const p of candidates) {
  if (fs.existsSync(p)) {
    dotenv.config({ path: p });
    envLoadedFrom = p;
    break;
  }
}
