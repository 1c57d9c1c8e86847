import { readFileSync } from 'fs';

// src/ in development, dist/ once built; package.json sits one level up from both
const MANIFEST_URL = new URL('../package.json', import.meta.url);

function readVersion(): string {
  const manifest: unknown = JSON.parse(readFileSync(MANIFEST_URL, 'utf-8'));
  if (typeof manifest === 'object' && manifest !== null && 'version' in manifest && typeof manifest.version === 'string') {
    return manifest.version;
  }
  return '0.0.0';
}

export const VERSION: string = readVersion();
