import { readFileSync } from 'fs';
import path from 'path';

export const FIXTURES_DIR = path.join(__dirname, '..', 'fixtures');

export function fixturePath(name: string): string {
  return path.join(FIXTURES_DIR, name);
}

export function readFixture(name: string): string {
  return readFileSync(fixturePath(name), 'utf-8');
}
