import { readFileSync } from 'fs';
import { join, resolve } from 'path';

// Same depth from src/ (ts-jest) and dist/ (compiled), so one hop reaches the package root
export const PACKAGE_ROOT = resolve(__dirname, '..');
export const CONFIG_DIR = join(PACKAGE_ROOT, 'config');

export function readJsonFile(path: string): unknown {
  return JSON.parse(readFileSync(path, 'utf-8'));
}

export function readPackageVersion(): string {
  const packageJson = readJsonFile(join(PACKAGE_ROOT, 'package.json'));
  if (packageJson && typeof packageJson === 'object' && 'version' in packageJson && typeof packageJson.version === 'string') {
    return packageJson.version;
  }
  return '0.0.0';
}
