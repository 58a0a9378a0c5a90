import dotenv from 'dotenv';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { existsSync } from 'node:fs';

const __dirname = dirname(fileURLToPath(import.meta.url));

// Walk up until the package root (package.json next to .env.example); falls back to cwd
function findProjectRoot(startPath: string): string {
  let currentPath = startPath;
  while (currentPath !== dirname(currentPath)) {
    if (existsSync(join(currentPath, 'package.json')) &&
        existsSync(join(currentPath, '.env.example'))) {
      return currentPath;
    }
    currentPath = dirname(currentPath);
  }
  return process.cwd();
}

// Load environment exactly once for any module that imports config
const projectRoot = findProjectRoot(__dirname);
dotenv.config({ path: join(projectRoot, '.env') });

export const LOG_LEVEL = process.env.LOG_LEVEL || 'info';
export const LOG_FILE = process.env.LOG_FILE;
export const SERVICE_NAME = 'llm-bridge';
export const SERVICE_VERSION = process.env.npm_package_version || 'dev';
