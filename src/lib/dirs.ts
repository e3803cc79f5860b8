// src/lib/dirs.ts
import { existsSync } from 'fs';
import path from 'path';
import os from 'os';

// Inside the container image the data volume is mounted at /app/data.
const isContainer = existsSync('/.dockerenv') || (process.env.NODE_ENV === 'production' && existsSync('/app'));
export const DATA_DIR = process.env.DATA_DIR || (isContainer ? '/app/data' : path.join(os.homedir(), '.unitdeck'));
export const CONFIG_PATH = path.join(DATA_DIR, 'config.json');
export const DEFAULT_DATABASE_PATH = path.join(DATA_DIR, 'registry.db');
