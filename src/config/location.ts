import path from 'node:path';
import { fileURLToPath } from 'node:url';

/** The shipped `config/` directory, next to `src/` and `dist/`. */
export const CONFIG_DIR = path.resolve(fileURLToPath(new URL('../../config', import.meta.url)));

// must run before the `config` package is first loaded, which reads it once
process.env.NODE_CONFIG_DIR ??= CONFIG_DIR;
