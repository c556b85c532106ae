import { fileURLToPath } from 'url';
import { parse as parseYaml } from 'yaml';
import type { z } from 'zod';
import { getLogger } from '../core/logger.js';
import { readFileSafe } from './fs.js';

/**
 * Absolute path of a file in the package's data/ directory. Resolves the same
 * from src/ and from the compiled dist/.
 */
export function dataPath(name: string): string {
  return fileURLToPath(new URL(`../../data/${name}`, import.meta.url));
}

/**
 * Read a YAML table and validate it. Returns null when the file is missing,
 * unparsable or does not match the schema; the reason is logged.
 */
export function loadYamlTable<T>(filePath: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T | null {
  const logger = getLogger();
  const content = readFileSafe(filePath);
  if (content === null) {
    logger.debug({ file: filePath }, 'Data file not found');
    return null;
  }

  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (err) {
    logger.warn({ file: filePath, err }, 'Data file is not valid YAML');
    return null;
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    logger.warn({ file: filePath, issues: parsed.error.issues }, 'Data file has an unexpected shape');
    return null;
  }
  return parsed.data;
}
