/**
 * Reading changelog config files from disk.
 */

import * as fs from 'fs';
import { ConfigError } from '../errors';
import { parseConfig } from './schema';
import type { ChangelogConfig } from './schema';

/**
 * Reads, parses and validates a JSON config file.
 * @throws ConfigError if the file is unreadable, not JSON, or invalid.
 */
export function loadConfigFile(filePath: string): ChangelogConfig {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Cannot read config file ${filePath}: ${msg}`);
  }

  let value: unknown;
  try {
    value = JSON.parse(content);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Syntax error in config file ${filePath}: ${msg}`);
  }

  return parseConfig(value, filePath);
}
