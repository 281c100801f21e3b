/**
 * Interim and usage messages
 *
 * The "working on it" placeholder posted while the backend query runs, and
 * the hint sent for a bare mention.
 *
 * Config-driven via config/acknowledgments.json
 */

import * as fs from 'fs';
import * as path from 'path';

interface AckConfig {
  placeholders: string[];
  usageHint: string;
}

let configCache: AckConfig | null = null;

function isAckConfig(value: unknown): value is AckConfig {
  if (typeof value !== 'object' || value === null) return false;
  if (!('placeholders' in value) || !('usageHint' in value)) return false;
  const { placeholders, usageHint } = value;
  return Array.isArray(placeholders) &&
    placeholders.length > 0 &&
    placeholders.every((p) => typeof p === 'string') &&
    typeof usageHint === 'string';
}

function getAckConfig(): AckConfig {
  if (configCache) return configCache;

  const configPath = path.join(process.cwd(), 'config', 'acknowledgments.json');
  const parsed: unknown = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  if (!isAckConfig(parsed)) {
    throw new Error(`[Acknowledgments] Invalid config at ${configPath}`);
  }
  configCache = parsed;
  return configCache;
}

function pickRandom<T>(arr: T[]): T {
  return arr[Math.floor(Math.random() * arr.length)];
}

export function getPlaceholderMessage(): string {
  return pickRandom(getAckConfig().placeholders);
}

export function getUsageHint(): string {
  return getAckConfig().usageHint;
}
