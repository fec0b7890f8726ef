/**
 * New-version notice. Never upgrades anything and never fails the run.
 */

import { z } from 'zod';
import { toError } from '../errors/index.js';

const LatestReleaseSchema = z.object({
  version: z.string().regex(/^\d+\.\d+\.\d+/),
});

const CHECK_TIMEOUT_MS = 5000;

/**
 * Compare the numeric major.minor.patch of two versions; pre-release tags are ignored
 */
export function compareVersions(a: string, b: string): number {
  const parse = (version: string) =>
    version
      .replace(/^v/, '')
      .split(/[-+]/)[0]
      .split('.')
      .map(part => parseInt(part, 10) || 0);

  const left = parse(a);
  const right = parse(b);

  for (let i = 0; i < 3; i++) {
    const diff = (left[i] ?? 0) - (right[i] ?? 0);
    if (diff !== 0) return Math.sign(diff);
  }
  return 0;
}

/**
 * Ask the release endpoint for the latest version.
 * Returns the newer version, or null when up to date or the check failed.
 */
export async function checkForUpdate(
  currentVersion: string,
  url: string,
  fetchImpl: typeof fetch = fetch
): Promise<string | null> {
  try {
    const response = await fetchImpl(url, { signal: AbortSignal.timeout(CHECK_TIMEOUT_MS) });

    if (!response.ok) {
      console.warn(`Update check failed: ${response.status} ${response.statusText}`);
      return null;
    }

    const latest = LatestReleaseSchema.safeParse(await response.json());
    if (!latest.success) {
      console.warn('Update check returned an unexpected payload');
      return null;
    }

    if (compareVersions(latest.data.version, currentVersion) > 0) {
      console.log(
        `A newer version is available: ${currentVersion} -> ${latest.data.version}`
      );
      return latest.data.version;
    }
    return null;
  } catch (error) {
    console.warn(`Update check failed: ${toError(error).message}`);
    return null;
  }
}
