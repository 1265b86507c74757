/**
 * Version Checker - Validates Node.js version requirements
 */

import { OutputFormatter } from './output-formatter';

export const MIN_NODE_VERSION = '20.0.0';

export interface VersionCheckResult {
  isCompatible: boolean;
  currentVersion: string;
  requiredVersion: string;
  errorMessage?: string;
}

/**
 * Check if the current Node.js version meets the minimum requirement
 * @param minVersion - Minimum required version (e.g., "20.0.0")
 * @returns Version check result
 */
export function checkNodeVersion(minVersion: string = MIN_NODE_VERSION): VersionCheckResult {
  const currentVersion = process.version.replace(/^v/, '');
  const requiredVersion = minVersion;

  const isCompatible = compareVersions(currentVersion, requiredVersion) >= 0;

  if (!isCompatible) {
    return {
      isCompatible: false,
      currentVersion,
      requiredVersion,
      errorMessage: `formcheck requires Node.js ${requiredVersion} or higher. Current version: ${currentVersion}`
    };
  }

  return {
    isCompatible: true,
    currentVersion,
    requiredVersion
  };
}

/**
 * Compare two dotted version strings; missing parts count as 0.
 * Pre-release and build suffixes ("20.1.0-rc.1") are ignored.
 * @returns -1 if version1 < version2, 0 if equal, 1 if version1 > version2
 */
export function compareVersions(version1: string, version2: string): number {
  const parts1 = versionParts(version1);
  const parts2 = versionParts(version2);

  for (let i = 0; i < Math.max(parts1.length, parts2.length); i++) {
    const part1 = parts1[i] || 0;
    const part2 = parts2[i] || 0;

    if (part1 < part2) return -1;
    if (part1 > part2) return 1;
  }

  return 0;
}

function versionParts(version: string): number[] {
  return version
    .split(/[-+]/)[0]
    .split('.')
    .map((part) => Number.parseInt(part, 10));
}

/**
 * Report an unsupported Node.js through the formatter.
 * @returns false when the CLI should stop with exit code 1
 */
export function requireSupportedNode(formatter: OutputFormatter = new OutputFormatter()): boolean {
  const result = checkNodeVersion();

  if (result.errorMessage !== undefined) {
    formatter.displayError(result.errorMessage);
    return false;
  }

  return true;
}
