/**
 * Property-based tests for the Node.js version guard
 */

import { describe, test, expect } from 'vitest';
import * as fc from 'fast-check';
import { checkNodeVersion, compareVersions, MIN_NODE_VERSION } from '../../src/version-checker';

// Semantic version strings such as "20.11.3"
const versionGenerator = fc
  .tuple(fc.integer({ min: 0, max: 30 }), fc.integer({ min: 0, max: 50 }), fc.integer({ min: 0, max: 100 }))
  .map(([major, minor, patch]) => `${major}.${minor}.${patch}`);

describe('Node.js version requirement', () => {
  /**
   * For any running version, compatibility follows the major number
   * against the 20.0.0 floor, and only incompatible results carry a message.
   */
  test('compatibility is decided by the 20.0.0 floor', () => {
    fc.assert(
      fc.property(versionGenerator, (version) => {
        const originalVersion = process.version;
        Object.defineProperty(process, 'version', {
          value: `v${version}`,
          writable: true,
          configurable: true
        });

        try {
          const result = checkNodeVersion();
          const [major] = version.split('.').map(Number);

          expect(result.isCompatible).toBe(major >= 20);
          expect(result.currentVersion).toBe(version);
          expect(result.requiredVersion).toBe(MIN_NODE_VERSION);

          if (result.isCompatible) {
            expect(result.errorMessage).toBeUndefined();
          } else {
            expect(result.errorMessage).toBe(
              `formcheck requires Node.js 20.0.0 or higher. Current version: ${version}`
            );
          }
        } finally {
          Object.defineProperty(process, 'version', {
            value: originalVersion,
            writable: true,
            configurable: true
          });
        }
      }),
      { numRuns: 100 }
    );
  });

  test('version comparison is reflexive', () => {
    fc.assert(
      fc.property(versionGenerator, (version) => {
        expect(compareVersions(version, version)).toBe(0);
      }),
      { numRuns: 100 }
    );
  });

  test('version comparison is antisymmetric', () => {
    fc.assert(
      fc.property(versionGenerator, versionGenerator, (v1, v2) => {
        expect(Math.sign(compareVersions(v1, v2))).toBe(-Math.sign(compareVersions(v2, v1)) || 0);
      }),
      { numRuns: 100 }
    );
  });

  test('version comparison is transitive', () => {
    fc.assert(
      fc.property(versionGenerator, versionGenerator, versionGenerator, (v1, v2, v3) => {
        const cmp12 = compareVersions(v1, v2);
        const cmp23 = compareVersions(v2, v3);

        if (cmp12 < 0 && cmp23 < 0) {
          expect(compareVersions(v1, v3)).toBeLessThan(0);
        }
        if (cmp12 > 0 && cmp23 > 0) {
          expect(compareVersions(v1, v3)).toBeGreaterThan(0);
        }
      }),
      { numRuns: 100 }
    );
  });

  test('pre-release suffixes are ignored', () => {
    expect(compareVersions('20.1.0-rc.1', '20.1.0')).toBe(0);
    expect(compareVersions('20', '20.0.0')).toBe(0);
    expect(compareVersions('18.19.1', '20.0.0')).toBe(-1);
  });
});
