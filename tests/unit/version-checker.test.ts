/**
 * Unit tests for the Node.js version guard
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { requireSupportedNode } from '../../src/version-checker';
import { OutputFormatter } from '../../src/output-formatter';

describe('requireSupportedNode', () => {
  let originalVersion: string;
  let errored: string[];

  const setVersion = (value: string): void => {
    Object.defineProperty(process, 'version', { value, writable: true, configurable: true });
  };

  beforeEach(() => {
    originalVersion = process.version;
    errored = [];
    vi.spyOn(console, 'error').mockImplementation((...args: unknown[]) => {
      errored.push(args.map(String).join(' '));
    });
  });

  afterEach(() => {
    setVersion(originalVersion);
    vi.restoreAllMocks();
  });

  it('should let a supported version through silently', () => {
    setVersion('v20.11.1');

    expect(requireSupportedNode()).toBe(true);
    expect(errored).toEqual([]);
  });

  it('should report an old version through the formatter', () => {
    setVersion('v18.19.1');
    const formatter = new OutputFormatter();
    const displayError = vi.spyOn(formatter, 'displayError');

    expect(requireSupportedNode(formatter)).toBe(false);
    expect(displayError).toHaveBeenCalledOnce();
    expect(errored).toEqual(['❌ Error: formcheck requires Node.js 20.0.0 or higher. Current version: 18.19.1']);
  });
});
