/**
 * Package integrity tests: the public entry point and package.json agree.
 */

import { describe, it, expect } from 'vitest';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import * as structconf from '../src/index.js';

const pkg = JSON.parse(readFileSync(fileURLToPath(new URL('../package.json', import.meta.url)), 'utf-8'));

describe('package.json', () => {
  it('publishes dist only', () => {
    expect(pkg.files).toEqual(['dist']);
  });

  it('points its entry points at dist', () => {
    expect(pkg.main).toBe('./dist/index.js');
    expect(pkg.types).toBe('./dist/index.d.ts');
    expect(pkg.exports['.'].import).toBe('./dist/index.js');
  });

  it('has a VERSION constant matching its version', () => {
    expect(structconf.VERSION).toBe(pkg.version);
  });
});

describe('public API', () => {
  it('exports the core classes', () => {
    expect(typeof structconf.Configuration).toBe('function');
    expect(typeof structconf.Configurable).toBe('function');
    expect(typeof structconf.ConfigurationReader).toBe('function');
    expect(typeof structconf.ObjectWriter).toBe('function');
    expect(typeof structconf.Logger).toBe('function');
  });

  it('exports the operations', () => {
    for (const fn of [
      structconf.initialise,
      structconf.visit,
      structconf.readConfiguration,
      structconf.toYaml,
      structconf.fromYaml,
      structconf.ifNotAbsent,
      structconf.commonElementNames,
      structconf.classMatchesConfiguration,
    ]) {
      expect(typeof fn).toBe('function');
    }
  });

  it('exports every error code', () => {
    expect(Object.keys(structconf.ErrorCodes)).toHaveLength(15);
  });
});
