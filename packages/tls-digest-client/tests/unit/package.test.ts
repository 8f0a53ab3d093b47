/**
 * Packaging tests: the published `tls-digest` binary is the tsup CLI build,
 * which starts with a shebang.
 */
import { describe, it, expect } from 'vitest';
import { readFileSync } from 'node:fs';
import config from '../../tsup.config.js';

describe('AQ: CLI packaging', () => {
  it('AQ-PKG-001: bin points at the tsup output and build runs tsup', () => {
    const pkg: unknown = JSON.parse(readFileSync(new URL('../../package.json', import.meta.url), 'utf8'));
    expect(pkg).toMatchObject({
      bin: { 'tls-digest': './dist/cli.js' },
      scripts: { build: 'tsup' },
    });
  });

  it('AQ-PKG-002: the CLI entry is built with a node shebang', () => {
    expect(config).toEqual(expect.arrayContaining([
      expect.objectContaining({
        entry: ['src/cli.ts'],
        format: ['esm'],
        banner: { js: '#!/usr/bin/env node' },
      }),
    ]));
  });
});
