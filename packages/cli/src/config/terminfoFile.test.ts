/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { ConfigurationError } from '@ttyinput/core';
import { loadTerminfoFile } from './terminfoFile.js';

describe('loadTerminfoFile', () => {
  let tempDir: string;

  function writeFile(contents: string): string {
    const filePath = path.join(tempDir, 'terminfo.json');
    fs.writeFileSync(filePath, contents);
    return filePath;
  }

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'ttyinput-terminfo-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should serve the capabilities of each terminal type', () => {
    const source = loadTerminfoFile(
      writeFile(
        JSON.stringify({
          'xterm-256color': { kcuu1: '\x1bOA', kf13: '\x1b[1;2P' },
          vt100: {},
        }),
      ),
    );
    expect(source('xterm-256color')).toEqual({
      kcuu1: '\x1bOA',
      kf13: '\x1b[1;2P',
    });
    expect(source('vt100')).toEqual({});
    expect(source('linux')).toBeUndefined();
  });

  it('should report a file that cannot be read', () => {
    const filePath = path.join(tempDir, 'missing.json');
    expect(() => loadTerminfoFile(filePath)).toThrow(ConfigurationError);
    expect(() => loadTerminfoFile(filePath)).toThrow(
      `Failed to read terminfo file ${filePath}`,
    );
  });

  it('should reject capabilities that are not strings', () => {
    const filePath = writeFile(JSON.stringify({ xterm: { kf1: 5 } }));
    expect(() => loadTerminfoFile(filePath)).toThrow(
      `Invalid terminfo file ${filePath}`,
    );
  });
});
