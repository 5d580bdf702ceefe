/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// In development: packages/core/src/utils -> packages/core/data
// In a tsc build: dist/packages/core/src/utils -> <root>/packages/core/data
const DATA_DIR_CANDIDATES = [
  path.resolve(__dirname, '..', '..', 'data'),
  path.resolve(
    __dirname,
    '..',
    '..',
    '..',
    '..',
    '..',
    'packages',
    'core',
    'data',
  ),
];

/**
 * Reads and parses one of the JSON lookup tables shipped in `data/`.
 */
export function readDataFile(name: string): unknown {
  for (const dir of DATA_DIR_CANDIDATES) {
    const filePath = path.join(dir, name);
    if (fs.existsSync(filePath)) {
      return JSON.parse(fs.readFileSync(filePath, 'utf8'));
    }
  }
  throw new Error(
    `Data file ${name} not found in ${DATA_DIR_CANDIDATES.join(', ')}`,
  );
}
