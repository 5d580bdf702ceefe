/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

// Export decoder
export * from './input/ansi.js';
export * from './input/keys.js';
export * from './input/events.js';
export * from './input/flags.js';
export * from './input/sequenceTable.js';
export * from './input/terminfo.js';
export * from './input/parser.js';
export * from './input/decoder.js';
export * from './input/color.js';
export * from './input/kitty.js';
export * from './input/mouse.js';
export * from './input/params.js';
export * from './input/utf8.js';

// Export driver
export * from './input/byteSource.js';
export * from './input/driver.js';

// Export config
export * from './config/settings.js';

// Export utilities
export * from './utils/errors.js';

// Export debug logging
export * from './debug/DebugLogger.js';
export * from './debug/ConfigurationManager.js';
export * from './debug/types.js';
