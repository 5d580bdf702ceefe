/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { afterEach } from 'vitest';
import { ConfigurationManager } from './src/debug/ConfigurationManager.js';

// Unset debug variables so a developer's shell does not change logger state
delete process.env.DEBUG;
delete process.env.TTYINPUT_DEBUG;
delete process.env.DEBUG_LEVEL;

afterEach(() => {
  ConfigurationManager.getInstance().clearEphemeralConfig();
});
