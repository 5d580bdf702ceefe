/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

// Set NODE_ENV to test if not already set
process.env.NODE_ENV = process.env.NODE_ENV || 'test';

// Unset NO_COLOR and the debug variables so local and CI runs behave the same
delete process.env.NO_COLOR;
delete process.env.DEBUG;
delete process.env.TTYINPUT_DEBUG;
delete process.env.DEBUG_LEVEL;
