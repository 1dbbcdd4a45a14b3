/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

// Export the buffer
export * from './buffer/selection.js';
export * from './buffer/text-buffer.js';

// Export history and search
export * from './history/undoHistory.js';
export * from './search/textSearch.js';

// Export codec and file I/O
export * from './codec/encoding.js';
export * from './codec/lineEndings.js';
export * from './document/documentFile.js';

// Export config
export * from './config/settingsSchema.js';
export * from './config/settings.js';

// Export utilities
export * from './utils/debugLogger.js';
export * from './utils/errors.js';
export * from './utils/events.js';
export * from './utils/textUtils.js';
