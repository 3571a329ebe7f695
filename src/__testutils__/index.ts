/**
 * Test utilities - Re-export all test helpers
 *
 * ```ts
 * import { FakeBrowser, createRecordingLogger } from '@/__testutils__/index.js';
 * ```
 */

export { FakeBrowser, evaluateResult, targetInfos, type RecordedCommand } from './FakeBrowser.js';
export { FakeWebSocket, CONNECTING, OPEN, CLOSING, CLOSED } from './FakeWebSocket.js';
export { createRecordingLogger, silentLogger, type RecordingLogger } from './logger.js';
export { createTempDir, removeTempDir } from './tempDir.js';
