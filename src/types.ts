/**
 * Shared type re-exports.
 */

export type {
  BrowserVersionInfo,
  CDPMessage,
  CDPTarget,
  ConnectionOptions,
  LaunchedBrowser,
  Logger,
} from '@/connection/types.js';

export type {
  CapturedMessage,
  ElementLocation,
  MessageType,
} from '@/capture/types.js';
