import type { RawMessageElement, ScanResult } from '@/capture/types.js';

/**
 * Scanned element with a layout box; position follows the index.
 */
export const rawElement = (
  type: RawMessageElement['type'],
  index: number,
  text: string,
  overrides: Partial<RawMessageElement> = {}
): RawMessageElement => ({
  type,
  index,
  text,
  html: `<p>${text}</p>`,
  rect: { x: 10, y: 100 * (index + 1), width: 600, height: 40 },
  dataMessageId: null,
  dataId: null,
  elementId: null,
  ...overrides,
});

/**
 * Scan result as returned by the page script.
 */
export const scanResult = (overrides: Partial<ScanResult> = {}): ScanResult => ({
  user: [],
  ai: [],
  streaming: false,
  loadingText: '',
  ...overrides,
});
