/**
 * Capture module type definitions.
 */

/**
 * Role of a chat message.
 */
export type MessageType = 'user' | 'ai';

/**
 * Element bounding box in CSS pixels, relative to the viewport at capture time.
 */
export interface ElementLocation {
  x: number;
  y: number;
  width: number;
  height: number;
}

/**
 * One line of the JSON Lines output log.
 *
 * Field names are part of the file format and stay snake_case.
 */
export interface CapturedMessage {
  /** ISO-8601 capture time */
  timestamp: string;
  message_id: string;
  type: MessageType;
  content: string;
  /** First 500 characters of the element's inner HTML */
  html_snippet: string;
  element_location: ElementLocation;
}

/**
 * A message element as reported by the in-page scan script.
 */
export interface RawMessageElement {
  type: MessageType;
  /** Zero-based position among the elements of the same role */
  index: number;
  text: string;
  html: string;
  /** Null when the element has no layout box */
  rect: ElementLocation | null;
  dataMessageId: string | null;
  dataId: string | null;
  elementId: string | null;
}

/**
 * Result of one DOM scan.
 */
export interface ScanResult {
  user: RawMessageElement[];
  ai: RawMessageElement[];
  /** A streaming indicator is on the page */
  streaming: boolean;
  /** Text of the last loading-message element, or empty */
  loadingText: string;
}

/**
 * Capture session lifecycle.
 *
 * disconnected → attached → ready → capturing → stopped
 */
export type CaptureState = 'disconnected' | 'attached' | 'ready' | 'capturing' | 'stopped';

/**
 * Counters reported when a capture session stops.
 */
export interface CaptureSummary {
  written: Record<MessageType, number>;
  scans: number;
  failedScans: number;
  /** Assistant elements left for a later scan because a reply was streaming */
  heldScans: number;
  stopReason: StopReason;
}

export type StopReason = 'signal' | 'connection-lost' | 'aborted';
