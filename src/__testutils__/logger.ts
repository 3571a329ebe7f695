import type { Logger } from '@/types.js';

/**
 * Logger that drops everything.
 */
export const silentLogger: Logger = {
  info: () => {},
  debug: () => {},
};

export interface RecordingLogger extends Logger {
  infos: string[];
  debugs: string[];
}

/**
 * Logger that keeps every line for assertions.
 */
export function createRecordingLogger(): RecordingLogger {
  const infos: string[] = [];
  const debugs: string[] = [];
  return {
    infos,
    debugs,
    info: (message) => infos.push(message),
    debug: (message) => debugs.push(message),
  };
}
