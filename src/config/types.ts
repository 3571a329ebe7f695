/**
 * Configuration types.
 */

/**
 * Whether messages already on the page when capture starts are written.
 */
export type BaselinePolicy = 'emit' | 'skip';

/**
 * URL fragment that marks a tab as a likely chat page.
 */
export interface UrlHint {
  pattern: string;
  score: number;
}

/**
 * CSS selectors describing the chat page.
 */
export interface ChatSelectors {
  /** Candidate user-message selectors; the first one that matches wins */
  user: string[];
  /** Candidate assistant-message selectors; the first one that matches wins */
  ai: string[];
  /** Present on the page while a reply is being generated */
  streamingIndicators: string[];
  /** Element holding the partial reply text during generation */
  loadingMessage: string;
  /** Chat input candidates, most specific first */
  textbox: string[];
}

/**
 * Page-specific behaviour, loadable from a JSON file.
 */
export interface ChatProfile {
  /** Page opened by auto-navigation; undefined disables navigation */
  targetUrl: string | undefined;
  chatUrlHints: UrlHint[];
  selectors: ChatSelectors;
  /** Decoration stripped from the start and end of assistant text */
  boilerplate: { prefixes: string[]; suffixes: string[] };
  /** Lines starting with these are dropped from streamed reply text */
  noisePrefixes: string[];
  intervalMs: number;
  baseline: BaselinePolicy;
  holdWhileStreaming: boolean;
}

/**
 * Fully resolved configuration for one command invocation.
 */
export interface ChatCapConfig extends ChatProfile {
  host: string;
  port: number;
  /** JSON Lines output path */
  output: string;
  /** Explicit browser executable (from --browser-path or CHROME_PATH) */
  browserPath: string | undefined;
}

/**
 * Values supplied on the command line. Undefined means "not given".
 */
export interface ConfigOverrides {
  configPath?: string | undefined;
  host?: string | undefined;
  port?: string | number | undefined;
  output?: string | undefined;
  browserPath?: string | undefined;
  targetUrl?: string | undefined;
  intervalMs?: string | number | undefined;
  baseline?: string | undefined;
  holdWhileStreaming?: boolean | undefined;
}
