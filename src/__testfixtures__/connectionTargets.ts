import type { CDPTarget } from '@/types.js';

/**
 * Create a mock CDPTarget with default values and optional overrides.
 */
export const createMockTarget = (overrides: Partial<CDPTarget> = {}): CDPTarget => ({
  id: 'target-123',
  type: 'page',
  url: 'http://localhost:3000',
  title: 'Test Page',
  webSocketDebuggerUrl: 'ws://127.0.0.1:9222/devtools/page/target-123',
  ...overrides,
});

/**
 * A browser with a DevTools window, an extension, a service worker, an
 * unrelated tab and the chat tab.
 */
export const browserTabs: CDPTarget[] = [
  createMockTarget({
    id: 'devtools',
    url: 'devtools://devtools/bundled/inspector.html',
    title: 'DevTools',
  }),
  createMockTarget({
    id: 'settings',
    url: 'chrome://settings/',
    title: 'Settings',
  }),
  createMockTarget({
    id: 'worker',
    type: 'service_worker',
    url: 'https://m365.cloud.microsoft/sw.js',
    title: 'Service Worker',
  }),
  createMockTarget({
    id: 'news',
    url: 'https://news.example.com/today',
    title: 'News',
  }),
  createMockTarget({
    id: 'chat',
    url: 'https://m365.cloud.microsoft/chat/?auth=2',
    title: 'Copilot',
  }),
];
