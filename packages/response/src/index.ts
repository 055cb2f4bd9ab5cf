/**
 * @parley/response - Reply detection on the shared clipboard.
 *
 * @packageDocumentation
 */

export { ResponseWatcher } from './watcher.js';
export { PasteboardChannel } from './pasteboard.js';
export type { PasteboardChannelConfig } from './pasteboard.js';
