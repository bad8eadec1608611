export { ConsoleNotifier } from './console-notifier.js';
export { HttpRelayNotifier, DEFAULT_ACTIVATION_SUBJECT } from './http-relay-notifier.js';
export type { HttpRelayNotifierConfig } from './http-relay-notifier.js';
