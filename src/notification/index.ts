/**
 * Notification module public API.
 */

export { DistributionEngine } from './distribution-engine.js';
export type { DistributionEngineOptions } from './distribution-engine.js';
export { OpsNotifier } from './ops-notifier.js';
export { DigestBuilder } from './digest-builder.js';
export { composeAlert, composeAdminReport, composeDigest } from './message-composer.js';
export { TelegramTarget, classifyTelegramError } from './channels/telegram.js';
export type { TelegramMessenger } from './channels/telegram.js';
export type { DistributionTarget, SendOutcome, DigestData } from './types.js';
