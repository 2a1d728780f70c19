/**
 * @fileoverview Notification sink for interpreter output and session events.
 *
 * @module notifier
 */

import { getErrorMessage } from './errors.js';

/**
 * Receives everything the user should see. Implemented by the host
 * (editor integration, CLI).
 */
export interface Notifier {
  onInfo(text: string): void;
  onWarning(text: string): void;
  onError(error: Error): void;
}

/**
 * Remove interpreter prompt tokens and surrounding whitespace.
 * An empty result means there is nothing worth showing.
 */
export function cleanMessage(text: string, promptTokens: readonly string[]): string {
  let cleaned = text;
  for (const token of promptTokens) {
    if (token) cleaned = cleaned.split(token).join('');
  }
  return cleaned.trim();
}

/** Writes notifications to the terminal */
export class ConsoleNotifier implements Notifier {
  onInfo(text: string): void {
    console.log(`[Tidal] ${text}`);
  }

  onWarning(text: string): void {
    console.warn(`[Tidal] ${text}`);
  }

  onError(error: Error): void {
    console.error(`[Tidal] ${error.name}: ${getErrorMessage(error)}`);
  }
}
