import { getSimLogger } from '../../utils/logger.js';
import type { MessageHandler } from './types.js';

const logger = getSimLogger('transport');

/**
 * Hand a payload to the listener's handler
 * @returns whether the payload was accepted (and should be acknowledged)
 */
export function dispatchInbound(address: string, handler: MessageHandler, payload: string): boolean {
  try {
    handler(payload);
    return true;
  } catch (error) {
    logger.warn('Dropped inbound message at {address}: {error}', {
      address,
      error: error instanceof Error ? error.message : String(error),
    });
    return false;
  }
}
