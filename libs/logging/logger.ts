import pino from 'pino';
import type { Logger } from 'pino';

import { REDACT_KEYS, REDACT_CENSOR } from './redactionConfig.js';

export const logger = pino({
    level: 'info',
    base: {
        system: 'iso20022-binding'
    },
    redact: {
        paths: REDACT_KEYS,
        censor: REDACT_CENSOR
    }
});

/**
 * Returns a child logger bound to a message tag.
 */
export function getMessageLogger(tag: string, parent: Logger = logger): Logger {
    return parent.child({ messageTag: tag });
}
