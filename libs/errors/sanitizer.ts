import { getModuleLogger } from '../logging/logger.js';
import crypto from 'crypto';
import { MessageEngineError, ParseError, WireFormat } from './messageErrors.js';

const logger = getModuleLogger('error-sanitizer');

/**
 * Third-party parser failures are wrapped into the engine taxonomy with an
 * incident id; the original error stays reachable through `cause`.
 */
export const ErrorSanitizer = {
    /**
     * Wraps any error into a ParseError. Engine errors pass through untouched.
     */
    toParseError: (err: unknown, format: WireFormat, contextLabel: string): MessageEngineError => {
        if (err instanceof MessageEngineError) return err;

        let originalErrorMessage: string;
        let originalErrorStack: string | undefined;

        if (err instanceof Error) {
            originalErrorMessage = err.message;
            originalErrorStack = err.stack;
        } else if (typeof err === 'string') {
            originalErrorMessage = err;
        } else if (err && typeof err === 'object' && 'message' in err && typeof err.message === 'string') {
            originalErrorMessage = err.message;
        } else {
            originalErrorMessage = String(err);
        }

        const incidentId = crypto.randomUUID();
        logger.warn({
            incidentId,
            context: contextLabel,
            originalError: originalErrorMessage,
            stack: originalErrorStack
        }, 'Wrapped unexpected parser failure');

        return new ParseError(format, `${contextLabel}: ${originalErrorMessage} (incident ${incidentId})`, undefined, { cause: err });
    }
};
