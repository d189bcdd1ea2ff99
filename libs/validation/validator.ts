import type { MessageInput } from '../model/bytes.js';
import type { PaymentMessage } from '../model/payment.js';
import { LogicalOptions, LogicalValidator } from './logicalValidator.js';
import type { ValidationReport } from './report.js';
import { StructuralOptions, StructuralValidator } from './structuralValidator.js';

/**
 * Entry point for both validation passes.
 */
export class Validator {
    /** Wire structure of raw MX or MT bytes. */
    static validateSchema(input: MessageInput, options?: StructuralOptions): ValidationReport {
        return StructuralValidator.validate(input, options);
    }

    /** IBAN, BIC, UETR and money rules over a parsed model. */
    static validate(message: PaymentMessage, options?: LogicalOptions): ValidationReport {
        return LogicalValidator.validate(message, options);
    }
}
