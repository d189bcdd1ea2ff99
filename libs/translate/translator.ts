import { UnsupportedFormatError } from '../errors/messageErrors.js';
import { getModuleLogger } from '../logging/logger.js';
import type { PaymentMessage } from '../model/payment.js';
import { MtTarget, writeMt } from './mtWriter.js';
import { findMxSchema, MX_SCHEMAS, WriteContext, writeMx } from './mxWriter.js';

const logger = getModuleLogger('translator');

export interface TranslateOptions {
    /** Source of placeholder timestamps; defaults to the system clock. */
    readonly clock?: () => Date;
    /** Mint a v4 UETR when the model has none. */
    readonly generateUetr?: boolean;
}

const MT_TARGETS: readonly MtTarget[] = ['103', '202'];

function contextFor(options: TranslateOptions): WriteContext {
    return { now: (options.clock ?? (() => new Date()))(), generateUetr: options.generateUetr ?? false };
}

function toMtTarget(name: string): MtTarget | null {
    const wanted = name.trim().toUpperCase().replace(/^MT/, '');
    return MT_TARGETS.find(target => target === wanted) ?? null;
}

/**
 * Model to wire bytes. The input model is never modified.
 */
export class Translator {
    static readonly supportedMx: readonly string[] = [...new Set(MX_SCHEMAS.flatMap(s => [s.family, s.schema]))];
    static readonly supportedMt: readonly string[] = MT_TARGETS.map(t => `MT${t}`);

    /**
     * @param schemaName family (`pacs.008`) or full schema (`pacs.008.001.02`)
     * @throws UnsupportedFormatError for any other target
     */
    static toMx(model: PaymentMessage, schemaName: string, options: TranslateOptions = {}): Buffer {
        const schema = findMxSchema(schemaName);
        if (!schema) {
            throw new UnsupportedFormatError(schemaName, Translator.supportedMx);
        }
        logger.debug({ from: model.messageType, to: schema.schema }, 'Translating to MX');
        return writeMx(schema, model, contextFor(options));
    }

    /**
     * @param mtType `103`, `202`, `MT103` or `MT202`
     * @throws UnsupportedFormatError for any other target
     */
    static toMt(model: PaymentMessage, mtType: string, options: TranslateOptions = {}): Buffer {
        const target = toMtTarget(mtType);
        if (!target) {
            throw new UnsupportedFormatError(mtType, Translator.supportedMt);
        }
        logger.debug({ from: model.messageType, to: `MT${target}` }, 'Translating to MT');
        return writeMt(target, model, contextFor(options));
    }
}
