import type { Logger } from 'pino';
import { loadBindingConfig, type BindingConfig } from '../config/bindingConfig.js';
import { DecodeError, isBindingError } from '../errors/bindingErrors.js';
import { ErrorSanitizer } from '../errors/sanitizer.js';
import { getMessageLogger, logger } from '../logging/logger.js';
import {
    decodeHeader,
    encodeHeader,
    validateBusinessMessage,
    type BusinessMessage
} from './document/businessMessage.js';
import { namespaceOf } from './document/catalog.js';
import type { AnyDocument, DocumentEnvelope } from './document/envelope.js';
import { HEADER_NAMESPACE } from './messages/head.js';
import type { ValidationResult } from './validation/propagator.js';
import {
    readBusinessMessageXml,
    readDocumentXml,
    writeBusinessMessageXml,
    writeDocumentXml,
    type WireDocument
} from './wire/xmlAdapter.js';

/**
 * ISO 20022 Codec
 *
 * XML-facing entry point over a document envelope. Options come from the
 * binding configuration; decode and encode failures are logged once here and
 * rethrown, anything that is not a binding error is sanitized first.
 *
 * @example
 * const codec = new Iso20022Codec(createEnvelope());
 * const document = codec.fromXml(xml);
 * if (document.tag === 'FIToFICstmrCdtTrf') {
 *     console.log(document.message.GrpHdr.MsgId);
 * }
 */
export class Iso20022Codec<D extends AnyDocument> {
    private readonly envelope: DocumentEnvelope<D>;
    private readonly log: Logger;

    constructor(
        envelope: DocumentEnvelope<D>,
        private readonly config: BindingConfig = loadBindingConfig(),
        log: Logger = logger
    ) {
        this.envelope = envelope.withOptions({
            strictChoices: config.strictChoices,
            unknownElements: config.unknownElements
        });
        this.log = log.child({ component: 'Iso20022Codec' }, { level: config.logLevel });
    }

    /**
     * Decodes `<Document xmlns="…"><Root>…</Root></Document>` (or a bare root).
     * @throws DecodeError
     */
    fromXml(xml: string): D {
        return this.guard('fromXml', () => {
            const document = this.decodeWireDocument(readDocumentXml(xml));
            getMessageLogger(document.tag, this.log).debug('Iso20022Codec: Document decoded');
            return document;
        });
    }

    /**
     * @throws EncodeError | CatalogError
     */
    toXml(document: D): string {
        return this.guard('toXml', () => {
            const { wire, namespace } = this.encodeDocument(document);
            return writeDocumentXml(wire, namespace, { xmlDeclaration: this.config.xmlDeclaration });
        });
    }

    /**
     * Advisory validation; failures are returned and logged, never thrown.
     */
    validate(document: D): ValidationResult {
        return this.report(document.tag, this.guard('validate', () => this.envelope.validate(document)));
    }

    validateBusinessMessage(message: BusinessMessage<D>): ValidationResult {
        return this.report(
            message.document.tag,
            this.guard('validateBusinessMessage', () => validateBusinessMessage(this.envelope, message))
        );
    }

    /**
     * Decodes `<Message><AppHdr/><Document/></Message>`; a lone Document yields a message without header.
     * @throws DecodeError
     */
    readBusinessMessage(xml: string): BusinessMessage<D> {
        return this.guard('readBusinessMessage', () => {
            const wire = readBusinessMessageXml(xml);
            const document = this.decodeWireDocument(wire.document);
            if (!wire.header) {
                return { document };
            }

            this.checkNamespace(wire.header.namespace, HEADER_NAMESPACE, wire.header.root.name);
            return { header: decodeHeader(wire.header.root, this.envelope.options), document };
        });
    }

    writeBusinessMessage(message: BusinessMessage<D>): string {
        return this.guard('writeBusinessMessage', () => {
            const document = this.encodeDocument(message.document);
            const header = message.header
                ? { namespace: HEADER_NAMESPACE, wire: encodeHeader(message.header) }
                : undefined;
            return writeBusinessMessageXml(document, header, { xmlDeclaration: this.config.xmlDeclaration });
        });
    }

    private decodeWireDocument({ tag, namespace, wire }: WireDocument): D {
        const definition = this.envelope.definitionOf(tag);
        if (definition) {
            this.checkNamespace(namespace, namespaceOf(definition.identifier), tag);
        }
        return this.envelope.decode(tag, wire);
    }

    private encodeDocument(document: D) {
        const { tag, wire } = this.envelope.encode(document);
        const definition = this.envelope.definitionOf(tag);
        // encode has already rejected unregistered tags
        const namespace = definition ? namespaceOf(definition.identifier) : '';
        return { wire, namespace };
    }

    // An undeclared namespace is accepted; a declared one must name the definition
    private checkNamespace(actual: string, expected: string, path: string): void {
        if (actual !== '' && actual !== expected) {
            throw new DecodeError('NamespaceMismatch', `Namespace ${actual} does not match ${expected}`, path);
        }
    }

    private report(tag: string, result: ValidationResult): ValidationResult {
        if (!result.success) {
            getMessageLogger(tag, this.log).warn({
                code: result.error.code,
                kind: result.error.kind,
                field: result.error.field
            }, 'Iso20022Codec: Validation failed');
        }
        return result;
    }

    private guard<T>(operation: string, run: () => T): T {
        try {
            return run();
        } catch (error: unknown) {
            if (isBindingError(error)) {
                this.log.warn({
                    operation,
                    code: error.code,
                    category: error.category,
                    ...(error instanceof DecodeError ? { kind: error.kind, path: error.path } : {})
                }, `Iso20022Codec: ${operation} failed`);
            }
            throw ErrorSanitizer.sanitize(error, `Iso20022Codec.${operation}`);
        }
    }
}
