import { describe, it } from 'node:test';
import assert from 'node:assert';
import { DocumentEnvelope, type AnyDocument } from '../../libs/iso20022/document/envelope.js';
import { createEnvelope, DEFAULT_CATALOG, type Iso20022Document } from '../../libs/iso20022/messages/index.js';
import { wireElement } from '../../libs/iso20022/wire/wireElement.js';
import { CatalogError, DecodeError } from '../../libs/errors/bindingErrors.js';
import { creditTransfer, SAMPLE_DOCUMENTS } from '../fixtures/documents.js';

const envelope = createEnvelope();

const [first] = creditTransfer.CdtTrfTxInf;

// Creditor account carrying both alternatives of AccountIdentification4Choice
const ambiguousAccount: Iso20022Document = {
    tag: 'FIToFICstmrCdtTrf',
    message: {
        ...creditTransfer,
        CdtTrfTxInf: [{ ...first, CdtrAcct: { Id: { IBAN: 'GB00TEST00000000000001', Othr: { Id: '1' } } } }]
    }
};

describe('DocumentEnvelope', () => {
    describe('round trip', () => {
        for (const document of SAMPLE_DOCUMENTS) {
            it(`should reproduce ${document.tag} through encode and decode`, () => {
                const encoded = envelope.encode(document);

                assert.strictEqual(encoded.tag, document.tag);
                assert.strictEqual(encoded.wire.name, document.tag);
                assert.deepStrictEqual(envelope.decode(encoded.tag, encoded.wire), document);
            });
        }
    });

    describe('decode', () => {
        it('should reject an unknown tag without producing a document', () => {
            assert.throws(() => envelope.decode('PmtRtr', wireElement('PmtRtr')), (error: unknown) => {
                assert.ok(error instanceof DecodeError);
                assert.strictEqual(error.kind, 'UnknownMessageType');
                assert.strictEqual(error.code, 9999);
                assert.strictEqual(error.message, 'Unknown message type: PmtRtr');
                return true;
            });
        });

        it('should reject a root element that does not match the tag', () => {
            assert.throws(() => envelope.decode('SysEvtNtfctn', wireElement('RmtAdvc')), {
                kind: 'MalformedInput',
                code: 2001
            });
        });

        it('should return failures as values from safeDecode', () => {
            const result = envelope.safeDecode('PmtRtr', wireElement('PmtRtr'));

            assert.ok(!result.success);
            assert.strictEqual(result.error.code, 9999);
        });

        it('should decode wire trees received as plain JSON', () => {
            const encoded = envelope.encode({ tag: 'FIToFICstmrCdtTrf', message: creditTransfer });
            const json: unknown = JSON.parse(JSON.stringify(encoded.wire));

            assert.deepStrictEqual(envelope.decodeUnknown('FIToFICstmrCdtTrf', json), {
                tag: 'FIToFICstmrCdtTrf',
                message: creditTransfer
            });
        });

        it('should reject JSON that is not a wire tree', () => {
            assert.throws(() => envelope.decodeUnknown('SysEvtNtfctn', { name: 5 }), {
                kind: 'MalformedInput',
                code: 2001
            });
        });
    });

    describe('encode', () => {
        it('should reject a tag with no registered definition', () => {
            const untyped = new DocumentEnvelope<AnyDocument>(DEFAULT_CATALOG);

            assert.throws(() => untyped.encode({ tag: 'PmtRtr', message: {} }), (error: unknown) => {
                assert.ok(error instanceof CatalogError);
                assert.strictEqual(error.kind, 'UnknownMessageType');
                assert.strictEqual(error.code, 9999);
                return true;
            });
        });
    });

    describe('validate', () => {
        it('should accept every sample document', () => {
            for (const document of SAMPLE_DOCUMENTS) {
                assert.deepStrictEqual(envelope.validate(document), { success: true }, document.tag);
            }
        });

        it('should validate the active variant', () => {
            const result = envelope.validate({
                tag: 'SysEvtNtfctn',
                message: { EvtInf: { EvtCd: 'PING!' } }
            });

            assert.ok(!result.success);
            assert.strictEqual(result.error.field, 'EvtCd');
            assert.strictEqual(result.error.code, 1002);
        });

        it('should never gate decoding', () => {
            const encoded = envelope.encode({
                tag: 'admi.002.001.01',
                message: { RltdRef: { Ref: 'R'.repeat(40) }, Rsn: { RjctgPtyRsn: 'SCHEMA' } }
            });
            const decoded = envelope.decode(encoded.tag, encoded.wire);

            assert.strictEqual(envelope.validate(decoded).success, false);
        });

        it('should apply strict choice resolution only when configured', () => {
            const strict = envelope.withOptions({ strictChoices: true });
            const result = strict.validate(ambiguousAccount);

            assert.deepStrictEqual(envelope.validate(ambiguousAccount), { success: true });
            assert.ok(!result.success);
            assert.strictEqual(result.error.field, 'Id');
            assert.strictEqual(result.error.code, 1007);
        });
    });
});
