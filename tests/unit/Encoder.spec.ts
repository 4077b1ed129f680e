import { describe, it } from 'node:test';
import assert from 'node:assert';
import { encodeElement } from '../../libs/iso20022/wire/encoder.js';
import { DocumentEnvelope, type AnyDocument } from '../../libs/iso20022/document/envelope.js';
import { ActiveCurrencyAndAmount } from '../../libs/iso20022/messages/components.js';
import { Event2 } from '../../libs/iso20022/messages/admi.js';
import { GroupHeader93 } from '../../libs/iso20022/messages/pacs.js';
import { DEFAULT_CATALOG } from '../../libs/iso20022/messages/index.js';
import { EncodeError } from '../../libs/errors/bindingErrors.js';
import { creditTransfer } from '../fixtures/documents.js';

// Accepts any payload so malformed values can reach the encoder
const untyped = new DocumentEnvelope<AnyDocument>(DEFAULT_CATALOG);

describe('Wire Encoder', () => {
    it('should write simple content as an attribute plus text', () => {
        assert.deepStrictEqual(encodeElement(ActiveCurrencyAndAmount, { Ccy: 'EUR', value: 100 }, 'InstdAmt'), {
            name: 'InstdAmt',
            attributes: { Ccy: 'EUR' },
            text: '100',
            children: []
        });
    });

    it('should omit absent optional fields and empty lists', () => {
        assert.deepStrictEqual(encodeElement(Event2, { EvtCd: 'PING', EvtParam: [] }, 'EvtInf'), {
            name: 'EvtInf',
            attributes: {},
            children: [{ name: 'EvtCd', attributes: {}, text: 'PING', children: [] }]
        });
    });

    it('should emit children in declaration order', () => {
        const { BtchBookg, MsgId, SttlmInf, NbOfTxs, CreDtTm } = creditTransfer.GrpHdr;
        const wire = encodeElement(GroupHeader93, { SttlmInf, NbOfTxs, BtchBookg, CreDtTm, MsgId }, 'GrpHdr');

        assert.deepStrictEqual(
            wire.children.map(child => child.name),
            ['MsgId', 'CreDtTm', 'BtchBookg', 'NbOfTxs', 'SttlmInf']
        );
        assert.strictEqual(wire.children[2]?.text, 'false');
    });

    it('should write one element per list item', () => {
        const wire = encodeElement(Event2, { EvtCd: 'PING', EvtParam: ['A', 'B'] }, 'EvtInf');

        assert.deepStrictEqual(
            wire.children.map(child => [child.name, child.text]),
            [['EvtCd', 'PING'], ['EvtParam', 'A'], ['EvtParam', 'B']]
        );
    });

    describe('failures', () => {
        it('should reject a missing required value', () => {
            assert.throws(() => untyped.encode({ tag: 'SysEvtNtfctn', message: { EvtInf: {} } }), {
                name: 'EncodeError',
                kind: 'MissingRequiredValue',
                code: 3001,
                path: 'SysEvtNtfctn/EvtInf/EvtCd'
            });
        });

        it('should reject an empty 1..n list', () => {
            assert.throws(
                () => untyped.encode({ tag: 'FIToFICstmrCdtTrf', message: { GrpHdr: creditTransfer.GrpHdr, CdtTrfTxInf: [] } }),
                {
                    kind: 'MissingRequiredValue',
                    message: 'List requires at least one element (at FIToFICstmrCdtTrf/CdtTrfTxInf)'
                }
            );
        });

        it('should reject numbers that have no decimal form', () => {
            for (const value of [Infinity, NaN]) {
                assert.throws(
                    () => encodeElement(ActiveCurrencyAndAmount, { Ccy: 'USD', value }, 'IntrBkSttlmAmt'),
                    (error: unknown) => {
                        assert.ok(error instanceof EncodeError);
                        assert.strictEqual(error.kind, 'TypeMismatch');
                        assert.strictEqual(
                            error.message,
                            'Expected a finite number of type ActiveCurrencyAndAmount_SimpleType (at IntrBkSttlmAmt)'
                        );
                        return true;
                    }
                );
            }
        });

        it('should reject values of the wrong shape', () => {
            assert.throws(
                () => untyped.encode({ tag: 'SysEvtNtfctn', message: { EvtInf: 'PING' } }),
                (error: unknown) => {
                    assert.ok(error instanceof EncodeError);
                    assert.strictEqual(error.kind, 'TypeMismatch');
                    assert.strictEqual(error.code, 3002);
                    assert.strictEqual(error.message, 'Expected a record of type Event2 (at SysEvtNtfctn/EvtInf)');
                    return true;
                }
            );
            assert.throws(
                () => untyped.encode({ tag: 'SysEvtNtfctn', message: { EvtInf: { EvtCd: { nested: true } } } }),
                { kind: 'TypeMismatch', path: 'SysEvtNtfctn/EvtInf/EvtCd' }
            );
        });
    });
});
