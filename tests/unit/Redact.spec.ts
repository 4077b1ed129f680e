import { describe, it } from 'node:test';
import assert from 'node:assert';
import { REDACT_CENSOR, REDACT_KEYS } from '../../libs/logging/redactionConfig.js';
import pino from 'pino';
import { Writable } from 'stream';

describe('Log Redaction', () => {
    it('should redact party and account details in objects', () => {
        const lines: string[] = [];
        const stream = new Writable({
            write(chunk, _encoding, callback) {
                lines.push(chunk.toString());
                callback();
            }
        });

        const testLogger = pino({
            redact: {
                paths: REDACT_KEYS,
                censor: REDACT_CENSOR
            }
        }, stream);

        testLogger.info({
            IBAN: 'GB00TEST00000000000001',
            token: 'test-token',
            Cdtr: {
                Nm: 'Bob Example',
                CtryOfRes: 'US'
            },
            MsgId: 'MSG-0001'
        }, 'test message');

        assert.strictEqual(lines.length, 1);
        const log = JSON.parse(lines[0] ?? '{}');
        assert.strictEqual(log.IBAN, REDACT_CENSOR);
        assert.strictEqual(log.token, REDACT_CENSOR);
        assert.strictEqual(log.Cdtr.Nm, REDACT_CENSOR);
        assert.strictEqual(log.Cdtr.CtryOfRes, 'US');
        assert.strictEqual(log.MsgId, 'MSG-0001');
    });
});
