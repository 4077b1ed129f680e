import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
    checkConstraint,
    checkConstraints,
    Constraints,
    satisfies
} from '../../libs/iso20022/schema/constraints.js';
import { validateLeaf } from '../../libs/iso20022/validation/propagator.js';
import { ActiveCurrencyCode, Max35Text, Max4AlphaNumericText } from '../../libs/iso20022/messages/dataTypes.js';
import { ConstraintError } from '../../libs/errors/bindingErrors.js';

describe('Field Constraint Model', () => {
    describe('length bounds', () => {
        it('should reject min-1 and max+1 and accept min and max', () => {
            const tooShort = validateLeaf(Max35Text, '');
            const shortest = validateLeaf(Max35Text, 'a');
            const longest = validateLeaf(Max35Text, 'x'.repeat(35));
            const tooLong = validateLeaf(Max35Text, 'x'.repeat(36));

            assert.strictEqual(shortest.success, true);
            assert.strictEqual(longest.success, true);

            assert.ok(!tooShort.success);
            assert.strictEqual(tooShort.error.kind, 'LengthOutOfRange');
            assert.strictEqual(tooShort.error.code, 1001);
            assert.strictEqual(tooShort.error.message, 'value is shorter than the minimum length of 1');

            assert.ok(!tooLong.success);
            assert.strictEqual(tooLong.error.kind, 'LengthOutOfRange');
            assert.strictEqual(tooLong.error.code, 1002);
            assert.strictEqual(tooLong.error.detail, 'exceeds the maximum length of 35');
        });

        it('should count code points rather than UTF-16 units', () => {
            assert.strictEqual(satisfies(Constraints.maxLength(2), '😀😀'), true);
            assert.strictEqual(satisfies(Constraints.maxLength(1), '😀😀'), false);
        });
    });

    describe('pattern', () => {
        it('should require a full match', () => {
            const rule = Constraints.pattern('[A-Z]{3,3}');

            assert.strictEqual(satisfies(rule, 'EUR'), true);
            assert.strictEqual(satisfies(rule, 'EURO'), false);
            assert.strictEqual(satisfies(rule, 'xEUR'), false);
        });

        it('should report an empty currency code as a pattern mismatch', () => {
            const result = validateLeaf(ActiveCurrencyCode, '');

            assert.ok(!result.success);
            assert.ok(result.error instanceof ConstraintError);
            assert.strictEqual(result.error.kind, 'PatternMismatch');
            assert.strictEqual(result.error.code, 1005);
        });

        it('should check the pattern after the length bounds', () => {
            const withinLength = validateLeaf(Max4AlphaNumericText, 'AB1!');
            const overLength = validateLeaf(Max4AlphaNumericText, 'ABCDE');

            assert.ok(!withinLength.success);
            assert.strictEqual(withinLength.error.kind, 'PatternMismatch');
            assert.ok(!overLength.success);
            assert.strictEqual(overLength.error.code, 1002);
        });
    });

    describe('numeric bounds', () => {
        it('should treat bounds as inclusive', () => {
            assert.strictEqual(satisfies(Constraints.minValue(0), 0), true);
            assert.strictEqual(satisfies(Constraints.maxValue(12), 12), true);
        });

        it('should report values outside the bounds', () => {
            const below = checkConstraint(Constraints.minValue(0), -0.01);
            const above = checkConstraint(Constraints.maxValue(12), 13);

            assert.strictEqual(below?.kind, 'BelowMinimum');
            assert.strictEqual(below?.code, 1003);
            assert.strictEqual(below?.detail, 'is less than the minimum value of 0');
            assert.strictEqual(above?.kind, 'AboveMaximum');
            assert.strictEqual(above?.code, 1004);
        });

        it('should fail a bound for a value that is not a number', () => {
            assert.strictEqual(satisfies(Constraints.minValue(0), Number.NaN), false);
            assert.strictEqual(satisfies(Constraints.minValue(0), 'abc'), false);
        });
    });

    describe('enumeration', () => {
        it('should accept only listed values', () => {
            const rule = Constraints.oneOf(['CRDT', 'DBIT']);

            assert.strictEqual(satisfies(rule, 'CRDT'), true);
            assert.strictEqual(checkConstraint(rule, 'XXXX')?.code, 1006);
        });
    });

    describe('checkConstraints', () => {
        it('should return the first failure in declaration order', () => {
            const result = checkConstraints([Constraints.minLength(1), Constraints.pattern('[0-9]+')], '');

            assert.ok(!result.success);
            assert.strictEqual(result.error.code, 1001);
        });

        it('should succeed when there are no rules', () => {
            assert.deepStrictEqual(checkConstraints([], 'anything'), { success: true });
        });
    });
});
