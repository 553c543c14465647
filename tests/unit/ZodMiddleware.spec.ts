/**
 * Unit Tests: Zod validation helpers
 *
 * @see libs/validation/zod-middleware.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { z } from 'zod';
import { createValidator, validate } from '../../libs/validation/zod-middleware.js';

describe('Zod validation', () => {
    const TestSchema = z.object({
        id: z.string().min(1),
        count: z.number().int()
    });

    it('should return the parsed value', () => {
        assert.deepStrictEqual(validate(TestSchema, { id: 'a', count: 2 }, 'test-context'), { id: 'a', count: 2 });
    });

    it('should return transformed output', () => {
        const schema = z.string().transform(value => Buffer.from(value, 'base64'));
        assert.deepStrictEqual(validate(schema, 'aGk=', 'base64 field'), Buffer.from('hi'));
    });

    it('should throw DecodeError naming the context and path', () => {
        assert.throws(
            () => validate(TestSchema, { id: 'a', count: 1.5 }, 'test-context'),
            { name: 'CoreError', kind: 'DecodeError', message: 'Invalid test-context: count: Expected integer, received float' }
        );
    });

    it('should report missing fields', () => {
        assert.throws(() => validate(TestSchema, { id: 'a' }, 'partial'), { message: 'Invalid partial: count: Required' });
    });

    it('should label root-level issues', () => {
        assert.throws(() => validate(z.string(), 5, 'root'), { message: 'Invalid root: <root>: Expected string, received number' });
    });

    it('should create reusable validators', () => {
        const validateTest = createValidator(TestSchema);
        assert.strictEqual(validateTest({ id: 'b', count: 3 }, 'factory-test').id, 'b');
    });
});
