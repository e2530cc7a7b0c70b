import { describe, it, expect } from 'vitest';
import { fail, isFailure, isSuccess, ok, unwrap } from '@shared/result';
import { NotFoundError } from '@application/errors';

describe('Result', () => {
    it('should tell successes and failures apart', () => {
        expect(isSuccess(ok(1))).toBe(true);
        expect(isFailure(ok(1))).toBe(false);
        expect(isFailure(fail('nope'))).toBe(true);
    });

    describe('unwrap', () => {
        it('should return the value of a success', () => {
            expect(unwrap(ok('value'))).toBe('value');
        });

        it('should throw the error of a failure as is', () => {
            const error = new NotFoundError('Customer 1 was not found');

            expect(() => unwrap(fail(error))).toThrow(error);
        });
    });
});
