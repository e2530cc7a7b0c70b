import { describe, it, expect } from 'vitest';
import { recordingLogger } from '@tests/support/logger';

describe('PinoLogger', () => {
    it('should write the message with its level', () => {
        const { logger, lines } = recordingLogger();

        logger.info('Transaction started');

        expect(lines).toEqual([{ level: 30, msg: 'Transaction started' }]);
    });

    it('should merge the context object into the line', () => {
        const { logger, lines } = recordingLogger();

        logger.warn('Failed to dispose transaction', { error: 'socket closed' });

        expect(lines).toEqual([{ level: 40, msg: 'Failed to dispose transaction', error: 'socket closed' }]);
    });

    it('should carry child bindings on every line', () => {
        const { logger, lines } = recordingLogger();
        const child = logger.child({ component: 'UnitOfWork', unitOfWorkId: 'uow-1' });

        child.debug('Transaction committed', { written: 2 });
        child.error('Rollback after failed commit did not complete');

        expect(lines).toEqual([
            { level: 20, component: 'UnitOfWork', unitOfWorkId: 'uow-1', msg: 'Transaction committed', written: 2 },
            { level: 50, component: 'UnitOfWork', unitOfWorkId: 'uow-1', msg: 'Rollback after failed commit did not complete' },
        ]);
    });
});
