import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { TransactionalUnitOfWork } from '@infrastructure/persistence/transactional-unit-of-work';
import { InMemoryDatabase } from '@infrastructure/persistence/in-memory/in-memory-database';
import { InMemoryPersistenceContext } from '@infrastructure/persistence/in-memory/in-memory-persistence-context';
import { NotFoundError, ValidationFailedError } from '@application/errors';
import { unwrap } from '@shared/result';
import { aCustomer, customers, orderLines, orders, type Order } from '@tests/support/entities';
import { silentLogger } from '@tests/support/logger';

describe('Unit of work - Acceptance Test', () => {
    let database: InMemoryDatabase;
    let uow: TransactionalUnitOfWork<number>;

    const openUnitOfWork = () =>
        new TransactionalUnitOfWork<number>(new InMemoryPersistenceContext(database), silentLogger());

    beforeEach(() => {
        database = new InMemoryDatabase();
        uow = openUnitOfWork();
    });

    afterEach(async () => {
        await uow.dispose();
    });

    describe('Happy Path', () => {
        it('should make a committed entity visible to a later unit of work', async () => {
            await uow.beginTransaction();
            await uow.repository.add(customers, aCustomer());
            const committed = await uow.commitTransaction();

            expect(committed.ok).toBe(true);

            // Read back through a fresh unit of work over the same store
            const reader = openUnitOfWork();
            const found = await reader.repository.findById(customers, 1);
            await reader.dispose();

            expect(found).toEqual({ ok: true, value: aCustomer() });
        });

        it('should place an order with its lines and read it back eagerly', async () => {
            const placed = await uow.run(async (repository) => {
                unwrap(await repository.add(customers, aCustomer()));
                unwrap(await repository.add(orders, { id: 10, customerId: 1, reference: 'A-10' }));
                unwrap(await repository.add(orderLines, { id: 100, orderId: 10, sku: 'BOOK', quantity: 2 }));
                unwrap(await repository.add(orderLines, { id: 101, orderId: 10, sku: 'PEN', quantity: 3 }));
                return 10;
            });

            expect(placed).toEqual({ ok: true, value: 10 });

            const listed = await uow.repository.getListIncluding(orders, { id: 10 }, 'customer', 'lines');

            expect(listed.ok).toBe(true);
            if (!listed.ok) return;

            expect(listed.value).toEqual([
                {
                    id: 10,
                    customerId: 1,
                    reference: 'A-10',
                    customer: aCustomer(),
                    lines: [
                        { id: 100, orderId: 10, sku: 'BOOK', quantity: 2 },
                        { id: 101, orderId: 10, sku: 'PEN', quantity: 3 },
                    ],
                },
            ]);
        });

        it('should list the same entities with and without an empty include', async () => {
            await uow.run(async (repository) => {
                unwrap(await repository.add(orders, { id: 1, customerId: 1, reference: 'A-1' }));
                unwrap(await repository.add(orders, { id: 2, customerId: 2, reference: 'A-2' }));
                unwrap(await repository.add(orders, { id: 3, customerId: 1, reference: 'A-3' }));
            });

            const byCustomer = (order: Order) => order.customerId === 1;
            const plain = await uow.repository.getList(orders, byCustomer);
            const including = await uow.repository.getListIncluding(orders, byCustomer);

            expect(including).toEqual(plain);
            expect(plain.ok && plain.value.map((order) => order.reference)).toEqual(['A-1', 'A-3']);
        });
    });

    describe('Error Cases', () => {
        it('should leave nothing behind after a rollback', async () => {
            await uow.beginTransaction();
            await uow.repository.add(customers, aCustomer());
            await uow.rollbackTransaction();

            expect(await uow.repository.findById(customers, 1)).toEqual({ ok: true, value: null });
            expect(uow.state).toBe('no-transaction');
        });

        it('should reject a commit with an entity missing a required field', async () => {
            // Create the customer first
            await uow.run(async (repository) => unwrap(await repository.add(customers, aCustomer())));

            const incomplete: Order = JSON.parse('{"id":20,"customerId":1}');
            await uow.beginTransaction();
            await uow.repository.add(orders, incomplete);
            const result = await uow.commitTransaction();

            expect(result.ok).toBe(false);
            if (!result.ok) {
                expect(result.error).toBeInstanceOf(ValidationFailedError);
                expect(result.error.message).toBe('Order failed validation\n- reference : Required');
            }
            expect(uow.state).toBe('no-transaction');
            expect(database.rowCount('orders')).toBe(0);
            expect(database.rowCount('customers')).toBe(1);
        });

        it('should report a delete of a missing id as not found', async () => {
            await uow.beginTransaction();
            const result = await uow.repository.delete(customers, 404);
            await uow.rollbackTransaction();

            expect(result.ok).toBe(false);
            if (result.ok) return;

            expect(result.error).toBeInstanceOf(NotFoundError);
            expect(result.error.message).toBe('Customer 404 was not found');
        });

        it('should free the store when a unit of work is disposed mid-transaction', async () => {
            await uow.beginTransaction();
            await uow.repository.add(customers, aCustomer());
            await uow.dispose();

            const next = openUnitOfWork();
            const begun = await next.beginTransaction();
            const found = await next.repository.findById(customers, 1);
            await next.rollbackTransaction();
            await next.dispose();

            expect(begun).toEqual({ ok: true, value: undefined });
            expect(found).toEqual({ ok: true, value: null });
        });

        it('should find and delete an entity added earlier in the same transaction', async () => {
            await uow.beginTransaction();
            await uow.repository.add(customers, aCustomer());

            const found = await uow.repository.findById(customers, 1);
            const deleted = await uow.repository.delete(customers, 1);
            const committed = await uow.commitTransaction();

            expect(found).toEqual({ ok: true, value: aCustomer() });
            expect(deleted).toEqual({ ok: true, value: undefined });
            expect(committed).toEqual({ ok: true, value: 0 });
            expect(database.rowCount('customers')).toBe(0);
        });

        it('should keep committed work when a later transaction fails', async () => {
            await uow.run(async (repository) => unwrap(await repository.add(customers, aCustomer())));

            const failed = await uow.run(async (repository) => {
                unwrap(await repository.update(customers, aCustomer({ name: 'Ada King' })));
                unwrap(await repository.delete(customers, 7));
            });

            expect(failed.ok).toBe(false);
            expect(await uow.repository.findById(customers, 1)).toEqual({ ok: true, value: aCustomer() });
        });
    });
});
