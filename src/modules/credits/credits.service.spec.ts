import { Test } from '@nestjs/testing';
import Decimal from 'decimal.js';
import { CreditsService } from './credits.service';
import { CreditTransactionType } from '../../database/entities';
import {
  CreditBalanceNotFoundException,
  InsufficientBalanceException,
  PersistenceException,
  ValidationException,
} from '../../common/errors/billing.errors';
import { ErrorCode } from '../../common/interfaces/response.interface';
import { TestDatabase } from '../../../test/support/test-database';
import { testInfrastructure } from '../../../test/support/test-config';
import { OTHER_SUBJECT_ID, SUBJECT_ID } from '../../../test/support/webhook-fixtures';

describe('CreditsService', () => {
  let db: TestDatabase;
  let service: CreditsService;

  beforeAll(async () => {
    db = await TestDatabase.create();
  });

  afterAll(() => db.close());

  beforeEach(async () => {
    await db.reset();
    const moduleRef = await Test.createTestingModule({
      providers: [CreditsService, ...testInfrastructure(db)],
    }).compile();
    service = moduleRef.get(CreditsService);
  });

  describe('getBalance', () => {
    it('returns a zero balance when the subject has no row', async () => {
      const balance = await service.getBalance(SUBJECT_ID);

      expect(balance.subject_id).toBe(SUBJECT_ID);
      expect(balance.provider).toBe('default');
      expect(balance.current_balance.toFixed(2)).toBe('0.00');
      expect(balance.last_transaction_at).toBeNull();
    });

    it('scopes balances by provider', async () => {
      await service.allocateCredits(SUBJECT_ID, 'semo', 100, 'Monthly credits', 'inv_1');

      expect((await service.getBalance(SUBJECT_ID, 'semo')).current_balance.toFixed(2)).toBe('100.00');
      expect((await service.getBalance(SUBJECT_ID, 'other')).current_balance.toFixed(2)).toBe('0.00');
    });

    it('wraps storage errors', async () => {
      db.failNext('user_credit_balances');

      await expect(service.getBalance(SUBJECT_ID)).rejects.toBeInstanceOf(PersistenceException);
    });
  });

  describe('allocateCredits', () => {
    it('creates the balance row and records the allocation', async () => {
      const result = await service.allocateCredits(SUBJECT_ID, 'semo', '100', 'Monthly credits', 'inv_1');

      expect(result.replayed).toBe(false);
      expect(result.balance.current_balance.toFixed(2)).toBe('100.00');
      expect(result.transaction.transaction_type).toBe(CreditTransactionType.ALLOCATION);
      expect(result.transaction.amount.toFixed(2)).toBe('100.00');
      expect(result.transaction.balance_after.toFixed(2)).toBe('100.00');
      expect(result.transaction.reference_id).toBe('inv_1');
      expect(result.balance.last_transaction_at).toBe(result.transaction.created_at);
    });

    it('returns the first transaction when the reference repeats', async () => {
      const first = await service.allocateCredits(SUBJECT_ID, 'semo', 100, 'Monthly credits', 'inv_1');
      const second = await service.allocateCredits(SUBJECT_ID, 'semo', 100, 'Monthly credits', 'inv_1');

      expect(second.replayed).toBe(true);
      expect(second.transaction.id).toBe(first.transaction.id);
      expect(second.balance.current_balance.toFixed(2)).toBe('100.00');
      expect(await db.snapshot('credit_transactions')).toHaveLength(1);
    });

    it('applies concurrent deliveries of the same reference once', async () => {
      const results = await Promise.all([
        service.allocateCredits(SUBJECT_ID, 'semo', 100, 'Monthly credits', 'inv_1'),
        service.allocateCredits(SUBJECT_ID, 'semo', 100, 'Monthly credits', 'inv_1'),
      ]);

      expect(results.map((r) => r.replayed).sort()).toEqual([false, true]);
      expect((await service.getBalance(SUBJECT_ID, 'semo')).current_balance.toFixed(2)).toBe('100.00');
      expect(await db.snapshot('credit_transactions')).toHaveLength(1);
    });

    it('allows repeated allocations without a reference', async () => {
      await service.allocateCredits(SUBJECT_ID, undefined, 10, 'Bonus');
      const result = await service.allocateCredits(SUBJECT_ID, undefined, 10, 'Bonus', '  ');

      expect(result.replayed).toBe(false);
      expect(result.balance.current_balance.toFixed(2)).toBe('20.00');
      expect(result.transaction.reference_id).toBeNull();
    });

    it.each([0, -5, '1.234', 'abc'])('rejects amount %p', async (amount) => {
      await expect(service.allocateCredits(SUBJECT_ID, 'semo', amount, 'Bad', 'ref')).rejects.toBeInstanceOf(
        ValidationException,
      );
      expect(await db.snapshot('credit_transactions')).toHaveLength(0);
    });
  });

  describe('useCredits', () => {
    it('fails when the subject has no balance row', async () => {
      await expect(service.useCredits(SUBJECT_ID, 'semo', 1, 'Usage', 'chat')).rejects.toBeInstanceOf(
        CreditBalanceNotFoundException,
      );
    });

    it('deducts and records a negative usage transaction', async () => {
      await service.allocateCredits(SUBJECT_ID, 'semo', '10.50', 'Top up', 'inv_1');
      const result = await service.useCredits(SUBJECT_ID, 'semo', '0.25', 'Usage', 'chat', {
        usageMetadata: { tokens: 120 },
      });

      expect(result.transaction.transaction_type).toBe(CreditTransactionType.USAGE);
      expect(result.transaction.amount.toFixed(2)).toBe('-0.25');
      expect(result.transaction.feature_name).toBe('chat');
      expect(result.transaction.usage_metadata).toEqual({ tokens: 120 });
      expect(result.balance.current_balance.toFixed(2)).toBe('10.25');
    });

    it('rejects usage above the balance and leaves it unchanged', async () => {
      await service.allocateCredits(SUBJECT_ID, 'semo', 10, 'Top up', 'inv_1');

      const error = await service.useCredits(SUBJECT_ID, 'semo', 25, 'Usage', 'chat').catch((err: unknown) => err);

      expect(error).toBeInstanceOf(InsufficientBalanceException);
      expect(error instanceof InsufficientBalanceException && error.getResponse()).toEqual({
        code: ErrorCode.INSUFFICIENT_BALANCE,
        message: 'Insufficient credit balance: requested 25.00, available 10.00',
        details: { requested: '25.00', available: '10.00', shortfall: '15.00' },
      });
      expect((await service.getBalance(SUBJECT_ID, 'semo')).current_balance.toFixed(2)).toBe('10.00');
      expect(await db.snapshot('credit_transactions')).toHaveLength(1);
    });

    it('allows spending the exact balance', async () => {
      await service.allocateCredits(SUBJECT_ID, 'semo', 10, 'Top up', 'inv_1');
      const result = await service.useCredits(SUBJECT_ID, 'semo', 10, 'Usage', 'chat');

      expect(result.balance.current_balance.toFixed(2)).toBe('0.00');
    });

    it('replays a repeated idempotency key', async () => {
      await service.allocateCredits(SUBJECT_ID, 'semo', 100, 'Top up', 'inv_1');
      const first = await service.useCredits(SUBJECT_ID, 'semo', 5, 'Usage', 'chat', { idempotencyKey: 'req-1' });
      const second = await service.useCredits(SUBJECT_ID, 'semo', 5, 'Usage', 'chat', { idempotencyKey: 'req-1' });

      expect(second.replayed).toBe(true);
      expect(second.transaction.id).toBe(first.transaction.id);
      expect(second.balance.current_balance.toFixed(2)).toBe('95.00');
    });
  });

  describe('adjustCredits', () => {
    it('creates the row for a positive adjustment', async () => {
      const result = await service.adjustCredits(SUBJECT_ID, 'semo', '5', 'Goodwill', 'adj-1');

      expect(result.transaction.transaction_type).toBe(CreditTransactionType.ADJUSTMENT);
      expect(result.balance.current_balance.toFixed(2)).toBe('5.00');
    });

    it('refuses to take the balance below zero', async () => {
      await service.adjustCredits(SUBJECT_ID, 'semo', '5', 'Goodwill', 'adj-1');

      await expect(service.adjustCredits(SUBJECT_ID, 'semo', '-6', 'Correction', 'adj-2')).rejects.toBeInstanceOf(
        InsufficientBalanceException,
      );
      const result = await service.adjustCredits(SUBJECT_ID, 'semo', '-5', 'Correction', 'adj-3');
      expect(result.balance.current_balance.toFixed(2)).toBe('0.00');
    });

    it('rejects a zero amount or a blank reference', async () => {
      await expect(service.adjustCredits(SUBJECT_ID, 'semo', 0, 'Nothing', 'adj-1')).rejects.toBeInstanceOf(
        ValidationException,
      );
      await expect(service.adjustCredits(SUBJECT_ID, 'semo', 1, 'Nothing', ' ')).rejects.toBeInstanceOf(
        ValidationException,
      );
    });
  });

  describe('ledger consistency', () => {
    it('keeps the balance equal to the sum of transaction amounts', async () => {
      await service.allocateCredits(SUBJECT_ID, 'semo', 100, 'Top up', 'inv_1');
      await service.useCredits(SUBJECT_ID, 'semo', '12.34', 'Usage', 'chat');
      await service.adjustCredits(SUBJECT_ID, 'semo', '-7.66', 'Correction', 'adj-1');
      await service.allocateCredits(SUBJECT_ID, 'semo', 20, 'Top up', 'inv_2');
      await service.useCredits(SUBJECT_ID, 'semo', 130, 'Usage', 'search').catch((err: unknown) => err);

      const history = await service.getTransactionHistory(SUBJECT_ID, { provider: 'semo' });
      const chronological = [...history.items].reverse();
      const sum = chronological.reduce((total, tx) => total.plus(tx.amount), new Decimal(0));

      expect(sum.toFixed(2)).toBe('100.00');
      expect((await service.getBalance(SUBJECT_ID, 'semo')).current_balance.toFixed(2)).toBe('100.00');

      let running = new Decimal(0);
      for (const tx of chronological) {
        running = running.plus(tx.amount);
        expect(tx.balance_after.toFixed(2)).toBe(running.toFixed(2));
      }
    });
  });

  describe('getTransactionHistory', () => {
    beforeEach(async () => {
      await service.allocateCredits(SUBJECT_ID, 'semo', 100, 'Top up', 'inv_1');
      await service.useCredits(SUBJECT_ID, 'semo', 10, 'Usage', 'chat');
      await service.useCredits(SUBJECT_ID, 'semo', 20, 'Usage', 'search');
      await service.allocateCredits(SUBJECT_ID, 'other', 5, 'Top up', 'inv_2');
      await service.allocateCredits(OTHER_SUBJECT_ID, 'semo', 50, 'Top up', 'inv_3');
    });

    it('returns the most recent transactions first', async () => {
      const history = await service.getTransactionHistory(SUBJECT_ID, { provider: 'semo' });

      expect(history.items.map((tx) => tx.amount.toFixed(2))).toEqual(['-20.00', '-10.00', '100.00']);
      expect(history).toMatchObject({ total: 3, limit: 20, offset: 0, hasMore: false });
    });

    it('pages with limit and offset', async () => {
      const firstPage = await service.getTransactionHistory(SUBJECT_ID, { limit: 2, offset: 0, provider: 'semo' });
      const secondPage = await service.getTransactionHistory(SUBJECT_ID, { limit: 2, offset: 2, provider: 'semo' });

      expect(firstPage.items.map((tx) => tx.feature_name)).toEqual(['search', 'chat']);
      expect(firstPage).toMatchObject({ total: 3, hasMore: true });
      expect(secondPage.items.map((tx) => tx.reference_id)).toEqual(['inv_1']);
      expect(secondPage).toMatchObject({ total: 3, hasMore: false });
    });

    it('includes every provider when none is given', async () => {
      const history = await service.getTransactionHistory(SUBJECT_ID);

      expect(history.items).toHaveLength(4);
      expect(history.items[0].provider).toBe('other');
    });

    it('clamps the limit to at least one row', async () => {
      const history = await service.getTransactionHistory(SUBJECT_ID, { limit: 0 });

      expect(history.items).toHaveLength(1);
      expect(history).toMatchObject({ limit: 1, total: 4, hasMore: true });
    });

    it('reports the clamped limit when more than the maximum is asked for', async () => {
      const history = await service.getTransactionHistory(SUBJECT_ID, { limit: 500 });

      expect(history.limit).toBe(100);
    });

    it('filters by transaction type', async () => {
      const history = await service.getTransactionHistory(SUBJECT_ID, {
        transactionType: CreditTransactionType.USAGE,
      });

      expect(history.items.map((tx) => tx.feature_name)).toEqual(['search', 'chat']);
      expect(history.total).toBe(2);
    });

    it('filters by an inclusive date range', async () => {
      const subjectId = '7a6b5c4d-3e2f-4a1b-9c8d-7e6f5a4b3c2d';
      const dated = (createdAt: string, referenceId: string) => ({
        subject_id: subjectId,
        provider: 'semo',
        transaction_type: 'allocation',
        amount: '1.00',
        balance_after: '1.00',
        description: 'Top up',
        reference_id: referenceId,
        created_at: createdAt,
      });
      await db.seed('credit_transactions', [
        dated('2026-01-10T00:00:00.000Z', 'jan_10'),
        dated('2026-01-20T00:00:00.000Z', 'jan_20'),
      ]);

      const fromStart = await service.getTransactionHistory(subjectId, {
        startDate: '2026-01-10T00:00:00Z',
        endDate: '2026-01-15T00:00:00Z',
      });
      const toEnd = await service.getTransactionHistory(subjectId, { endDate: '2026-01-20T00:00:00Z' });

      expect(fromStart.items.map((tx) => tx.reference_id)).toEqual(['jan_10']);
      expect(toEnd.items.map((tx) => tx.reference_id)).toEqual(['jan_20', 'jan_10']);
    });

    it('rejects a start date after the end date', async () => {
      await expect(
        service.getTransactionHistory(SUBJECT_ID, {
          startDate: '2026-02-01T00:00:00Z',
          endDate: '2026-01-01T00:00:00Z',
        }),
      ).rejects.toBeInstanceOf(ValidationException);
    });

    it('finds a transaction by reference', async () => {
      const tx = await service.getTransactionByReference('inv_3');

      expect(tx?.subject_id).toBe(OTHER_SUBJECT_ID);
      expect(await service.getTransactionByReference('missing')).toBeNull();
    });
  });
});
