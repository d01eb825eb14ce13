import { Test } from '@nestjs/testing';
import { SubjectResolverService } from './subject-resolver.service';
import { CustomerMappingsService } from '../customers/customer-mappings.service';
import { PaymentProvider } from '../../database/entities';
import { emptySubjectHints } from './normalizers/normalized-event';
import { TestDatabase } from '../../../test/support/test-database';
import { testInfrastructure } from '../../../test/support/test-config';
import { OTHER_SUBJECT_ID, SUBJECT_ID } from '../../../test/support/webhook-fixtures';

const MAPPED_SUBJECT_ID = '5a6b7c8d-9e0f-4a1b-8c2d-3e4f5a6b7c8d';

describe('SubjectResolverService', () => {
  let resolver: SubjectResolverService;

  let db: TestDatabase;

  beforeAll(async () => {
    db = await TestDatabase.create();
  });

  afterAll(() => db.close());

  beforeEach(async () => {
    await db.reset();
    await db.seed('customer_mappings', [
      { payment_provider: 'stripe', provider_customer_id: 'cus_001', subject_id: MAPPED_SUBJECT_ID },
      { payment_provider: 'toss', provider_customer_id: 'cus_toss', subject_id: OTHER_SUBJECT_ID },
    ]);

    const moduleRef = await Test.createTestingModule({
      providers: [SubjectResolverService, CustomerMappingsService, ...testInfrastructure(db)],
    }).compile();
    resolver = moduleRef.get(SubjectResolverService);
  });

  it('prefers the object metadata', async () => {
    const resolved = await resolver.resolve(PaymentProvider.STRIPE, {
      direct: SUBJECT_ID,
      parent: OTHER_SUBJECT_ID,
      lineItem: OTHER_SUBJECT_ID,
      providerCustomerId: 'cus_001',
    });

    expect(resolved).toEqual({ subjectId: SUBJECT_ID, source: 'direct' });
  });

  it('skips values that are not UUIDs', async () => {
    const resolved = await resolver.resolve(PaymentProvider.STRIPE, {
      ...emptySubjectHints(),
      direct: 'user-42',
      parent: OTHER_SUBJECT_ID,
    });

    expect(resolved).toEqual({ subjectId: OTHER_SUBJECT_ID, source: 'parent' });
  });

  it('falls back to the first line item', async () => {
    const resolved = await resolver.resolve(PaymentProvider.STRIPE, {
      ...emptySubjectHints(),
      lineItem: SUBJECT_ID,
      providerCustomerId: 'cus_001',
    });

    expect(resolved).toEqual({ subjectId: SUBJECT_ID, source: 'lineItem' });
  });

  it('looks up the customer mapping last', async () => {
    const resolved = await resolver.resolve(PaymentProvider.STRIPE, {
      ...emptySubjectHints(),
      providerCustomerId: 'cus_001',
    });

    expect(resolved).toEqual({ subjectId: MAPPED_SUBJECT_ID, source: 'customerMapping' });
  });

  it('only uses mappings of the same payment provider', async () => {
    const resolved = await resolver.resolve(PaymentProvider.STRIPE, {
      ...emptySubjectHints(),
      providerCustomerId: 'cus_toss',
    });

    expect(resolved).toBeNull();
  });

  it('returns null when nothing matches', async () => {
    expect(await resolver.resolve(PaymentProvider.TOSS, emptySubjectHints())).toBeNull();
  });
});
