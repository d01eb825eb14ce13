import { Injectable, Logger } from '@nestjs/common';
import { isUUID } from 'class-validator';
import { CustomerMappingsService } from '../customers/customer-mappings.service';
import { PaymentProvider } from '../../database/entities';
import { SubjectHints } from './normalizers/normalized-event';

export type SubjectSource = 'direct' | 'parent' | 'lineItem' | 'customerMapping';

export interface ResolvedSubject {
  subjectId: string;
  source: SubjectSource;
}

const METADATA_ORDER: ReadonlyArray<Exclude<SubjectSource, 'customerMapping'>> = ['direct', 'parent', 'lineItem'];

/**
 * 从事件线索中找出积分归属的 subject
 * 顺序固定：对象 metadata -> 父对象 metadata -> line item metadata -> 客户映射
 */
@Injectable()
export class SubjectResolverService {
  private readonly logger = new Logger(SubjectResolverService.name);

  constructor(private customerMappingsService: CustomerMappingsService) {}

  async resolve(provider: PaymentProvider, hints: SubjectHints): Promise<ResolvedSubject | null> {
    for (const source of METADATA_ORDER) {
      const candidate = hints[source];
      if (!candidate) continue;
      if (isUUID(candidate)) {
        return { subjectId: candidate, source };
      }
      this.logger.warn(`Ignoring non-UUID user_id "${candidate}" from ${source} metadata`);
    }

    if (hints.providerCustomerId) {
      const mapping = await this.customerMappingsService.getByProviderCustomerId(provider, hints.providerCustomerId);
      if (mapping && isUUID(mapping.subject_id)) {
        return { subjectId: mapping.subject_id, source: 'customerMapping' };
      }
    }

    return null;
  }
}
