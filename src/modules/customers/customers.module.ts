import { Module } from '@nestjs/common';
import { CustomerMappingsService } from './customer-mappings.service';

@Module({
  providers: [CustomerMappingsService],
  exports: [CustomerMappingsService],
})
export class CustomersModule {}
