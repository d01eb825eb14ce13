import { Module } from '@nestjs/common';
import { PaymentPlansService } from './payment-plans.service';

@Module({
  providers: [PaymentPlansService],
  exports: [PaymentPlansService],
})
export class PlansModule {}
