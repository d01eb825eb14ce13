export * from './credit.entity';
export * from './webhook-event.entity';
export * from './subscription.entity';
export * from './customer-mapping.entity';
export * from './payment-plan.entity';
export * from './payment.entity';
