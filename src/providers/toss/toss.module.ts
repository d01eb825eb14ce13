import { Module, Global } from '@nestjs/common';
import { TossService } from './toss.service';

@Global()
@Module({
  providers: [TossService],
  exports: [TossService],
})
export class TossModule {}
