import { Controller, Get, Param, ParseIntPipe, Query } from '@nestjs/common';
import { PaymentsService } from './payments.service';
import { presentPayment } from './payments.presenter';
import { PaymentListQueryDto, PaymentResponseDto } from './dto/payments.dto';
import { OffsetPage, toOffsetPage } from '../../common/interfaces/response.interface';

@Controller('payments')
export class PaymentsController {
  constructor(private readonly paymentsService: PaymentsService) {}

  /**
   * GET /api/payments?subject_id=...
   */
  @Get()
  async listPayments(@Query() query: PaymentListQueryDto): Promise<OffsetPage<PaymentResponseDto>> {
    const page = await this.paymentsService.listPayments(query.subject_id, {
      limit: query.limit,
      offset: query.offset,
      status: query.status,
    });
    return toOffsetPage(page.items.map(presentPayment), page.total, page.limit, page.offset);
  }

  /**
   * GET /api/payments/:id
   */
  @Get(':id')
  async getPayment(@Param('id', ParseIntPipe) id: number): Promise<PaymentResponseDto> {
    return presentPayment(await this.paymentsService.getPayment(id));
  }
}
