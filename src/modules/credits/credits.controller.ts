import { Body, Controller, Get, HttpCode, Param, ParseUUIDPipe, Post, Query } from '@nestjs/common';
import { CreditsService } from './credits.service';
import { presentBalance, presentMutation, presentTransaction } from './credits.presenter';
import {
  AdjustCreditsDto,
  AllocateCreditsDto,
  CreditBalanceResponseDto,
  CreditHistoryQueryDto,
  CreditMutationResponseDto,
  CreditTransactionResponseDto,
  ProviderQueryDto,
  UseCreditsDto,
} from './dto/credits.dto';
import { OffsetPage, toOffsetPage } from '../../common/interfaces/response.interface';

@Controller('credits/:subjectId')
export class CreditsController {
  constructor(private readonly creditsService: CreditsService) {}

  /**
   * GET /api/credits/:subjectId/balance
   */
  @Get('balance')
  async getBalance(
    @Param('subjectId', ParseUUIDPipe) subjectId: string,
    @Query() query: ProviderQueryDto,
  ): Promise<CreditBalanceResponseDto> {
    return presentBalance(await this.creditsService.getBalance(subjectId, query.provider));
  }

  /**
   * GET /api/credits/:subjectId/transactions
   */
  @Get('transactions')
  async getTransactions(
    @Param('subjectId', ParseUUIDPipe) subjectId: string,
    @Query() query: CreditHistoryQueryDto,
  ): Promise<OffsetPage<CreditTransactionResponseDto>> {
    const page = await this.creditsService.getTransactionHistory(subjectId, {
      limit: query.limit,
      offset: query.offset,
      provider: query.provider,
      transactionType: query.transaction_type,
      startDate: query.start_date,
      endDate: query.end_date,
    });

    return toOffsetPage(page.items.map(presentTransaction), page.total, page.limit, page.offset);
  }

  @Post('allocate')
  @HttpCode(200)
  async allocate(
    @Param('subjectId', ParseUUIDPipe) subjectId: string,
    @Body() dto: AllocateCreditsDto,
  ): Promise<CreditMutationResponseDto> {
    const result = await this.creditsService.allocateCredits(
      subjectId,
      dto.provider,
      dto.amount,
      dto.description,
      dto.reference_id,
    );
    return presentMutation(result);
  }

  @Post('use')
  @HttpCode(200)
  async use(
    @Param('subjectId', ParseUUIDPipe) subjectId: string,
    @Body() dto: UseCreditsDto,
  ): Promise<CreditMutationResponseDto> {
    const result = await this.creditsService.useCredits(
      subjectId,
      dto.provider,
      dto.amount,
      dto.description || `Credit usage for ${dto.feature_name}`,
      dto.feature_name,
      { idempotencyKey: dto.idempotency_key, usageMetadata: dto.usage_metadata },
    );
    return presentMutation(result);
  }

  @Post('adjust')
  @HttpCode(200)
  async adjust(
    @Param('subjectId', ParseUUIDPipe) subjectId: string,
    @Body() dto: AdjustCreditsDto,
  ): Promise<CreditMutationResponseDto> {
    const result = await this.creditsService.adjustCredits(
      subjectId,
      dto.provider,
      dto.amount,
      dto.description,
      dto.reference_id,
    );
    return presentMutation(result);
  }
}
