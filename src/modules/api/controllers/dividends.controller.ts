import {
  Controller,
  ForbiddenException,
  Get,
  Query,
  ServiceUnavailableException,
  UseGuards,
} from '@nestjs/common';
import {
  ApiBearerAuth,
  ApiOperation,
  ApiQuery,
  ApiResponse,
  ApiTags,
} from '@nestjs/swagger';

import { LedgerUnavailableError } from '../../../common/errors';
import { AuthScope, hasScope, type Principal } from '../../../common/interfaces/auth.types';
import type { DividendLookupResponse } from '../../../common/interfaces/dividend.types';
import { AppConfigService } from '../../../config/app-config.service';
import {
  type DividendHistoryPage,
  DividendHistoryService,
} from '../../dividends/services/dividend-history.service';
import { DividendResolverService } from '../../dividends/services/dividend-resolver.service';
import { ApiAuthGuard } from '../auth/api-auth.guard';
import { CurrentPrincipal } from '../auth/current-principal.decorator';
import {
  type DividendHistoryQueryDto,
  dividendHistoryQuerySchema,
} from '../dto/dividend-history-query.dto';
import { type TaoDividendsQueryDto, taoDividendsQuerySchema } from '../dto/tao-dividends-query.dto';
import { ZodValidationPipe } from '../pipes/zod-validation.pipe';
import {
  DIVIDEND_HISTORY_PAGE_SCHEMA,
  DIVIDEND_LOOKUP_RESPONSE_SCHEMA,
} from '../swagger/api-schemas';

@ApiTags('Dividends')
@ApiBearerAuth()
@Controller('api/v1')
@UseGuards(ApiAuthGuard)
export class DividendsController {
  public constructor(
    private readonly dividendResolverService: DividendResolverService,
    private readonly dividendHistoryService: DividendHistoryService,
    private readonly appConfigService: AppConfigService,
  ) {}

  @Get('tao_dividends')
  @ApiOperation({ summary: 'Get the dividend value of a hotkey on a subnet' })
  @ApiQuery({ name: 'netuid', required: false, type: 'integer' })
  @ApiQuery({ name: 'hotkey', required: false, type: 'string', description: 'SS58 address' })
  @ApiQuery({ name: 'trade', required: false, type: 'boolean' })
  @ApiResponse({ status: 200, description: 'Dividend value', schema: DIVIDEND_LOOKUP_RESPONSE_SCHEMA })
  @ApiResponse({ status: 403, description: 'trade=true without the stake scope' })
  @ApiResponse({ status: 503, description: 'Ledger unavailable' })
  public async getTaoDividends(
    @CurrentPrincipal() principal: Principal,
    @Query(new ZodValidationPipe(taoDividendsQuerySchema)) query: TaoDividendsQueryDto,
  ): Promise<DividendLookupResponse> {
    if (query.trade && !hasScope(principal, AuthScope.STAKE)) {
      throw new ForbiddenException('Trading requires the stake scope');
    }

    try {
      return await this.dividendResolverService.resolve({
        subnetId: query.netuid ?? this.appConfigService.defaultNetuid,
        accountKey: query.hotkey ?? this.appConfigService.defaultHotkey,
        trade: query.trade,
      });
    } catch (error: unknown) {
      if (error instanceof LedgerUnavailableError) {
        throw new ServiceUnavailableException(`${error.message}; retry later`);
      }

      throw error;
    }
  }

  @Get('dividends/history')
  @ApiOperation({ summary: 'List recorded dividend lookups, most recent first' })
  @ApiQuery({ name: 'netuid', required: false, type: 'integer' })
  @ApiQuery({ name: 'hotkey', required: false, type: 'string' })
  @ApiQuery({ name: 'limit', required: false, type: 'integer' })
  @ApiResponse({ status: 200, description: 'History page', schema: DIVIDEND_HISTORY_PAGE_SCHEMA })
  public async getDividendHistory(
    @Query(new ZodValidationPipe(dividendHistoryQuerySchema)) query: DividendHistoryQueryDto,
  ): Promise<DividendHistoryPage> {
    return this.dividendHistoryService.list({
      ...(query.netuid === undefined ? {} : { subnetId: query.netuid }),
      ...(query.hotkey === undefined ? {} : { accountKey: query.hotkey }),
      ...(query.limit === undefined ? {} : { limit: query.limit }),
    });
  }
}
