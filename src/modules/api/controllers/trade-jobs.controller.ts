import { Controller, Get, NotFoundException, Param, UseGuards } from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiParam, ApiResponse, ApiTags } from '@nestjs/swagger';

import type { TradeJob } from '../../../common/interfaces/trade-job.types';
import { TradeJobDispatcherService } from '../../trading/services/trade-job-dispatcher.service';
import { ApiAuthGuard } from '../auth/api-auth.guard';
import { type TradeJobIdDto, tradeJobIdSchema } from '../dto/trade-job-id.dto';
import { ZodValidationPipe } from '../pipes/zod-validation.pipe';
import { TRADE_JOB_SCHEMA } from '../swagger/api-schemas';

@ApiTags('Trade jobs')
@ApiBearerAuth()
@Controller('api/v1/trade-jobs')
@UseGuards(ApiAuthGuard)
export class TradeJobsController {
  public constructor(private readonly tradeJobDispatcherService: TradeJobDispatcherService) {}

  @Get(':jobId')
  @ApiOperation({ summary: 'Get the state of a trade job' })
  @ApiParam({ name: 'jobId', type: 'string', format: 'uuid' })
  @ApiResponse({ status: 200, description: 'Trade job', schema: TRADE_JOB_SCHEMA })
  @ApiResponse({ status: 404, description: 'Unknown job id' })
  public async getTradeJob(
    @Param('jobId', new ZodValidationPipe(tradeJobIdSchema)) jobId: TradeJobIdDto,
  ): Promise<TradeJob> {
    const job: TradeJob | null = await this.tradeJobDispatcherService.getJob(jobId);

    if (job === null) {
      throw new NotFoundException(`Trade job ${jobId} not found`);
    }

    return job;
  }
}
