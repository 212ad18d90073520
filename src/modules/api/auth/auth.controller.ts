import { Body, Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { ApiBody, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';

import type { IIssuedApiToken } from './auth.interfaces';
import { AuthService } from './auth.service';
import { type IssueTokenDto, issueTokenSchema } from '../dto/issue-token.dto';
import { ZodValidationPipe } from '../pipes/zod-validation.pipe';
import { ISSUE_TOKEN_BODY_SCHEMA, ISSUED_TOKEN_SCHEMA } from '../swagger/api-schemas';

@ApiTags('Auth')
@Controller('api/v1/auth')
export class AuthController {
  public constructor(private readonly authService: AuthService) {}

  @Post('token')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Exchange a legacy API token for a scoped JWT' })
  @ApiBody({ schema: ISSUE_TOKEN_BODY_SCHEMA })
  @ApiResponse({ status: 200, description: 'Signed access token', schema: ISSUED_TOKEN_SCHEMA })
  @ApiResponse({ status: 401, description: 'Invalid API token or issuance disabled' })
  @ApiResponse({ status: 403, description: 'Requested scopes exceed the API token scopes' })
  public issueToken(
    @Body(new ZodValidationPipe(issueTokenSchema)) body: IssueTokenDto,
  ): IIssuedApiToken {
    return this.authService.issueApiToken(body.apiToken, body.scopes);
  }
}
