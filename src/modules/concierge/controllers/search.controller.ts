/// <reference path="../../../common/types/express.d.ts" />
import {
  BadRequestException,
  Body,
  Controller,
  HttpCode,
  Post,
  Req,
  UseGuards,
} from '@nestjs/common';
import { ThrottlerGuard } from '@nestjs/throttler';
import { randomUUID } from 'node:crypto';
import type { Request } from 'express';
import { createLogger } from '../../../common/utils/logger';
import { SearchValidationError } from '../domain/errors';
import type { SearchOutcome } from '../domain/search-result';
import { SearchProductsUseCase } from '../application/use-cases/search-products';
import { SearchRequestDto } from '../dto/search-request.dto';

export type SearchResponse = SearchOutcome & { requestId: string };

@Controller('concierge')
export class SearchController {
  private readonly logger = createLogger(SearchController.name);

  constructor(private readonly searchProducts: SearchProductsUseCase) {}

  @Post('search')
  @HttpCode(200)
  @UseGuards(ThrottlerGuard)
  async search(@Req() request: Request, @Body() payload: SearchRequestDto): Promise<SearchResponse> {
    const requestId = request.requestId ?? randomUUID();

    this.logger.http('search_request_received', {
      event: 'search_request_received',
      request_id: requestId,
      has_postal_code: typeof payload.postalCode === 'string' && payload.postalCode.length > 0,
      max_products: payload.maxProducts ?? null,
    });

    try {
      const outcome = await this.searchProducts.execute({ ...payload, requestId });
      return { ...outcome, requestId };
    } catch (error: unknown) {
      if (error instanceof SearchValidationError) {
        this.logger.warn('search_request_rejected', {
          event: 'search_request_rejected',
          request_id: requestId,
          field: error.field,
        });
        throw new BadRequestException(error.message);
      }

      throw error;
    }
  }
}
