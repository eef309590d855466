/**
 * @fileoverview Ingestion Controller
 *
 * Admin endpoint that writes generated customers into both stores.
 */

import { Controller, HttpCode, Post, Query, UsePipes, ValidationPipe } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { IngestQueryDto } from './dto/ingest-query.dto';
import { IngestionService } from './ingestion.service';
import { IngestionSummary } from './interfaces';

const MAX_BATCH_SIZE = 1000;

@ApiTags('admin')
@Controller('admin')
@UsePipes(new ValidationPipe({ transform: true }))
export class IngestionController {
    constructor(private ingestionService: IngestionService) { }

    /**
     * Runs one ingestion.
     *
     * @returns Summary with per-outcome tallies, batch reports and consistency warnings
     */
    @Post('ingest')
    @HttpCode(200)
    @ApiOperation({ summary: 'Ingest customers', description: 'Generate customers and write them into both stores' })
    async ingest(@Query() query: IngestQueryDto): Promise<IngestionSummary> {
        const batchSize = Math.min(
            Math.max(query.batchSize ?? this.ingestionService.defaultBatchSize, 1),
            MAX_BATCH_SIZE,
        );

        return this.ingestionService.ingest(batchSize, query.count);
    }
}
