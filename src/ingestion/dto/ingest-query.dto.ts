/**
 * @fileoverview Ingest Query DTO
 */

import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { IsInt, IsOptional, Max, Min } from 'class-validator';

export class IngestQueryDto {
    @ApiProperty({ example: 1000, description: 'Customers to generate (1-100000)' })
    @Type(() => Number)
    @IsInt()
    @Min(1)
    @Max(100000)
    count!: number;

    @ApiPropertyOptional({ example: 100, description: 'Records per consistency-checked sub-batch (default: INGEST_BATCH_SIZE, max: 1000)' })
    @IsOptional()
    @Type(() => Number)
    @IsInt()
    batchSize?: number;
}
