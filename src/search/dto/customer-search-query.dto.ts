/**
 * @fileoverview Customer Search Query DTO
 */

import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { IsIn, IsInt, IsNotEmpty, IsOptional, IsString, Min } from 'class-validator';
import { QUERY_KINDS, QueryKind } from '../../encryption/interfaces';
import { OPERATING_MODES, OperatingMode } from '../interfaces';

export class CustomerSearchQueryDto {
    @ApiProperty({ example: 'email', description: 'Encrypted field to search (name, email, phone, category, status)' })
    @IsString()
    @IsNotEmpty()
    field!: string;

    @ApiProperty({ example: 'alice', description: 'Query value' })
    @IsString()
    value!: string;

    @ApiPropertyOptional({ enum: [...OPERATING_MODES], example: OperatingMode.Hybrid, description: 'Stores to consult (default: hybrid)' })
    @IsOptional()
    @IsIn(OPERATING_MODES)
    mode?: OperatingMode;

    @ApiPropertyOptional({ enum: [...QUERY_KINDS], example: 'prefix', description: 'Operator (default: the field\'s first)' })
    @IsOptional()
    @IsIn(QUERY_KINDS)
    kind?: QueryKind;

    @ApiPropertyOptional({ example: 20, description: 'Max results (default: 100)' })
    @IsOptional()
    @Type(() => Number)
    @IsInt()
    @Min(1)
    limit?: number;
}
