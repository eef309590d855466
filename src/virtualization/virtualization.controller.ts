/**
 * @fileoverview Virtualization Controller
 *
 * Gated customer search through the data-virtualization server, plus the
 * operator view of license usage.
 */

import { Controller, Get, HttpCode, Post, Query, UsePipes, ValidationPipe } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { CustomerSearchQueryDto } from '../search/dto/customer-search-query.dto';
import { OperatingMode } from '../search/interfaces';
import { LicenseUsageStats, VirtualizationSearchResult } from './interfaces';
import { VirtualizationService } from './virtualization.service';

@ApiTags('virtualization')
@Controller('virtualization')
export class VirtualizationController {
    constructor(private virtualizationService: VirtualizationService) { }

    @Get('customers/search')
    @UsePipes(new ValidationPipe({ transform: true }))
    @ApiOperation({ summary: 'Search customers via virtualization', description: 'Runs inside the concurrency license gate' })
    async search(@Query() query: CustomerSearchQueryDto): Promise<VirtualizationSearchResult> {
        return this.virtualizationService.search({
            field: query.field,
            value: query.value,
            mode: query.mode ?? OperatingMode.Hybrid,
            queryKind: query.kind,
            limit: query.limit,
        });
    }

    @Get('license')
    @ApiOperation({ summary: 'License usage', description: 'Current, peak and cumulative license counters' })
    licenseStats(): LicenseUsageStats {
        return this.virtualizationService.licenseStats();
    }

    @Post('license/reset')
    @HttpCode(200)
    @ApiOperation({ summary: 'Reset license counters', description: 'Zeroes cumulative counters; in-flight permits are untouched' })
    resetLicense(): LicenseUsageStats {
        return this.virtualizationService.resetLicenseStats();
    }
}
