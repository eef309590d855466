/**
 * @fileoverview Customer Search Controller
 *
 * HTTP endpoints for mode-switched customer search.
 */

import { Controller, Get, NotFoundException, Param, Query, UsePipes, ValidationPipe } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { FullProjection } from '../customers/interfaces';
import { CustomerSearchQueryDto } from './dto/customer-search-query.dto';
import { CustomerStoresHealth, OperatingMode, SearchResult } from './interfaces';
import { CustomerSearchService } from './search.service';

@ApiTags('customers')
@Controller('customers')
@UsePipes(new ValidationPipe({ transform: true }))
export class CustomerSearchController {
    constructor(private searchService: CustomerSearchService) { }

    /**
     * Searches customers by one encrypted field.
     */
    @Get('search')
    @ApiOperation({ summary: 'Search customers', description: 'Encrypted-field search in hybrid or search-store-only mode' })
    async search(@Query() query: CustomerSearchQueryDto): Promise<SearchResult> {
        return this.searchService.search({
            field: query.field,
            value: query.value,
            mode: query.mode ?? OperatingMode.Hybrid,
            queryKind: query.kind,
            limit: query.limit,
        });
    }

    @Get('health')
    @ApiOperation({ summary: 'Store health', description: 'Connectivity and document counts of both stores' })
    async health(): Promise<CustomerStoresHealth> {
        return this.searchService.health();
    }

    @Get(':id')
    @ApiOperation({ summary: 'Get customer', description: 'Authoritative record from the record store' })
    async findById(@Param('id') id: string): Promise<FullProjection> {
        const customer = await this.searchService.findById(id);
        if (!customer) {
            throw new NotFoundException(`Customer ${id} not found`);
        }
        return customer;
    }
}
