import { Module } from '@nestjs/common';
import { CustomersModule } from '../customers/customers.module';
import { CustomerSearchController } from './search.controller';
import { CustomerSearchService } from './search.service';

@Module({
    imports: [CustomersModule],
    controllers: [CustomerSearchController],
    providers: [CustomerSearchService],
    exports: [CustomerSearchService],
})
export class SearchModule { }
