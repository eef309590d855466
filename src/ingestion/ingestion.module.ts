import { Module } from '@nestjs/common';
import { CustomerGenerator, CustomersModule } from '../customers';
import { IngestionController } from './ingestion.controller';
import { IngestionService } from './ingestion.service';
import { CUSTOMER_SOURCE } from './interfaces';

@Module({
    imports: [CustomersModule],
    controllers: [IngestionController],
    providers: [
        IngestionService,
        { provide: CUSTOMER_SOURCE, useExisting: CustomerGenerator },
    ],
    exports: [IngestionService],
})
export class IngestionModule { }
