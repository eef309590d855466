/**
 * @fileoverview Virtualization Module
 */

import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios from 'axios';
import { EncryptionModule } from '../encryption';
import { VIRTUALIZATION_HTTP } from './interfaces';
import { LicenseGateService } from './license-gate.service';
import { VirtualizationClient } from './virtualization.client';
import { VirtualizationController } from './virtualization.controller';
import { VirtualizationService } from './virtualization.service';

@Module({
    imports: [EncryptionModule],
    controllers: [VirtualizationController],
    providers: [
        {
            provide: VIRTUALIZATION_HTTP,
            inject: [ConfigService],
            useFactory: (config: ConfigService) =>
                axios.create({
                    baseURL: config.get<string>('VIRTUALIZATION_BASE_URL', 'http://localhost:9090/rest/customer_views'),
                    timeout: config.get<number>('VIRTUALIZATION_TIMEOUT_MS', 30000),
                    auth: {
                        username: config.get<string>('VIRTUALIZATION_USER', 'admin'),
                        password: config.get<string>('VIRTUALIZATION_PASSWORD', 'admin'),
                    },
                    headers: { Accept: 'application/json' },
                }),
        },
        LicenseGateService,
        VirtualizationClient,
        VirtualizationService,
    ],
    exports: [LicenseGateService, VirtualizationService],
})
export class VirtualizationModule { }
