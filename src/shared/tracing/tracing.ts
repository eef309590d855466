/**
 * @fileoverview OpenTelemetry Tracing Setup
 *
 * Auto-instrumentation for the HTTP surface and both store drivers, exported
 * over OTLP. Imported before anything else in main.ts so the drivers get
 * patched.
 *
 * @remarks
 * Statement text and query parameters stay out of spans: search values are
 * plaintext PII until the drivers encrypt them.
 */

import { NodeSDK } from '@opentelemetry/sdk-node';
import { getNodeAutoInstrumentations } from '@opentelemetry/auto-instrumentations-node';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-http';
import { Resource } from '@opentelemetry/resources';
import { SemanticResourceAttributes } from '@opentelemetry/semantic-conventions';
import { AlwaysOnSampler, ParentBasedSampler, TraceIdRatioBasedSampler, Sampler } from '@opentelemetry/sdk-trace-node';

const environment = process.env.NODE_ENV || 'development';

function samplerFor(env: string): Sampler {
    return env === 'production'
        ? new ParentBasedSampler({ root: new TraceIdRatioBasedSampler(0.1) })
        : new AlwaysOnSampler();
}

const sdk = new NodeSDK({
    resource: new Resource({
        [SemanticResourceAttributes.SERVICE_NAME]: 'customer-dual-store-search',
        [SemanticResourceAttributes.SERVICE_VERSION]: '1.0.0',
        [SemanticResourceAttributes.DEPLOYMENT_ENVIRONMENT]: environment,
    }),
    traceExporter: new OTLPTraceExporter({
        url: process.env.OTEL_EXPORTER_OTLP_ENDPOINT || 'http://localhost:4318/v1/traces',
    }),
    sampler: samplerFor(environment),
    instrumentations: [
        getNodeAutoInstrumentations({
            '@opentelemetry/instrumentation-fs': { enabled: false },
            '@opentelemetry/instrumentation-dns': { enabled: false },
            '@opentelemetry/instrumentation-net': { enabled: false },
            '@opentelemetry/instrumentation-mongodb': { enhancedDatabaseReporting: false },
            '@opentelemetry/instrumentation-pg': { enhancedDatabaseReporting: false },
        }),
    ],
});

sdk.start();

/** Flushes pending spans; called once the Nest application has closed. */
export async function shutdownTracing(): Promise<void> {
    try {
        await sdk.shutdown();
    } catch (error) {
        console.error('Error terminating tracing', error);
    }
}
