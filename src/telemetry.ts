import type { NodeSDK } from '@opentelemetry/sdk-node';
import type { AppConfig } from './config/appConfig';

/**
 * Starts OpenTelemetry tracing when enabled (OTEL_ENABLED=true or an OTLP
 * endpoint is configured). The SDK is imported lazily so a disabled
 * deployment never loads it. The caller owns the returned SDK and flushes
 * it on shutdown.
 */
export async function startTelemetry(config: AppConfig['telemetry']): Promise<NodeSDK | null> {
  if (!config.enabled) {
    return null;
  }

  const { NodeSDK } = await import('@opentelemetry/sdk-node');
  const { getNodeAutoInstrumentations } = await import('@opentelemetry/auto-instrumentations-node');
  const { OTLPTraceExporter } = await import('@opentelemetry/exporter-trace-otlp-http');

  const sdk = new NodeSDK({
    serviceName: config.serviceName,
    traceExporter: new OTLPTraceExporter(config.endpoint ? { url: config.endpoint } : {}),
    instrumentations: [getNodeAutoInstrumentations()]
  });

  sdk.start();
  console.log(`🔭 Telemetry enabled for ${config.serviceName}`);

  return sdk;
}
