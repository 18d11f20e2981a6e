/**
 * OpenTelemetry SDK lifecycle
 *
 * Provides:
 * - NodeSDK configuration with OTLP trace and metric exporters
 * - Start/stop from configuration (disabled by default for a CLI process)
 * - Graceful shutdown flushing pending spans and metrics
 */

import { NodeSDK } from '@opentelemetry/sdk-node';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-http';
import { OTLPMetricExporter } from '@opentelemetry/exporter-metrics-otlp-http';
import { PeriodicExportingMetricReader } from '@opentelemetry/sdk-metrics';
import { Resource } from '@opentelemetry/resources';
import { ATTR_SERVICE_NAME, ATTR_SERVICE_VERSION } from '@opentelemetry/semantic-conventions';
import { metrics, trace, type Meter, type Tracer } from '@opentelemetry/api';

// =============================================================================
// Types
// =============================================================================

export interface TelemetryOptions {
  /** Whether to start the SDK at all (default: false) */
  enabled?: boolean;
  /** Service name override (default: OTEL_SERVICE_NAME env var or 'dbchat-agent') */
  serviceName?: string;
  serviceVersion?: string;
  /** OTLP endpoint base URL; exporters append /v1/traces and /v1/metrics */
  endpoint?: string;
  /** Metric export interval in milliseconds (default: 60000) */
  metricExportIntervalMs?: number;
}

// =============================================================================
// TelemetryManager
// =============================================================================

/**
 * Owns the OpenTelemetry NodeSDK.
 *
 * Tracers and meters always come from the global API: before `start()` (or when
 * disabled) they are the API's no-op implementations.
 *
 * @example
 * ```typescript
 * const telemetry = new TelemetryManager({ enabled: true, endpoint: 'http://localhost:4318' });
 * await telemetry.start();
 * // ... run turns
 * await telemetry.shutdown();
 * ```
 */
export class TelemetryManager {
  private sdk: NodeSDK | null = null;
  private readonly enabled: boolean;
  private readonly serviceName: string;
  private readonly serviceVersion: string;
  private readonly endpoint: string | undefined;
  private readonly metricExportIntervalMs: number;

  constructor(options: TelemetryOptions = {}) {
    this.enabled = options.enabled ?? false;
    this.serviceName = options.serviceName ?? process.env['OTEL_SERVICE_NAME'] ?? 'dbchat-agent';
    this.serviceVersion = options.serviceVersion ?? '0.1.0';
    this.endpoint = options.endpoint ?? process.env['OTEL_EXPORTER_OTLP_ENDPOINT'];
    this.metricExportIntervalMs = options.metricExportIntervalMs ?? 60000;
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  isStarted(): boolean {
    return this.sdk !== null;
  }

  /**
   * Starts the SDK. No-op when disabled or already started.
   */
  async start(): Promise<void> {
    if (!this.enabled || this.sdk) {
      return;
    }

    const resource = new Resource({
      [ATTR_SERVICE_NAME]: this.serviceName,
      [ATTR_SERVICE_VERSION]: this.serviceVersion,
    });

    const traceExporterConfig = this.endpoint ? { url: `${this.endpoint}/v1/traces` } : undefined;
    const metricExporterConfig = this.endpoint ? { url: `${this.endpoint}/v1/metrics` } : undefined;

    const sdk = new NodeSDK({
      resource,
      traceExporter: new OTLPTraceExporter(traceExporterConfig),
      metricReader: new PeriodicExportingMetricReader({
        exporter: new OTLPMetricExporter(metricExporterConfig),
        exportIntervalMillis: this.metricExportIntervalMs,
      }),
    });

    sdk.start();
    this.sdk = sdk;
  }

  /**
   * Flushes and shuts the SDK down. No-op when it was never started.
   */
  async shutdown(): Promise<void> {
    if (!this.sdk) {
      return;
    }
    try {
      await this.sdk.shutdown();
    } finally {
      this.sdk = null;
    }
  }

  getTracer(name: string = this.serviceName, version?: string): Tracer {
    return trace.getTracer(name, version);
  }

  getMeter(name: string = this.serviceName, version?: string): Meter {
    return metrics.getMeter(name, version);
  }
}
