import { NodeSDK } from "@opentelemetry/sdk-node";
import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-http";
import type { Config } from "./config";

export function startTracing(config: Config): NodeSDK | null {
  if (!config.OTEL_ENABLED) return null;
  const exporter = new OTLPTraceExporter({ url: `${config.OTEL_EXPORTER_OTLP_ENDPOINT}/v1/traces` });
  const sdk = new NodeSDK({ traceExporter: exporter, serviceName: config.OTEL_SERVICE_NAME });
  sdk.start();
  return sdk;
}
