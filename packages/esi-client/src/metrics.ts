import { metrics, ValueType } from '@opentelemetry/api';

const meter = metrics.getMeter('killtrack.esi-client');

export const requestCounter = meter.createCounter('killtrack_http_requests_total', {
  valueType: ValueType.INT,
  description:
    'Counts outbound HTTP requests grouped by operation, method, status class, and result (success/error).',
});

export const requestDurationHistogram = meter.createHistogram(
  'killtrack_http_request_duration_seconds',
  {
    description: 'Records latency for outbound HTTP requests.',
    unit: 's',
  },
);
