export const METRIC_KINDS = ['load_avg', 'cpu_usage', 'last_kernel_upgrade'] as const;

export type MetricKind = typeof METRIC_KINDS[number];

export const CPU_CORES = 5;

export interface LoadAvgPayload { readonly value: number }
export interface CpuUsagePayload { readonly value: readonly number[] }
export interface KernelUpgradePayload { readonly value: Date }

export type MetricEnvelope =
  | { readonly type: 'load_avg'; readonly payload: LoadAvgPayload }
  | { readonly type: 'cpu_usage'; readonly payload: CpuUsagePayload }
  | { readonly type: 'last_kernel_upgrade'; readonly payload: KernelUpgradePayload };

// Wire shapes: timestamps travel as RFC 3339 strings
export type MetricEnvelopeJson =
  | { type: 'load_avg'; payload: { value: number } }
  | { type: 'cpu_usage'; payload: { value: number[] } }
  | { type: 'last_kernel_upgrade'; payload: { value: string } };

function assertNever(x: never): never {
  throw new Error(`Unhandled metric kind: ${JSON.stringify(x)}`);
}

export function toJson(envelope: MetricEnvelope): MetricEnvelopeJson {
  switch (envelope.type) {
    case 'load_avg':
      return { type: 'load_avg', payload: { value: envelope.payload.value } };
    case 'cpu_usage':
      return { type: 'cpu_usage', payload: { value: [...envelope.payload.value] } };
    case 'last_kernel_upgrade':
      return { type: 'last_kernel_upgrade', payload: { value: envelope.payload.value.toISOString() } };
    default:
      return assertNever(envelope);
  }
}

export function serializeMetrics(envelopes: readonly MetricEnvelope[]): string {
  return JSON.stringify(envelopes.map(toJson));
}
