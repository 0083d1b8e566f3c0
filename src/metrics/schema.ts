import { z } from 'zod';
import { CPU_CORES } from './types.js';

const unitFloat = z.number().min(0).lt(1);

export const LoadAvgEnvelopeSchema = z.object({
  type: z.literal('load_avg'),
  payload: z.object({ value: unitFloat }).strict(),
}).strict();

export const CpuUsageEnvelopeSchema = z.object({
  type: z.literal('cpu_usage'),
  payload: z.object({ value: z.array(unitFloat).length(CPU_CORES) }).strict(),
}).strict();

export const KernelUpgradeEnvelopeSchema = z.object({
  type: z.literal('last_kernel_upgrade'),
  payload: z.object({ value: z.string().datetime({ offset: true }) }).strict(),
}).strict();

export const MetricEnvelopeSchema = z.discriminatedUnion('type', [
  LoadAvgEnvelopeSchema,
  CpuUsageEnvelopeSchema,
  KernelUpgradeEnvelopeSchema,
]);

export const MetricsResponseSchema = z.array(MetricEnvelopeSchema);

export type MetricsResponse = z.infer<typeof MetricsResponseSchema>;
