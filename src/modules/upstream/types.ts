import { z } from 'zod';

// ============================================================================
// Upstream Response Schemas
// ============================================================================

// The upstream sends numbers either as JSON numbers or as numeric strings
export const numeric = z.union([z.number(), z.string().trim().regex(/^-?\d+(\.\d+)?$/)]);

export type NumericValue = z.infer<typeof numeric>;

export const ladderSchema = z.object({
  ladderLevel: z.coerce.number().int().nullish(),
  ladderStartValue: numeric.nullish(),
  ladderEndValue: numeric.nullish(),
  gasPrice: numeric,
  ladderCycleDesc: z.string().nullish(),
});

export const dailyUsageSchema = z.object({
  date: z.string().nullish(),
  usageDate: z.string().nullish(),
  usage: numeric.nullish(),
});

export const energyAnalysisSchema = z.object({
  balance: numeric,
  arrearsAmount: numeric.nullish(),
  currentMonthUsage: numeric.nullish(),
  currentMonthCost: numeric.nullish(),
  currentMonthEstimateCost: numeric.nullish(),
  lastMonthBalance: numeric.nullish(),
  totalGasCount: numeric.nullish(),
  availableDays: numeric.nullish(),
  gasPrice: numeric.nullish(),
  ladderCycleDesc: z.string().nullish(),
  ladderDtoList: z.array(ladderSchema).nullish(),
  dailyUsageList: z.array(dailyUsageSchema).nullish(),
});

export const orderSchema = z.object({
  orderId: z.union([z.string(), z.number()]).transform(String),
  createTime: z.string().nullish(),
  numDesc: numeric.nullish(),
  orderStat: z.coerce.number().int().nullish(),
});

export const envelopeSchema = z.object({
  resultCode: z.coerce.number().int().optional(),
  code: z.coerce.number().int().optional(),
  message: z.string().nullish(),
  data: z.unknown(),
});

export type EnergyAnalysis = z.infer<typeof energyAnalysisSchema>;
export type UpstreamOrder = z.infer<typeof orderSchema>;
export type UpstreamEnvelope = z.infer<typeof envelopeSchema>;

// Order status the upstream uses for a completed payment
export const ORDER_STATUS_COMPLETED = 3;

// Result codes the upstream uses for an invalid or expired token
export const AUTH_RESULT_CODES: ReadonlySet<number> = new Set([401, 403]);

export interface UpstreamClientConfig {
  analysisUrl: string;
  orderListUrl: string;
  token: string;
  paymentNo: string;
  companyCode: string;
  cityId: string;
  clientType: string;
  apiSecret: string;
  timeoutMs: number;
  orderPageSize: number;
  localOffsetHours: number;
}
