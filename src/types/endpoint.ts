/**
 * Postwatch — Endpoint Types
 *
 * Mirror endpoint health state. The serialized form is validated on restore
 * because it is read back from disk.
 */

import { z } from 'zod';

export interface Endpoint {
  address: string;
  consecutiveFailures: number;
  lastCheckedAt: Date | null;
  disabledUntil: Date | null;

  successCount: number;
  failureCount: number;
  lastSuccessAt: Date | null;
  lastFailureAt: Date | null;
}

const nullableIsoDate = z.string().datetime().nullable();

export const EndpointSnapshotSchema = z.object({
  address: z.string().url(),
  consecutiveFailures: z.number().int().min(0),
  lastCheckedAt: nullableIsoDate,
  disabledUntil: nullableIsoDate,
  successCount: z.number().int().min(0),
  failureCount: z.number().int().min(0),
  lastSuccessAt: nullableIsoDate,
  lastFailureAt: nullableIsoDate,
});
export type EndpointSnapshot = z.infer<typeof EndpointSnapshotSchema>;

export const EndpointPoolSnapshotSchema = z.object({
  version: z.literal(1),
  endpoints: z.array(EndpointSnapshotSchema),
});
export type EndpointPoolSnapshot = z.infer<typeof EndpointPoolSnapshotSchema>;

export interface EndpointPoolStats {
  total: number;
  enabled: number;
  disabled: number;
}
