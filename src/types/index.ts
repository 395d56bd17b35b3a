/**
 * Postwatch — Type Exports
 */

export type { TrackedAccount, MediaType, MediaAttachment, PostLink, Item } from './item';
export { TrackedAccountSchema } from './item';

export type {
  Endpoint,
  EndpointSnapshot,
  EndpointPoolSnapshot,
  EndpointPoolStats,
} from './endpoint';
export { EndpointSnapshotSchema, EndpointPoolSnapshotSchema } from './endpoint';

export type { AnalysisCategory, AnalysisResult } from './analysis';
export { AnalysisCategorySchema, AnalysisResultSchema } from './analysis';

export type {
  ChannelKind,
  NotificationPayload,
  PushTaskState,
  PushTask,
  DeliveryOutcome,
  DeliveryQueueStats,
} from './delivery';

export type { ArchiveEventKind, ArchiveEvent } from './archive';
