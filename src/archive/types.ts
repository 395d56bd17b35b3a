/**
 * Postwatch — Archive sink contract
 */

import type { ArchiveEvent } from '../types';

/**
 * Fire-and-forget event log. `record` never throws and never blocks the
 * caller; write errors are logged by the sink.
 */
export interface ArchiveSink {
  record(event: ArchiveEvent): void;
  /** Resolves once every event recorded so far has been written. */
  flush(): Promise<void>;
}
