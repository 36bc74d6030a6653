/**
 * Job and sync-mapping records
 */

export type JobStatus = "pending" | "running" | "success" | "failed";

export interface ScrapeJob {
  id: number;
  siteId: string;
  status: JobStatus;
  startedAt: string | null;
  finishedAt: string | null;
  totalFound: number;
  totalCreated: number;
  totalUpdated: number;
  totalFailed: number;
  errorMessage: string | null;
}

export type SyncStatus = "success" | "failed";

export interface SyncMapping {
  siteId: string;
  externalId: string;
  remoteProductId: number | null;
  lastSyncStatus: SyncStatus;
  lastSyncedAt: string;
  lastPayloadSnapshot: string | null;
  lastError: string | null;
}
