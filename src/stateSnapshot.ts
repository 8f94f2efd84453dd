import { Diagnostics, DiagnosticsSnapshot } from './diagnostics';
import { ManagerSnapshot, StrategyManager } from './strategyManager';

// What GET /state returns and what the dashboard socket pushes.
export interface StateSnapshot extends ManagerSnapshot {
  diagnostics: DiagnosticsSnapshot;
  durabilityDegraded: boolean;
  lastCheckpointAt: string | null;
  feedConnected: boolean;
}

export interface SnapshotSources {
  manager: StrategyManager;
  diagnostics: Diagnostics;
  durability: { degraded: boolean; savedAt: string | null };
  feed?: { connected: boolean };
}

export const buildStateSnapshot = (src: SnapshotSources): StateSnapshot => ({
  ...src.manager.snapshot(),
  diagnostics: src.diagnostics.snapshot(),
  durabilityDegraded: src.durability.degraded,
  lastCheckpointAt: src.durability.savedAt,
  feedConnected: src.feed?.connected ?? false,
});
