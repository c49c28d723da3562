/**
 * Version control recording contract
 */

import type { ShrineConfig } from '@shrine/ipc';

/** `init` for the first persist of a shrine, `update` for every later one */
export type ChangeKind = 'init' | 'update';

export interface RecordResult {
  staged: boolean;
  committed: boolean;
  pushed: boolean;
  /** Non-fatal git failures, already logged */
  warnings: string[];
}

export interface VersionControl {
  /**
   * Record a persisted change of `shrinePath`. `config` is the configuration
   * as written, so a change to the git options applies to its own record.
   */
  record(kind: ChangeKind, shrinePath: string, config: ShrineConfig): Promise<RecordResult>;
}

export const noVersionControl: VersionControl = {
  async record() {
    return { staged: false, committed: false, pushed: false, warnings: [] };
  },
};
