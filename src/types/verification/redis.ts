export interface RedisKeys {
  /** Serialised reference data snapshot shared by all workers */
  referenceSnapshot: () => string;
  /** Single-writer lock guarding the snapshot build */
  referenceSnapshotLock: () => string;
}

export const RedisKey: RedisKeys = {
  referenceSnapshot: () => `verifier:reference:snapshot`,
  referenceSnapshotLock: () => `verifier:reference:snapshot:lock`,
};
