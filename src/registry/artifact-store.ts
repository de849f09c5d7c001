// src/registry/artifact-store.ts — Write-once artifact records

import { RegistryError } from "./errors.js"
import { Journal } from "./journal.js"
import type { ArtifactRecord } from "./types.js"

export class ArtifactRecordStore {
  private readonly records = new Map<bigint, ArtifactRecord>()

  constructor(private readonly journal: Journal = new Journal()) {}

  /** Store the record for a freshly allocated id. Refuses to overwrite. */
  write(tokenId: bigint, record: ArtifactRecord): void {
    if (this.records.has(tokenId)) {
      throw new Error(`ArtifactRecordStore: record for ${tokenId} already written`)
    }
    this.journal.setIn(this.records, tokenId, Object.freeze({ ...record }))
  }

  get(tokenId: bigint): ArtifactRecord {
    const record = this.records.get(tokenId)
    if (!record) {
      throw new RegistryError("InvalidToken", `Token ${tokenId} has not been minted`)
    }
    return record
  }

  get size(): number {
    return this.records.size
  }
}
