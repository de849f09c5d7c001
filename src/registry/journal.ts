// src/registry/journal.ts — Undo journal for all-or-nothing registry calls
//
// Components record an inverse operation for every mutation they make. The
// registry opens one frame per mutating call: commit drops the entries,
// rollback replays them newest-first so the state is exactly as before.
// Outside a frame (components used directly) recording is a no-op.

export type UndoEntry = () => void

export class Journal {
  private frame: UndoEntry[] | null = null

  /** Whether a frame is currently open */
  get active(): boolean {
    return this.frame !== null
  }

  /** Number of undo entries recorded in the open frame */
  get depth(): number {
    return this.frame?.length ?? 0
  }

  begin(): void {
    if (this.frame !== null) {
      throw new Error("Journal: frame already open")
    }
    this.frame = []
  }

  record(undo: UndoEntry): void {
    this.frame?.push(undo)
  }

  commit(): void {
    this.frame = null
  }

  rollback(): void {
    const entries = this.frame
    this.frame = null
    if (!entries) return
    for (let i = entries.length - 1; i >= 0; i--) {
      entries[i]()
    }
  }

  // ---------------------------------------------------------------------------
  // Map helpers
  // ---------------------------------------------------------------------------

  /** Set a map entry, recording how to restore the previous value (or absence) */
  setIn<K, V extends NonNullable<unknown> | null>(map: Map<K, V>, key: K, value: V): void {
    const previous = map.get(key)
    map.set(key, value)
    this.record(() => {
      if (previous === undefined) map.delete(key)
      else map.set(key, previous)
    })
  }

  /** Delete a map entry, recording how to put it back */
  deleteIn<K, V extends NonNullable<unknown> | null>(map: Map<K, V>, key: K): void {
    const previous = map.get(key)
    if (previous === undefined) return
    map.delete(key)
    this.record(() => {
      map.set(key, previous)
    })
  }
}
