import { logger as defaultLogger, type Logger } from '../logger.js'
import { normalizeDefinitionsPayload, parseFlagDefinitions } from '../schema.js'
import { prepareFlags, type PreparedFlags } from '../evaluation/orchestrator.js'
import type {
  CohortDefinitions,
  FlagDefinition,
  FlagDefinitionsPayload,
  FlagPatch,
  GroupTypeMapping,
} from '../types.js'

/**
 * One complete, immutable definition set. Readers take the current snapshot
 * once per call and never see a partially updated set.
 */
export interface DefinitionSnapshot {
  /** Starts at 1 for the first load and increases on every change */
  readonly version: number
  readonly flags: readonly FlagDefinition[]
  readonly prepared: PreparedFlags
  readonly groupTypeMapping: Readonly<GroupTypeMapping>
  readonly cohorts: Readonly<CohortDefinitions>
  /** The wire payload this snapshot was built from */
  readonly payload: FlagDefinitionsPayload
}

export interface SnapshotChange {
  snapshot: DefinitionSnapshot
  /** 0 when nothing was loaded before */
  previousVersion: number
}

/** Holds the current snapshot and swaps it by reference on every change. */
export class DefinitionStore {
  private current: DefinitionSnapshot | undefined

  constructor(private readonly log: Logger = defaultLogger) {}

  get snapshot(): DefinitionSnapshot | undefined {
    return this.current
  }

  get version(): number {
    return this.current?.version ?? 0
  }

  get isLoaded(): boolean {
    return this.current !== undefined
  }

  /** Replaces the whole set. Throws `DefinitionParseError` on a malformed payload. */
  replace(data: unknown): SnapshotChange {
    return this.swap(normalizeDefinitionsPayload(data))
  }

  /**
   * Applies a realtime patch: `deleted` removes the flag, anything else
   * upserts it with the patch fields laid over the flag's current wire form.
   */
  applyPatch(patch: FlagPatch): SnapshotChange {
    const base = this.current?.payload ?? { flags: [], group_type_mapping: {}, cohorts: {} }
    const { deleted, ...fields } = patch

    const flags: unknown[] = []
    let found = false
    for (const raw of base.flags) {
      if (isRecord(raw) && raw.key === patch.key) {
        found = true
        if (!deleted) flags.push({ ...raw, ...fields })
        continue
      }
      flags.push(raw)
    }
    if (!found && !deleted) flags.push(fields)

    this.log.debug({ flagKey: patch.key, deleted: deleted ?? false }, 'Applying flag definition patch')
    return this.swap({ ...base, flags })
  }

  private swap(payload: FlagDefinitionsPayload): SnapshotChange {
    const previousVersion = this.version
    const parsed = parseFlagDefinitions(payload, this.log)
    const snapshot: DefinitionSnapshot = {
      version: previousVersion + 1,
      flags: parsed.flags,
      prepared: prepareFlags(parsed.flags, this.log),
      groupTypeMapping: parsed.groupTypeMapping,
      cohorts: parsed.cohorts,
      payload,
    }
    this.current = snapshot
    return { snapshot, previousVersion }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
