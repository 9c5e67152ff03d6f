import { describe, it, expect } from 'vitest'
import { DefinitionParseError } from '../errors.js'
import { createLogger } from '../logger.js'
import { DefinitionStore } from './store.js'

const log = createLogger({ name: 'test', level: 'silent' })

const payload = {
  flags: [
    { id: 1, key: 'beta-feature', active: true, filters: { groups: [{ rollout_percentage: 100 }] } },
    { id: 2, key: 'dependent', active: true, filters: { groups: [{ properties: [{ key: 1, type: 'flag', value: true }] }] } },
  ],
  group_type_mapping: { '0': 'company' },
}

describe('DefinitionStore', () => {
  it('starts empty at version 0', () => {
    const store = new DefinitionStore(log)
    expect(store.snapshot).toBeUndefined()
    expect(store.version).toBe(0)
    expect(store.isLoaded).toBe(false)
  })

  it('builds a new snapshot on every replace', () => {
    const store = new DefinitionStore(log)
    const first = store.replace(payload)
    expect(first.previousVersion).toBe(0)
    expect(first.snapshot.version).toBe(1)
    expect(first.snapshot.flags.map((flag) => flag.key)).toEqual(['beta-feature', 'dependent'])
    expect(first.snapshot.groupTypeMapping).toEqual({ '0': 'company' })
    expect(first.snapshot.prepared.idToKey.get('1')).toBe('beta-feature')
    expect(Array.from(first.snapshot.prepared.graph.getDependencies('dependent'))).toEqual(['beta-feature'])

    const second = store.replace({ flags: [] })
    expect(second.previousVersion).toBe(1)
    expect(second.snapshot.version).toBe(2)
    expect(store.snapshot).toBe(second.snapshot)
  })

  it('rejects a malformed payload and keeps the current snapshot', () => {
    const store = new DefinitionStore(log)
    const { snapshot } = store.replace(payload)
    expect(() => store.replace({ flags: {} })).toThrow(DefinitionParseError)
    expect(store.snapshot).toBe(snapshot)
  })

  describe('applyPatch', () => {
    it('lays patch fields over the existing flag', () => {
      const store = new DefinitionStore(log)
      const { snapshot: before } = store.replace(payload)
      const { snapshot, previousVersion } = store.applyPatch({ key: 'beta-feature', active: false })

      expect(previousVersion).toBe(1)
      expect(snapshot.version).toBe(2)
      expect(snapshot.prepared.flagsByKey.get('beta-feature')).toMatchObject({ id: 1, active: false })
      expect(before.prepared.flagsByKey.get('beta-feature')?.active).toBe(true)
    })

    it('adds a flag it has not seen', () => {
      const store = new DefinitionStore(log)
      store.replace(payload)
      const { snapshot } = store.applyPatch({ key: 'new-flag', id: 3, active: true })
      expect(snapshot.flags.map((flag) => flag.key)).toEqual(['beta-feature', 'dependent', 'new-flag'])
    })

    it('removes a deleted flag', () => {
      const store = new DefinitionStore(log)
      store.replace(payload)
      const { snapshot } = store.applyPatch({ key: 'beta-feature', deleted: true })
      expect(snapshot.flags.map((flag) => flag.key)).toEqual(['dependent'])
      expect(snapshot.prepared.flagsByKey.has('beta-feature')).toBe(false)
    })

    it('starts from an empty set before the first load', () => {
      const store = new DefinitionStore(log)
      const { snapshot } = store.applyPatch({ key: 'beta-feature', id: 1 })
      expect(snapshot.version).toBe(1)
      expect(snapshot.flags.map((flag) => flag.key)).toEqual(['beta-feature'])
    })

    it('leaves an invalid upsert out of the evaluated set', () => {
      const store = new DefinitionStore(log)
      store.replace(payload)
      const { snapshot } = store.applyPatch({ key: 'no-id' })
      expect(snapshot.prepared.flagsByKey.has('no-id')).toBe(false)
      expect(snapshot.flags).toHaveLength(2)
    })
  })
})
