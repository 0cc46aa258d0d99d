import {
  canonicalKey,
  differenceByKey,
  keySet,
} from '@services/playlist-sync/identity.js'
import { describe, expect, it } from 'vitest'
import { track } from '../../../mocks/fake-catalog.js'

describe('identity', () => {
  it('should use the catalog key as the canonical key', () => {
    expect(canonicalKey(track('4021'))).toBe('4021')
  })

  it('should treat same-titled tracks with different keys as distinct', () => {
    const original = { key: '1', title: 'Intro', artist: 'Band' }
    const live = { key: '2', title: 'Intro', artist: 'Band' }

    expect(keySet([original, live]).size).toBe(2)
  })

  describe('differenceByKey', () => {
    it('should return source items missing from existing, in source order', () => {
      const source = [track('T3'), track('T1'), track('T2')]
      const existing = [{ ...track('T1'), entryId: '17' }]

      expect(differenceByKey(source, existing).map((item) => item.key)).toEqual(
        ['T3', 'T2'],
      )
    })

    it('should compare keys only', () => {
      const source = [{ key: 'T1', title: 'Renamed', artist: 'Someone' }]
      const existing = [track('T1')]

      expect(differenceByKey(source, existing)).toEqual([])
    })
  })
})
