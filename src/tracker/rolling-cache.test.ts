import { msg } from '../testing/fixtures.js'
import { RollingCache } from './rolling-cache.js'

describe('RollingCache', () => {
  it('keeps at most capacity messages, evicting the oldest first', () => {
    const cache = new RollingCache(3)
    const messages = ['m1', 'm2', 'm3', 'm4', 'm5'].map((id) => msg(id, 'A'))

    for (const m of messages) {
      cache.observe('R', m)
      expect(cache.size('R')).toBeLessThanOrEqual(3)
    }

    expect(Array.from(cache.snapshot('R')).map((m) => m.messageId)).toEqual(['m3', 'm4', 'm5'])
  })

  it('keeps rooms apart', () => {
    const cache = new RollingCache(2)
    cache.observe('R1', msg('a', 'A'))
    cache.observe('R2', msg('b', 'B'))

    expect(Array.from(cache.snapshot('R1')).map((m) => m.messageId)).toEqual(['a'])
    expect(Array.from(cache.snapshot('R2')).map((m) => m.messageId)).toEqual(['b'])
    expect(Array.from(cache.snapshot('R3'))).toEqual([])
  })

  it('snapshot is a one-shot view unaffected by later messages', () => {
    const cache = new RollingCache(2)
    cache.observe('R', msg('m1', 'A'))
    const snapshot = cache.snapshot('R')
    cache.observe('R', msg('m2', 'A'))
    cache.observe('R', msg('m3', 'A'))

    expect(Array.from(snapshot).map((m) => m.messageId)).toEqual(['m1'])
    expect(Array.from(snapshot)).toEqual([])
  })

  it('applies a new capacity only to rooms created afterwards', () => {
    const cache = new RollingCache(1)
    cache.observe('old', msg('o1', 'A'))
    cache.setCapacity(3)
    cache.observe('old', msg('o2', 'A'))
    cache.observe('new', msg('n1', 'A'))
    cache.observe('new', msg('n2', 'A'))

    expect(cache.size('old')).toBe(1)
    expect(cache.size('new')).toBe(2)
  })

  it('clear drops a room', () => {
    const cache = new RollingCache(2)
    cache.observe('R', msg('m1', 'A'))
    cache.clear('R')
    expect(cache.size('R')).toBe(0)
  })
})
