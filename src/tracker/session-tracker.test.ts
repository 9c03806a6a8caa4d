import { mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs'
import { join } from 'node:path'
import type { ChatMessage } from '../core/types.js'
import { RecordStore } from '../store/record-store.js'
import { BASE_TIME, FakeMediaResolver, image, makeTempDir, mention, msg, text } from '../testing/fixtures.js'
import { RollingCache } from './rolling-cache.js'
import { SessionTracker, buildRecordId, contextStart, mentionTargets } from './session-tracker.js'

function setup(options: { cacheSize?: number; trackingCount?: number; botId?: string } = {}) {
  const { dir, cleanup } = makeTempDir()
  const store = new RecordStore({ rootDir: join(dir, 'records') })
  const cache = new RollingCache(options.cacheSize ?? 5)
  const media = new FakeMediaResolver()
  const tracker = new SessionTracker({
    cache,
    store,
    media,
    trackingCount: options.trackingCount ?? 10,
    botId: options.botId,
    now: () => BASE_TIME,
  })
  return { dir, cleanup, store, cache, media, tracker }
}

const ids = (messages: readonly ChatMessage[]) => messages.map((m) => m.messageId)

describe('SessionTracker', () => {
  let env: ReturnType<typeof setup>

  afterEach(() => {
    env.cleanup()
  })

  describe('mention scenario (cache 2, tracking 2)', () => {
    beforeEach(() => {
      env = setup({ cacheSize: 2, trackingCount: 2 })
    })

    it('creates a record from the cached context and tracks the follow-ups', async () => {
      const { tracker, store, cache, dir } = env

      await tracker.handle('R', msg('m1', 'A'))
      await tracker.handle('R', msg('m2', 'A'))
      const third = await tracker.handle('R', msg('m3', 'B', [mention('A')]))

      expect(ids(Array.from(cache.snapshot('R')))).toEqual(['m2', 'm3'])
      expect(third.opened).toBeDefined()
      const recordId = third.opened ?? ''
      expect(ids(store.get('R', recordId)?.messages ?? [])).toEqual(['m2', 'm3'])
      expect(tracker.openSessions('R')).toEqual([
        { recordId, senderId: 'B', targetKey: 'A', remaining: 2 },
      ])

      const fourth = await tracker.handle('R', msg('m4', 'B'))
      expect(fourth.appended).toEqual([recordId])
      expect(tracker.openSessions('R')[0]?.remaining).toBe(1)

      const fifth = await tracker.handle('R', msg('m5', 'B'))
      expect(fifth.closed).toEqual([recordId])
      expect(tracker.openSessions('R')).toEqual([])

      const onDisk = JSON.parse(readFileSync(join(dir, 'records', 'R', `record_${recordId}.json`), 'utf-8'))
      expect(onDisk.messages.map((m: { messageId: string }) => m.messageId)).toEqual(['m2', 'm3', 'm4', 'm5'])
      expect(onDisk.targets).toEqual([{ id: 'A', displayName: 'A' }])
    })

    it('ignores messages after the session closed', async () => {
      const { tracker, store } = env
      const { opened } = await tracker.handle('R', msg('m1', 'B', [mention('A')]))
      await tracker.handle('R', msg('m2', 'C'))
      await tracker.handle('R', msg('m3', 'C'))
      await tracker.handle('R', msg('m4', 'C'))

      expect(ids(store.get('R', opened ?? '')?.messages ?? [])).toEqual(['m1', 'm2', 'm3'])
    })
  })

  describe('trigger phase', () => {
    beforeEach(() => {
      env = setup({ trackingCount: 3, botId: 'bot' })
    })

    it('does not open a second session for the same sender and targets', async () => {
      const { tracker, store } = env
      const first = await tracker.handle('R', msg('m1', 'B', [mention('A'), mention('C')]))
      const second = await tracker.handle('R', msg('m2', 'B', [mention('C'), mention('A')]))

      expect(second.opened).toBeUndefined()
      expect(second.appended).toEqual([first.opened])
      expect(tracker.openSessions('R')).toHaveLength(1)
      expect(store.list('R')).toHaveLength(1)
    })

    it('opens separate sessions for different targets or senders', async () => {
      const { tracker } = env
      await tracker.handle('R', msg('m1', 'B', [mention('A')]))
      await tracker.handle('R', msg('m2', 'B', [mention('C')]))
      await tracker.handle('R', msg('m3', 'D', [mention('A')]))

      expect(tracker.openSessions('R').map((s) => `${s.senderId}->${s.targetKey}`)).toEqual([
        'B->A',
        'B->C',
        'D->A',
      ])
    })

    it('opens a new session once the previous one for the same pair closed', async () => {
      const { tracker, store } = env
      await tracker.handle('R', msg('m1', 'B', [mention('A')]))
      await tracker.handle('R', msg('m2', 'C'))
      await tracker.handle('R', msg('m3', 'C'))
      // budget reaches zero on m4, so the mention in m4 starts a fresh session
      const fourth = await tracker.handle('R', msg('m4', 'B', [mention('A')]))

      expect(fourth.closed).toHaveLength(1)
      expect(fourth.opened).toBeDefined()
      expect(store.list('R')).toHaveLength(2)
    })

    it('ignores self mentions and the bot itself', async () => {
      const { tracker } = env
      const self = await tracker.handle('R', msg('m1', 'B', [mention('B')]))
      const bot = await tracker.handle('R', msg('m2', 'bot', [mention('A')]))

      expect(self.opened).toBeUndefined()
      expect(bot.opened).toBeUndefined()
      expect(tracker.openSessions('R')).toEqual([])
    })

    it('keeps rooms independent', async () => {
      const { tracker, store } = env
      const { opened } = await tracker.handle('R1', msg('m1', 'B', [mention('A')]))
      await tracker.handle('R2', msg('m2', 'C'))

      expect(ids(store.get('R1', opened ?? '')?.messages ?? [])).toEqual(['m1'])
      expect(tracker.openSessions('R1')[0]?.remaining).toBe(3)
    })
  })

  describe('budget', () => {
    it('decreases by one per observed message and closes at zero', async () => {
      env = setup({ trackingCount: 3 })
      const { tracker } = env
      await tracker.handle('R', msg('m0', 'B', [mention('A')]))

      const remaining: number[] = []
      for (const id of ['m1', 'm2', 'm3']) {
        await tracker.handle('R', msg(id, 'C'))
        remaining.push(tracker.openSessions('R')[0]?.remaining ?? 0)
      }

      expect(remaining).toEqual([2, 1, 0])
      expect(tracker.openSessions('R')).toHaveLength(0)
    })
  })

  describe('dangling sessions', () => {
    it('drops a session whose record disappeared', async () => {
      env = setup()
      const { tracker, store } = env
      const { opened } = await tracker.handle('R', msg('m1', 'B', [mention('A')]))
      await store.delete('R', opened ?? '')

      const next = await tracker.handle('R', msg('m2', 'C'))
      expect(next.dangling).toEqual([opened])
      expect(next.appended).toEqual([])
      expect(tracker.openSessions('R')).toEqual([])
    })
  })

  describe('write failures', () => {
    it('keeps tracking and writes the full record once the disk recovers', async () => {
      env = setup()
      const { tracker, store, dir } = env
      const rootDir = join(dir, 'records')
      // a plain file where the room directory should go makes every write fail
      mkdirSync(rootDir, { recursive: true })
      writeFileSync(join(rootDir, 'R'), 'in the way')

      const first = await tracker.handle('R', msg('m1', 'B', [mention('A')]))
      const recordId = first.opened ?? ''
      expect(recordId).not.toBe('')
      expect(tracker.openSessions('R')).toHaveLength(1)

      rmSync(join(rootDir, 'R'))
      const second = await tracker.handle('R', msg('m2', 'C'))

      expect(second.appended).toEqual([recordId])
      const onDisk = JSON.parse(readFileSync(join(rootDir, 'R', `record_${recordId}.json`), 'utf-8'))
      expect(onDisk.messages.map((m: { messageId: string }) => m.messageId)).toEqual(['m1', 'm2'])
      expect(store.get('R', recordId)?.messages).toHaveLength(2)
    })
  })

  describe('media', () => {
    beforeEach(() => {
      env = setup()
    })

    it('resolves images of the excerpt and of appended messages', async () => {
      const { tracker, store, cache } = env
      const cached = msg('m1', 'C', [image('https://img.test/one.png')])
      await tracker.handle('R', cached)
      const { opened } = await tracker.handle('R', msg('m2', 'B', [mention('A')]))
      await tracker.handle('R', msg('m3', 'C', [text('look'), image('https://img.test/two.png')]))

      const stored = store.get('R', opened ?? '')
      expect(stored?.associatedMedia).toEqual(['one.png', 'two.png'])
      expect(stored?.messages[0]?.content).toEqual([
        { type: 'image', url: 'https://img.test/one.png', media: { status: 'resolved', filename: 'one.png' } },
      ])
      // the cached message itself is left as it was
      expect(Array.from(cache.snapshot('R'))[0]).toBe(cached)
      expect(cached.content[0]).toEqual({ type: 'image', url: 'https://img.test/one.png' })
    })

    it('persists a placeholder when resolution fails', async () => {
      const { tracker, store, media } = env
      media.failing.add('https://img.test/broken.png')
      const { opened } = await tracker.handle('R', msg('m1', 'B', [mention('A'), image('https://img.test/broken.png')]))

      const stored = store.get('R', opened ?? '')
      expect(stored?.associatedMedia).toEqual([])
      expect(stored?.messages[0]?.content[1]).toEqual({
        type: 'image',
        url: 'https://img.test/broken.png',
        media: { status: 'unresolved' },
      })
    })

    it('opens the session with a placeholder when the resolver throws', async () => {
      const { tracker, store, media } = env
      media.throwing.add('https://img.test/crash.png')
      const { opened } = await tracker.handle('R', msg('m1', 'B', [mention('A'), image('https://img.test/crash.png')]))

      expect(opened).toBeDefined()
      expect(tracker.openSessions('R')).toHaveLength(1)
      expect(store.get('R', opened ?? '')?.messages[0]?.content[1]).toEqual({
        type: 'image',
        url: 'https://img.test/crash.png',
        media: { status: 'unresolved' },
      })
    })

    it('resolves a message once even when several sessions take it', async () => {
      const { tracker, media } = env
      await tracker.handle('R', msg('m1', 'B', [mention('A')]))
      await tracker.handle('R', msg('m2', 'D', [mention('A')]))
      await tracker.handle('R', msg('m3', 'C', [image('https://img.test/shared.png')]))

      expect(media.calls).toEqual([{ roomId: 'R', url: 'https://img.test/shared.png' }])
    })
  })
})

describe('contextStart', () => {
  it('starts one message before the sender’s most recent earlier message', () => {
    const context = [msg('c1', 'B'), msg('c2', 'C'), msg('c3', 'B'), msg('c4', 'A'), msg('c5', 'B')]
    expect(contextStart(context, 'B')).toBe(1)
  })

  it('starts at the beginning when the sender has no earlier message', () => {
    const context = [msg('c1', 'A'), msg('c2', 'C'), msg('c3', 'B')]
    expect(contextStart(context, 'B')).toBe(0)
  })

  it('does not go below zero', () => {
    const context = [msg('c1', 'B'), msg('c2', 'B')]
    expect(contextStart(context, 'B')).toBe(0)
  })
})

describe('mentionTargets', () => {
  it('drops the sender and duplicate targets', () => {
    const message = msg('m1', 'B', [mention('A', 'Alice'), mention('B'), mention('A', 'again'), mention('all', 'everyone')])
    expect(mentionTargets(message)).toEqual([
      { id: 'A', displayName: 'Alice' },
      { id: 'all', displayName: 'everyone' },
    ])
  })
})

describe('buildRecordId', () => {
  it('combines room, local time and a digest of the message id', () => {
    const id = buildRecordId('R', new Date(2026, 0, 2, 3, 4, 5).getTime(), 'msg-1')
    expect(id).toMatch(/^R_20260102030405_[0-9a-f]{8}$/)
    expect(buildRecordId('R', new Date(2026, 0, 2, 3, 4, 5).getTime(), 'msg-2')).not.toBe(id)
  })
})
