import { describe, expect, test } from 'vitest'
import { StoreError, UnsupportedItemError, VerificationMismatchError } from './api-utils.js'
import { parseFeed } from './feed-reader.js'
import { isStale, mergeOntoRemote, reconcile } from './reconciler.js'
import { toDesiredEvent } from './normalizer.js'
import { MemoryCalendarStore, RecordingLogger, dateTime, feedItem } from './test-utils.js'
import type { OutcomeLedger } from './ledger.js'
import type { RemoteEvent } from './types.js'

function outcomes(ledger: OutcomeLedger): Array<[string, string]> {
  return ledger.all().map((e) => [e.key, e.outcome])
}

function setup() {
  return { store: new MemoryCalendarStore(), logger: new RecordingLogger() }
}

describe('create and idempotence', () => {
  test('creates missing events, second run touches nothing', async () => {
    const { store, logger } = setup()
    const items = [feedItem('a'), feedItem('b', { location: 'Room 2' })]

    const first = await reconcile(items, { store, logger })
    expect(outcomes(first)).toEqual([['a', 'created'], ['b', 'created']])
    expect(store.list().map((e) => e.identity)).toEqual(['a', 'b'])

    const writes = store.mutations().length
    const second = await reconcile(items, { store, logger })
    expect(outcomes(second)).toEqual([['a', 'untouched'], ['b', 'untouched']])
    expect(store.mutations().length).toBe(writes)
  })

  test('duplicate identity in the feed is created once', async () => {
    const { store, logger } = setup()
    const ledger = await reconcile([feedItem('a'), feedItem('a', { summary: 'Other' })], { store, logger })

    expect(outcomes(ledger)).toEqual([['a', 'created'], ['a', 'duplicate']])
    expect(store.mutations()).toEqual([{ op: 'create', target: 'a' }])
    expect(store.findByIdentity('a')[0]?.summary).toBe('Event a')
  })

  test('created event in the wrong state gets one corrective update', async () => {
    const { store, logger } = setup()
    store.createQuirk = (event) => ({ ...event, status: 'cancelled' })

    const ledger = await reconcile([feedItem('a')], { store, logger })

    expect(outcomes(ledger)).toEqual([['a', 'created']])
    expect(store.mutations().map((c) => c.op)).toEqual(['create', 'update'])
    expect(store.findByIdentity('a')[0]?.status).toBe('confirmed')
    expect(logger.messages('warn')).toEqual([
      'Created a differs from the request (status: "confirmed" != "cancelled"), updating it',
    ])
  })

  test('corrective update that does not help fails the item', async () => {
    const { store, logger } = setup()
    store.createQuirk = (event) => ({ ...event, status: 'cancelled' })
    store.updateQuirk = (event) => ({ ...event, status: 'cancelled' })

    const ledger = await reconcile([feedItem('a'), feedItem('b')], { store, logger })

    expect(ledger.get('a')?.outcome).toBe('failed')
    expect(ledger.get('a')?.error).toBeInstanceOf(VerificationMismatchError)
    expect(logger.messages('critical')).toEqual(['Corrective update did not help for a', 'Corrective update did not help for b'])
  })
})

describe('update', () => {
  test('changed fields are written', async () => {
    const { store, logger } = setup()
    const remote = store.seed({ identity: 'a', revision: 1, summary: 'Old', start: dateTime('2030-05-06T10:00:00Z'), end: dateTime('2030-05-06T11:00:00Z') })

    const ledger = await reconcile([feedItem('a', { summary: 'New' }, { revision: 2 })], { store, logger })

    expect(outcomes(ledger)).toEqual([['a', 'updated']])
    expect(store.get(remote.handle)).toMatchObject({ summary: 'New', revision: 2 })
  })

  test('stale feed revision leaves the event untouched', async () => {
    const { store, logger } = setup()
    const remote = store.seed({ identity: 'a', revision: 5, summary: 'Old', start: dateTime('2030-05-06T10:00:00Z'), end: dateTime('2030-05-06T11:00:00Z') })

    const ledger = await reconcile([feedItem('a', { summary: 'New' }, { revision: 3 })], { store, logger })

    expect(outcomes(ledger)).toEqual([['a', 'untouched']])
    expect(store.mutations()).toEqual([])
    expect(store.get(remote.handle)?.summary).toBe('Old')
  })

  test('ignoring the revision gate updates and keeps the higher revision', async () => {
    const { store, logger } = setup()
    const remote = store.seed({ identity: 'a', revision: 5, summary: 'Old', start: dateTime('2030-05-06T10:00:00Z'), end: dateTime('2030-05-06T11:00:00Z') })

    const ledger = await reconcile([feedItem('a', { summary: 'New' }, { revision: 3 })], { store, logger }, { ignoreRevisionGate: true })

    expect(outcomes(ledger)).toEqual([['a', 'updated']])
    expect(store.get(remote.handle)).toMatchObject({ summary: 'New', revision: 5 })
  })

  test('moved recurrence instance updates the matching occurrence', async () => {
    const { store, logger } = setup()
    store.seed({
      handle: 'series-1',
      identity: 'weekly',
      summary: 'Weekly',
      start: dateTime('2030-05-06T10:00:00Z'),
      end: dateTime('2030-05-06T11:00:00Z'),
      recurrence: ['RRULE:FREQ=WEEKLY'],
    })
    store.seed({
      handle: 'series-1_0513',
      identity: 'weekly',
      summary: 'Weekly',
      recurringEventHandle: 'series-1',
      originalStart: dateTime('2030-05-13T10:00:00Z'),
      start: dateTime('2030-05-13T10:00:00Z'),
      end: dateTime('2030-05-13T11:00:00Z'),
    })

    const items = [
      feedItem('weekly', {
        start: dateTime('2030-05-13T12:00:00Z'),
        end: dateTime('2030-05-13T13:00:00Z'),
        summary: 'Weekly',
      }, { recurrenceInstanceOf: { recurrenceId: dateTime('2030-05-13T10:00:00Z') } }),
      feedItem('weekly', { summary: 'Weekly', recurrenceRule: 'RRULE:FREQ=WEEKLY' }),
    ]
    const ledger = await reconcile(items, { store, logger })

    expect(outcomes(ledger)).toEqual([
      ['weekly#2030-05-13T10:00:00.000Z', 'updated'],
      ['weekly', 'untouched'],
    ])
    expect(store.mutations()).toEqual([{ op: 'update', target: 'series-1_0513' }])
    expect(store.get('series-1_0513')).toMatchObject({
      start: dateTime('2030-05-13T12:00:00Z'),
      recurringEventHandle: 'series-1',
    })
  })
})

describe('feed order', () => {
  const ics = [
    'BEGIN:VCALENDAR',
    'VERSION:2.0',
    'PRODID:-//test//feed//EN',
    'BEGIN:VEVENT',
    'UID:weekly@test',
    'DTSTAMP:20300101T000000Z',
    'RECURRENCE-ID:20300513T100000Z',
    'DTSTART:20300513T120000Z',
    'DTEND:20300513T130000Z',
    'SUMMARY:Weekly (moved)',
    'END:VEVENT',
    'BEGIN:VEVENT',
    'UID:weekly@test',
    'DTSTAMP:20300101T000000Z',
    'DTSTART:20300506T100000Z',
    'DTEND:20300506T110000Z',
    'RRULE:FREQ=WEEKLY;COUNT=4',
    'SUMMARY:Weekly',
    'END:VEVENT',
    'END:VCALENDAR',
    '',
  ].join('\r\n')

  test('override listed before its series is applied after the series is created', async () => {
    const { store, logger } = setup()
    store.occurrencesOf = () =>
      ['06', '13', '20', '27'].map((day) => ({
        start: dateTime(`2030-05-${day}T10:00:00.000Z`),
        end: dateTime(`2030-05-${day}T11:00:00.000Z`),
      }))

    const items = parseFeed(ics)
    if (items instanceof Error) throw items
    const ledger = await reconcile(items, { store, logger })

    expect(outcomes(ledger)).toEqual([
      ['weekly@test', 'created'],
      ['weekly@test#2030-05-13T10:00:00.000Z', 'updated'],
    ])
    expect(store.mutations()).toEqual([
      { op: 'create', target: 'weekly@test' },
      { op: 'update', target: 'evt-3' },
    ])
    expect(store.get('evt-3')).toMatchObject({
      summary: 'Weekly (moved)',
      recurringEventHandle: 'evt-1',
      originalStart: dateTime('2030-05-13T10:00:00.000Z'),
    })
  })
})

describe('dry run', () => {
  test('records synthetic outcomes without writing', async () => {
    const { store, logger } = setup()
    store.seed({ identity: 'b', summary: 'Old', start: dateTime('2030-05-06T10:00:00Z'), end: dateTime('2030-05-06T11:00:00Z') })

    const ledger = await reconcile([feedItem('a'), feedItem('b')], { store, logger }, { dryRun: true })

    expect(outcomes(ledger)).toEqual([['a', 'created'], ['b', 'updated']])
    expect(ledger.all().every((e) => e.synthetic)).toBe(true)
    expect(store.mutations()).toEqual([])
    expect(logger.messages('info')).toContain('[dry-run] Would create a')
    expect(logger.messages('info')).toContain('[dry-run] Would update b')
  })

  test('override of a series created in the same run is a planned create', async () => {
    const { store, logger } = setup()
    const items = [
      feedItem('weekly', { recurrenceRule: 'RRULE:FREQ=WEEKLY' }),
      feedItem('weekly', {
        start: dateTime('2030-05-13T12:00:00Z'),
        end: dateTime('2030-05-13T13:00:00Z'),
      }, { recurrenceInstanceOf: { recurrenceId: dateTime('2030-05-13T10:00:00Z') } }),
    ]

    const ledger = await reconcile(items, { store, logger }, { dryRun: true })

    expect(outcomes(ledger)).toEqual([
      ['weekly', 'created'],
      ['weekly#2030-05-13T10:00:00.000Z', 'created'],
    ])
    expect(ledger.all().every((e) => e.synthetic)).toBe(true)
    expect(store.mutations()).toEqual([])
    expect(logger.messages('error')).toEqual([])
    expect(logger.messages('info')).toContain('[dry-run] Would create weekly#2030-05-13T10:00:00.000Z with its series')
  })
})

describe('failure isolation', () => {
  test('a store error fails only its item', async () => {
    const { store, logger } = setup()
    store.failOn('create', 'b')

    const ledger = await reconcile([feedItem('a'), feedItem('b'), feedItem('c')], { store, logger })

    expect(outcomes(ledger)).toEqual([['a', 'created'], ['b', 'failed'], ['c', 'created']])
    expect(ledger.get('b')?.error).toBeInstanceOf(StoreError)
  })

  test('a throwing store fails only its item', async () => {
    const { store, logger } = setup()
    store.failOn('query', 'b', 'throw')

    const ledger = await reconcile([feedItem('a'), feedItem('b'), feedItem('c')], { store, logger })

    expect(outcomes(ledger)).toEqual([['a', 'created'], ['b', 'failed'], ['c', 'created']])
    expect(ledger.get('b')?.error?.message).toBe('Calendar store lookup failed: Error: query exploded for b')
  })

  test('unsupported items never reach the store', async () => {
    const { store, logger } = setup()

    const ledger = await reconcile([feedItem('x', { end: undefined }), feedItem('a')], { store, logger })

    expect(outcomes(ledger)).toEqual([['x', 'unsupported'], ['a', 'created']])
    expect(ledger.get('x')?.error).toBeInstanceOf(UnsupportedItemError)
    expect(store.calls.some((c) => c.target === 'x')).toBe(false)
  })

  test('items without a UID are each unsupported, not duplicates', async () => {
    const { store, logger } = setup()

    const ledger = await reconcile([feedItem(''), feedItem('', { summary: 'Other' })], { store, logger })

    expect(outcomes(ledger)).toEqual([['', 'unsupported'], ['', 'unsupported']])
    expect(ledger.counts().unsupported).toBe(2)
    expect(logger.messages('warn')).toEqual([
      'Unsupported item (no UID): missing UID',
      'Unsupported item (no UID): missing UID',
    ])
    expect(store.calls).toEqual([])
  })
})

describe('revision helpers', () => {
  const desired = toDesiredEvent(feedItem('a', {}, { revision: 3 }))
  if (desired instanceof Error) throw desired
  const remote = (revision?: number): RemoteEvent => ({
    handle: 'h', identity: 'a', summary: '', description: '', location: '', recurrence: [], revision,
  })

  test('isStale', () => {
    expect(isStale(desired, remote(4))).toBe(true)
    expect(isStale(desired, remote(3))).toBe(false)
    expect(isStale(desired, remote())).toBe(false)
  })

  test('mergeOntoRemote writes the larger revision', () => {
    expect(mergeOntoRemote(desired, remote(7)).revision).toBe(7)
    expect(mergeOntoRemote(desired, remote(1)).revision).toBe(3)
    expect(mergeOntoRemote({ ...desired, revision: undefined }, remote(2)).revision).toBe(2)
  })
})
