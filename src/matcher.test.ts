import { describe, expect, test } from 'vitest'
import { AmbiguousMatchError, StoreError } from './api-utils.js'
import { OutcomeLedger } from './ledger.js'
import { Matcher, instanceWindow } from './matcher.js'
import { toDesiredEvent } from './normalizer.js'
import { MemoryCalendarStore, RecordingLogger, allDay, dateTime, feedItem } from './test-utils.js'
import type { CalendarItem, DesiredEvent } from './types.js'

function desiredOf(item: CalendarItem): DesiredEvent {
  const result = toDesiredEvent(item)
  if (result instanceof Error) throw result
  return result
}

const movedInstance = feedItem('weekly', {
  start: dateTime('2030-05-13T12:00:00Z'),
  end: dateTime('2030-05-13T13:00:00Z'),
}, { recurrenceInstanceOf: { recurrenceId: dateTime('2030-05-13T10:00:00Z') } })

function setup() {
  const store = new MemoryCalendarStore()
  const ledger = new OutcomeLedger()
  const matcher = new Matcher(store, ledger, new RecordingLogger())
  return { store, ledger, matcher }
}

function seedSeries(store: MemoryCalendarStore) {
  return store.seed({
    handle: 'series-1',
    identity: 'weekly',
    summary: 'Weekly',
    start: dateTime('2030-05-06T10:00:00Z'),
    end: dateTime('2030-05-06T11:00:00Z'),
    recurrence: ['RRULE:FREQ=WEEKLY'],
  })
}

describe('single events and series', () => {
  test('missing when the store has no event with the identity', async () => {
    const { matcher } = setup()
    expect(await matcher.resolve('uid-1', desiredOf(feedItem('uid-1')))).toEqual({ kind: 'missing' })
  })

  test('found by identity, overrides of the same series are ignored', async () => {
    const { store, matcher } = setup()
    const series = seedSeries(store)
    store.seed({ identity: 'weekly', recurringEventHandle: 'series-1', originalStart: dateTime('2030-05-13T10:00:00Z') })

    expect(await matcher.resolve('weekly', desiredOf(feedItem('weekly')))).toEqual({ kind: 'found', remote: series })
  })

  test('duplicate when the key is already in the ledger', async () => {
    const { ledger, matcher, store } = setup()
    ledger.record({ key: 'uid-1', identity: 'uid-1', outcome: 'created' })
    expect(await matcher.resolve('uid-1', desiredOf(feedItem('uid-1')))).toEqual({ kind: 'duplicate' })
    expect(store.calls).toEqual([])
  })

  test('two remote events with one identity are ambiguous', async () => {
    const { store, matcher } = setup()
    store.seed({ identity: 'uid-1' })
    store.seed({ identity: 'uid-1' })

    const result = await matcher.resolve('uid-1', desiredOf(feedItem('uid-1')))
    expect(result).toBeInstanceOf(AmbiguousMatchError)
    expect(result instanceof Error && result.message).toBe('Expected exactly one remote event for uid-1, found 2')
  })

  test('store errors are returned', async () => {
    const { store, matcher } = setup()
    store.failOn('query', 'uid-1')
    expect(await matcher.resolve('uid-1', desiredOf(feedItem('uid-1')))).toBeInstanceOf(StoreError)
  })
})

describe('recurrence instances', () => {
  const key = 'weekly#2030-05-13T10:00:00.000Z'

  test('found through the series by original start', async () => {
    const { store, matcher } = setup()
    seedSeries(store)
    store.seed({
      handle: 'series-1_0506',
      identity: 'weekly',
      recurringEventHandle: 'series-1',
      originalStart: dateTime('2030-05-06T10:00:00Z'),
      start: dateTime('2030-05-06T10:00:00Z'),
      end: dateTime('2030-05-06T11:00:00Z'),
    })
    const occurrence = store.seed({
      handle: 'series-1_0513',
      identity: 'weekly',
      recurringEventHandle: 'series-1',
      originalStart: dateTime('2030-05-13T10:00:00Z'),
      start: dateTime('2030-05-13T10:00:00Z'),
      end: dateTime('2030-05-13T11:00:00Z'),
    })

    expect(await matcher.resolve(key, desiredOf(movedInstance))).toEqual({ kind: 'found', remote: occurrence })
    expect(store.calls.map((c) => c.op)).toEqual(['query', 'queryInstances'])
  })

  test('no parent series is ambiguous', async () => {
    const { matcher } = setup()
    const result = await matcher.resolve(key, desiredOf(movedInstance))
    expect(result instanceof Error && result.message).toBe('Expected exactly one parent series for weekly, found 0')
  })

  test('no occurrence in the window is ambiguous', async () => {
    const { store, matcher } = setup()
    seedSeries(store)
    const result = await matcher.resolve(key, desiredOf(movedInstance))
    expect(result instanceof Error && result.message).toBe(
      'Expected exactly one instance 2030-05-13T10:00:00.000Z for weekly, found 0',
    )
  })
})

describe('instanceWindow', () => {
  test('covers RECURRENCE-ID and the moved time', () => {
    const desired = desiredOf(movedInstance)
    expect(instanceWindow(desired, { recurrenceId: dateTime('2030-05-13T10:00:00Z') })).toEqual({
      start: new Date('2030-05-13T10:00:00Z'),
      end: new Date('2030-05-13T13:00:00Z'),
    })
  })

  test('all-day instances are padded by a day', () => {
    const desired = desiredOf(feedItem('daily', { start: allDay('2030-05-14'), end: allDay('2030-05-15') }))
    expect(instanceWindow(desired, { recurrenceId: allDay('2030-05-13') })).toEqual({
      start: new Date('2030-05-12T00:00:00Z'),
      end: new Date('2030-05-16T00:00:00Z'),
    })
  })
})
