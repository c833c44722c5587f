import { expect, test } from 'vitest'
import { UnsupportedItemError } from './api-utils.js'
import { toDesiredEvent } from './normalizer.js'
import { allDay, dateTime, feedItem } from './test-utils.js'

test('fills store defaults', () => {
  const result = toDesiredEvent(feedItem('uid-1', { summary: '  Planning  ' }, { revision: 4 }))
  expect(result).toEqual({
    identity: 'uid-1',
    revision: 4,
    summary: 'Planning',
    description: '',
    location: '',
    status: 'confirmed',
    transparency: 'opaque',
    start: dateTime('2030-05-06T10:00:00Z'),
    end: dateTime('2030-05-06T11:00:00Z'),
    recurrence: [],
    instanceOf: undefined,
  })
})

test('keeps explicit values and the recurrence rule', () => {
  const result = toDesiredEvent(feedItem('uid-2', {
    status: 'tentative',
    transparency: 'transparent',
    start: allDay('2030-05-06'),
    end: allDay('2030-05-07'),
    recurrenceRule: 'RRULE:FREQ=WEEKLY',
  }))
  if (result instanceof Error) throw result
  expect(result.status).toBe('tentative')
  expect(result.transparency).toBe('transparent')
  expect(result.recurrence).toEqual(['RRULE:FREQ=WEEKLY'])
})

test('result is frozen', () => {
  const result = toDesiredEvent(feedItem('uid-3'))
  expect(Object.isFrozen(result)).toBe(true)
})

test('recurrence instances carry their RECURRENCE-ID', () => {
  const ref = { recurrenceId: dateTime('2030-05-13T10:00:00Z') }
  const result = toDesiredEvent(feedItem('uid-4', {}, { recurrenceInstanceOf: ref }))
  if (result instanceof Error) throw result
  expect(result.instanceOf).toEqual(ref)
})

test('missing UID is unsupported', () => {
  const result = toDesiredEvent(feedItem(''))
  expect(result).toBeInstanceOf(UnsupportedItemError)
  expect(result instanceof Error && result.message).toBe('Unsupported item (no UID): missing UID')
})

test('missing times are unsupported', () => {
  const noStart = toDesiredEvent(feedItem('uid-5', { start: undefined }))
  expect(noStart instanceof Error && noStart.message).toBe('Unsupported item uid-5: missing start time')

  const noEnd = toDesiredEvent(feedItem('uid-6', { end: undefined }))
  expect(noEnd instanceof Error && noEnd.message).toBe('Unsupported item uid-6: missing end time')
})
