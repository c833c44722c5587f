import { expect, test } from 'vitest'
import { OutcomeLedger, ledgerKey, summarizeLedger } from './ledger.js'
import { StoreError } from './api-utils.js'
import { allDay, dateTime } from './test-utils.js'

test('ledgerKey adds the RECURRENCE-ID for instances', () => {
  expect(ledgerKey({ identity: 'uid-1' })).toBe('uid-1')
  expect(ledgerKey({ identity: 'uid-1', recurrenceInstanceOf: { recurrenceId: allDay('2030-05-06') } })).toBe('uid-1#2030-05-06')
  expect(ledgerKey({
    identity: 'uid-1',
    recurrenceInstanceOf: { recurrenceId: dateTime('2030-05-06T12:00:00+02:00') },
  })).toBe('uid-1#2030-05-06T10:00:00.000Z')
})

test('first entry per key wins, repeats become duplicates', () => {
  const ledger = new OutcomeLedger()
  ledger.record({ key: 'a', identity: 'a', outcome: 'created' })
  const dup = ledger.record({ key: 'a', identity: 'a', outcome: 'updated' })

  expect(dup.outcome).toBe('duplicate')
  expect(ledger.get('a')?.outcome).toBe('created')
  expect(ledger.size).toBe(2)
  expect(ledger.all().map((e) => e.outcome)).toEqual(['created', 'duplicate'])
})

test('keptIdentities covers created, updated and untouched only', () => {
  const ledger = new OutcomeLedger()
  ledger.record({ key: 'a', identity: 'a', outcome: 'created' })
  ledger.record({ key: 'b', identity: 'b', outcome: 'untouched' })
  ledger.record({ key: 'c#2030-05-06', identity: 'c', outcome: 'updated' })
  ledger.record({ key: 'd', identity: 'd', outcome: 'failed' })
  ledger.record({ key: 'e', identity: 'e', outcome: 'unsupported' })

  expect([...ledger.keptIdentities()].sort()).toEqual(['a', 'b', 'c'])
})

test('summarizeLedger', () => {
  const ledger = new OutcomeLedger()
  ledger.record({ key: 'a', identity: 'a', outcome: 'created' })
  ledger.record({ key: 'b', identity: 'b', outcome: 'failed', error: new StoreError({ operation: 'create', reason: 'boom' }) })
  ledger.record({ key: 'c', identity: 'c', outcome: 'unsupported' })
  ledger.record({ key: 'a', identity: 'a', outcome: 'created' })

  expect(summarizeLedger(ledger)).toEqual({
    total: 4,
    counts: { created: 1, updated: 0, untouched: 0, duplicate: 1, unsupported: 1, failed: 1 },
    failed: [{ key: 'b', reason: 'Calendar store create failed: boom' }],
    unsupported: [{ key: 'c', reason: 'unknown' }],
  })
})
