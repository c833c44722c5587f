// Item Normalizer: CalendarItem → DesiredEvent.
// Pure mapping with store defaults filled in. Items without an identity or a
// complete time window are reported as unsupported instead of guessed.

import { UnsupportedItemError } from './api-utils.js'
import type { CalendarItem, DesiredEvent } from './types.js'

export function toDesiredEvent(item: CalendarItem): DesiredEvent | UnsupportedItemError {
  const { fields } = item
  if (!item.identity) {
    return new UnsupportedItemError({ identity: '(no UID)', reason: 'missing UID' })
  }
  if (!fields.start || !fields.end) {
    return new UnsupportedItemError({ identity: item.identity, reason: `missing ${fields.start ? 'end' : 'start'} time` })
  }

  return Object.freeze({
    identity: item.identity,
    revision: item.revision,
    summary: (fields.summary ?? '').trim(),
    description: fields.description ?? '',
    location: fields.location ?? '',
    status: fields.status ?? 'confirmed',
    transparency: fields.transparency ?? 'opaque',
    start: fields.start,
    end: fields.end,
    recurrence: Object.freeze(fields.recurrenceRule ? [fields.recurrenceRule] : []),
    instanceOf: item.recurrenceInstanceOf,
  })
}
