import { expect, test } from 'vitest'
import { createLogger, parseLogLevel } from './logger.js'

function capture(level: 'debug' | 'info' = 'info') {
  const lines: string[] = []
  const logger = createLogger({
    name: 'calmirror',
    level,
    color: false,
    write: (line) => lines.push(line),
    // local time, same as the rendered timestamp
    now: () => new Date(2030, 4, 6, 9, 5, 3),
  })
  return { logger, lines }
}

test('renders timestamp, name and level', () => {
  const { logger, lines } = capture()
  logger.warn('Fringe event found')
  expect(lines).toEqual(['[2030-05-06 09:05:03] calmirror WARN Fringe event found\n'])
})

test('drops messages below the level', () => {
  const { logger, lines } = capture('info')
  logger.debug('hidden')
  logger.info('shown')
  logger.critical('loud')
  expect(lines).toEqual([
    '[2030-05-06 09:05:03] calmirror INFO shown\n',
    '[2030-05-06 09:05:03] calmirror CRITICAL loud\n',
  ])
})

test('child loggers extend the name and share the sink', () => {
  const { logger, lines } = capture('debug')
  logger.child('team-a').debug('lookup')
  expect(lines).toEqual(['[2030-05-06 09:05:03] calmirror:team-a DEBUG lookup\n'])
})

test('parseLogLevel', () => {
  expect(parseLogLevel(true)).toBe('debug')
  expect(parseLogLevel(undefined)).toBe('info')
})
