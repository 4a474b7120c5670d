import { describe, it, expect, vi, afterEach } from 'vitest'
import { createLogger, stdioSink, type LogEntry } from '../logger'

const FIXED = new Date('2026-01-02T03:04:05.000Z')

function capture(level?: 'debug' | 'info' | 'warn' | 'error') {
  const entries: LogEntry[] = []
  const logger = createLogger({ level, sink: (e) => entries.push(e), now: () => FIXED })
  return { entries, logger }
}

describe('createLogger', () => {
  it('writes ts, level, event and fields', () => {
    const { entries, logger } = capture()
    logger.info('plan_started', { objects: 2 })
    expect(entries).toEqual([{ objects: 2, ts: '2026-01-02T03:04:05.000Z', level: 'info', event: 'plan_started' }])
  })

  it('drops entries below the threshold', () => {
    const { entries, logger } = capture('warn')
    logger.debug('a')
    logger.info('b')
    logger.warn('c')
    logger.error('d')
    expect(entries.map((e) => e.event)).toEqual(['c', 'd'])
  })

  it('adds child bindings to every entry', () => {
    const { entries, logger } = capture()
    logger.child({ requestId: 'r-1' }).child({ preset: 'Game' }).info('preset_saved')
    expect(entries[0]).toMatchObject({ requestId: 'r-1', preset: 'Game', event: 'preset_saved' })
  })

  it('does not let fields override the reserved keys', () => {
    const { entries, logger } = capture()
    logger.info('real', { event: 'fake', level: 'error' })
    expect(entries[0]?.event).toBe('real')
    expect(entries[0]?.level).toBe('info')
  })
})

describe('stdioSink', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('sends errors to stderr and everything else to stdout', () => {
    const out = vi.spyOn(process.stdout, 'write').mockImplementation(() => true)
    const err = vi.spyOn(process.stderr, 'write').mockImplementation(() => true)
    stdioSink({ ts: 't', level: 'info', event: 'a' })
    stdioSink({ ts: 't', level: 'error', event: 'b' })
    expect(out).toHaveBeenCalledWith('{"ts":"t","level":"info","event":"a"}\n')
    expect(err).toHaveBeenCalledWith('{"ts":"t","level":"error","event":"b"}\n')
  })
})
