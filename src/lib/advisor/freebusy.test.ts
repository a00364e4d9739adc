import { describe, it, expect } from 'vitest'
import { extractBusyBlocks } from './freebusy'

const A = { start: '2026-02-10T04:00:00Z', end: '2026-02-10T04:30:00Z' }
const B = { start: '2026-02-11T05:00:00Z', end: '2026-02-11T06:00:00Z' }

describe('extractBusyBlocks', () => {
  it('reads the requested calendar, even when it is empty', () => {
    const fb = { calendars: { 'advisor@example.com': { busy: [] }, primary: { busy: [A] } } }
    expect(extractBusyBlocks(fb, 'advisor@example.com')).toEqual([])
  })

  it('falls back to primary, then to every calendar', () => {
    expect(extractBusyBlocks({ calendars: { primary: { busy: [A] }, other: { busy: [B] } } }, 'missing')).toEqual([A])
    expect(extractBusyBlocks({ calendars: { one: { busy: [A] }, two: { busy: [B] } } })).toEqual([A, B])
  })

  it('reads a flat busy list', () => {
    expect(extractBusyBlocks({ busy: [A, { start: 'x' }] })).toEqual([A])
  })

  it('treats a degraded or unreadable response as no data', () => {
    expect(extractBusyBlocks({ degraded: true, busy: [A] })).toEqual([])
    expect(extractBusyBlocks('oops')).toEqual([])
  })
})
