import { beforeEach, describe, it, expect, vi } from 'vitest'

vi.mock('./googleAuth', () => ({ googleFetch: vi.fn() }))

import { googleFetch } from './googleAuth'
import { appendLedgerRow, findLedgerRow, updateLedgerCells } from './googleSheets'

const fetchMock = vi.mocked(googleFetch)
const REF = { accountId: 'advisor', sheetId: 'sheet-1' }
const BASE = 'https://sheets.googleapis.com/v4/spreadsheets/sheet-1/values'

function jsonResponse(body: unknown, status = 200) {
  return new Response(JSON.stringify(body), { status })
}

describe('googleSheets', () => {
  beforeEach(() => {
    fetchMock.mockReset()
  })

  it('appends a row in column order', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({}))

    await appendLedgerRow(REF, {
      timestamp: '2026-02-01 08:30:00 UTC',
      bookingCode: 'NL-A742',
      topic: 'KYC/Onboarding',
      slotLabel: 'Wednesday, Feb 11 at 3:00 PM IST',
      status: 'tentative',
      source: 'voice_agent',
    })

    const [, url, init] = fetchMock.mock.calls[0]
    expect(url).toBe(`${BASE}/A%3AF:append?valueInputOption=USER_ENTERED&insertDataOption=INSERT_ROWS`)
    expect(init?.method).toBe('POST')
    expect(JSON.parse(String(init?.body))).toEqual({
      values: [
        ['2026-02-01 08:30:00 UTC', 'NL-A742', 'KYC/Onboarding', 'Wednesday, Feb 11 at 3:00 PM IST', 'tentative', 'voice_agent'],
      ],
    })
  })

  it('finds the 1-based row of a booking code', async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({
        values: [
          ['Timestamp', 'Code', 'Topic'],
          ['2026-02-01 08:30:00 UTC', 'NL-A742', 'KYC/Onboarding'],
          ['2026-02-02 09:00:00 UTC', 'NL-B123', 'SIP/Mandates'],
        ],
      })
    )
    expect(await findLedgerRow(REF, 'nl b123')).toBe(3)
  })

  it('returns null for an unknown code', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ values: [['t', 'NL-A742']] }))
    expect(await findLedgerRow(REF, 'NL-Z999')).toBeNull()
  })

  it('writes consecutive cells of one row', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({}))

    await updateLedgerCells(REF, 4, 'D', ['Friday, Feb 13 at 9:00 AM IST', 'rescheduled'])

    const [, url, init] = fetchMock.mock.calls[0]
    expect(url).toBe(`${BASE}/D4%3AE4?valueInputOption=USER_ENTERED`)
    expect(init?.method).toBe('PUT')
    expect(JSON.parse(String(init?.body))).toEqual({
      range: 'D4:E4',
      values: [['Friday, Feb 13 at 9:00 AM IST', 'rescheduled']],
    })
  })

  it('throws google_sheets_failed on an API error', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ error: 'nope' }, 500))
    await expect(findLedgerRow(REF, 'NL-A742')).rejects.toThrow('google_sheets_failed')
  })
})
