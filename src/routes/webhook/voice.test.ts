import { afterEach, beforeEach, describe, it, expect } from 'vitest'
import { createApp } from '../../app'
import { getSettings } from '../../config/settings'
import { SessionStore } from '../../lib/advisor/sessionStore'
import { fakeActions, newSession } from '../../testing/fixtures'
import { form, listen, type TestServer } from '../../testing/http'

describe('voice webhook', () => {
  let server: TestServer
  let sessions: SessionStore
  let handle: ReturnType<typeof fakeActions>['handle']

  beforeEach(async () => {
    const fake = fakeActions()
    handle = fake.handle
    sessions = new SessionStore(() => newSession(), 60_000)
    server = await listen(createApp({ sessions, actions: fake.actions }, getSettings()))
  })

  afterEach(async () => {
    await server.close()
  })

  const call = (fields: Record<string, string>) => fetch(`${server.url}/webhook/voice`, form(fields))
  const gather = async (fields: Record<string, string>) => {
    const res = await fetch(`${server.url}/webhook/voice/gather`, form(fields))
    expect(res.headers.get('content-type')).toContain('text/xml')
    return res.text()
  }

  it('greets the caller and listens for speech', async () => {
    const res = await call({ CallSid: 'CA-test-1' })
    const xml = await res.text()

    expect(res.headers.get('content-type')).toContain('text/xml')
    expect(xml).toContain('<Gather')
    expect(xml).toContain('action="/webhook/voice/gather"')
    expect(xml).toContain('Shall we continue?')
    expect(xml).not.toContain('**')
    expect(xml).toContain('<Redirect method="POST">/webhook/voice/gather</Redirect>')
    expect(sessions.get('CA-test-1')?.state).toBe('DISCLAIMER')
  })

  it('asks again on empty speech without moving on', async () => {
    await call({ CallSid: 'CA-test-2' })
    const xml = await gather({ CallSid: 'CA-test-2', SpeechResult: '  ' })
    expect(xml).toContain("Sorry, I didn't catch that. Could you say it again?")
    expect(sessions.get('CA-test-2')?.state).toBe('DISCLAIMER')
  })

  it('ends the call after repeated silence', async () => {
    await call({ CallSid: 'CA-test-5' })
    for (let i = 0; i < 2; i++) {
      const xml = await gather({ CallSid: 'CA-test-5', SpeechResult: '' })
      expect(xml).toContain('<Gather')
    }

    const xml = await gather({ CallSid: 'CA-test-5', SpeechResult: '' })
    expect(xml).toContain("I still couldn't hear anything, so I'll end the call here.")
    expect(xml).toContain('<Hangup/>')
    expect(xml).not.toContain('<Redirect')
    expect(sessions.get('CA-test-5')).toBeNull()
  })

  it('resets the silence count once the caller speaks', async () => {
    await call({ CallSid: 'CA-test-6' })
    for (const speech of ['', '', 'yes', '', '']) {
      const xml = await gather({ CallSid: 'CA-test-6', SpeechResult: speech })
      expect(xml).toContain('<Gather')
    }
    expect(sessions.get('CA-test-6')?.state).toBe('INTENT_CONFIRMATION')
  })

  it('starts over for an unknown call', async () => {
    const xml = await gather({ CallSid: 'CA-test-3', SpeechResult: 'hello' })
    expect(xml).toContain("Let's start again. Hello, you're speaking with the Advisor Appointment Assistant.")
    expect(sessions.get('CA-test-3')?.state).toBe('DISCLAIMER')
  })

  it('hangs up after a completed cancellation', async () => {
    await call({ CallSid: 'CA-test-4' })
    for (const speech of ['yes', 'cancel', 'NL-A742']) {
      await gather({ CallSid: 'CA-test-4', SpeechResult: speech })
    }

    const xml = await gather({ CallSid: 'CA-test-4', SpeechResult: 'yes' })
    expect(xml).toContain('Cancellation recorded for NL-A742.')
    expect(xml).toContain('Thank you for calling. Goodbye.')
    expect(xml).toContain('<Hangup/>')
    expect(xml).not.toContain('<Gather')
    expect(handle).toHaveBeenCalledWith({ kind: 'cancel', existingBookingCode: 'NL-A742' })
    expect(sessions.get('CA-test-4')).toBeNull()
  })
})
