import { describe, it, expect } from 'vitest'
import { detectCompletion, stepAndComplete } from './completion'
import { fakeActions, newSession, OK_RESULT, runTurns, slot } from '../../testing/fixtures'

const FIXED_CODE = async () => 'NL-A742'

describe('detectCompletion', () => {
  it('reports a new booking once, on the confirming turn', async () => {
    const session = newSession({ generateBookingCode: FIXED_CODE })
    await runTurns(session, ['hi', 'yes', 'book', 'sip mandate', 'Friday, 10am', 'second'])

    const before = session.state
    const done = await session.step('yes')
    expect(detectCompletion(before, done)).toEqual({
      kind: 'booking',
      bookingCode: 'NL-A742',
      topic: 'SIP/Mandates',
      slot: slot('2026-02-13', '09:00'),
    })

    const again = await session.step('thanks')
    expect(detectCompletion('BOOKING_COMPLETE', again)).toBeNull()
  })

  it('reports a reschedule with the existing code', async () => {
    const session = newSession()
    await runTurns(session, ['hi', 'yes', 'reschedule', 'NL-B123', '12 Feb 2pm', '1'])
    const done = await session.step('yes')
    expect(detectCompletion('CONFIRMATION', done)).toEqual({
      kind: 'reschedule',
      existingBookingCode: 'NL-B123',
      slot: slot('2026-02-12', '14:30'),
    })
  })

  it('reports a cancellation', async () => {
    const session = newSession()
    await runTurns(session, ['hi', 'yes', 'cancel', 'NL-A742'])
    const done = await session.step('yes')
    expect(detectCompletion('CANCEL_CONFIRM', done)).toEqual({ kind: 'cancel', existingBookingCode: 'NL-A742' })
  })

  it('reports a waitlist request with the preference text', async () => {
    const session = newSession()
    await runTurns(session, ['hi', 'yes', 'book', 'kyc', 'Monday 10am'])
    const done = await session.step('yes')
    expect(detectCompletion('SLOT_OFFER', done)).toEqual({
      kind: 'waitlist',
      topic: 'KYC/Onboarding',
      preferredDatetimeText: 'Monday 10am',
    })
  })

  it('ignores turns that do not finish anything', async () => {
    const session = newSession()
    const turn = await session.step('hi')
    expect(detectCompletion('GREETING', turn)).toBeNull()
  })
})

describe('stepAndComplete', () => {
  it('runs the actions for the finishing turn only', async () => {
    const { actions, handle } = fakeActions()
    const session = newSession()
    await runTurns(session, ['hi', 'yes', 'cancel', 'NL-A742'])

    const done = await stepAndComplete(session, 'yes', actions)
    expect(done.completion).toEqual({ kind: 'cancel', existingBookingCode: 'NL-A742' })
    expect(done.integrations).toEqual(OK_RESULT)
    expect(handle).toHaveBeenCalledTimes(1)

    const after = await stepAndComplete(session, 'thanks', actions)
    expect(after.completion).toBeNull()
    expect(after.integrations).toBeNull()
    expect(handle).toHaveBeenCalledTimes(1)
  })

  it('runs overlapping turns one after the other', async () => {
    const { actions, handle } = fakeActions()
    let issued = 0
    const slowCode = async () => {
      issued += 1
      const code = `NL-A10${issued}`
      await new Promise((resolve) => setTimeout(resolve, 5))
      return code
    }
    const session = newSession({ generateBookingCode: slowCode })
    await runTurns(session, ['hi', 'yes', 'book', 'kyc', 'Friday, 10am', 'first'])

    const [first, second] = await Promise.all([
      stepAndComplete(session, 'yes', actions),
      stepAndComplete(session, 'yes', actions),
    ])

    expect(first.completion).toEqual({
      kind: 'booking',
      bookingCode: 'NL-A101',
      topic: 'KYC/Onboarding',
      slot: slot('2026-02-13', '10:30'),
    })
    expect(second.turn.state).toBe('BOOKING_COMPLETE')
    expect(second.completion).toBeNull()
    expect(handle).toHaveBeenCalledTimes(1)
    expect(issued).toBe(1)
    expect(session.context.bookingCode).toBe('NL-A101')
  })

  it('lets the next turn run after failed actions', async () => {
    const { actions, handle } = fakeActions()
    handle.mockRejectedValueOnce(new Error('sheet down'))
    const session = newSession()
    await runTurns(session, ['hi', 'yes', 'cancel', 'NL-A742'])

    await expect(stepAndComplete(session, 'yes', actions)).rejects.toThrow('sheet down')
    const next = await session.step('thanks')
    expect(next.state).toBe('BOOKING_COMPLETE')
  })

  it('reports the completion without actions configured', async () => {
    const session = newSession()
    await runTurns(session, ['hi', 'yes', 'cancel', 'NL-A742'])
    const done = await stepAndComplete(session, 'yes', null)
    expect(done.completion?.kind).toBe('cancel')
    expect(done.integrations).toBeNull()
  })
})
