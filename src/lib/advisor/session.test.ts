import { describe, it, expect } from 'vitest'
import { DISCLAIMER } from './catalog'
import { newSession, runTurns, slot } from '../../testing/fixtures'

const FIXED_CODE = async () => 'NL-A742'

describe('ConversationSession', () => {
  it('greets and reads the disclaimer whatever the first message is', async () => {
    const session = newSession()
    const turn = await session.step('hi')
    expect(turn.state).toBe('DISCLAIMER')
    expect(turn.text).toContain(DISCLAIMER)
    expect(turn.text.endsWith('Shall we continue?')).toBe(true)
  })

  it('waits at the disclaimer until the user agrees', async () => {
    const session = newSession()
    const [, notYet, agreed] = await runTurns(session, ['hi', 'not now', 'ok'])
    expect(notYet.state).toBe('DISCLAIMER')
    expect(notYet.text).toBe(
      "No problem. When you're ready, just say you'd like to continue with booking or questions."
    )
    expect(agreed.state).toBe('INTENT_CONFIRMATION')
  })

  it('books a new slot end to end', async () => {
    const session = newSession({ generateBookingCode: FIXED_CODE })
    const turns = await runTurns(session, [
      'hi',
      'yes',
      'I want to book an appointment',
      'kyc',
      'Friday, 10am',
      'first',
      'yes',
    ])

    expect(turns.map((t) => t.state)).toEqual([
      'DISCLAIMER',
      'INTENT_CONFIRMATION',
      'TOPIC_COLLECTION',
      'DATETIME_COLLECTION',
      'SLOT_OFFER',
      'CONFIRMATION',
      'BOOKING_COMPLETE',
    ])

    const offer = turns[4]
    expect(offer.context.offeredSlots).toEqual([slot('2026-02-13', '10:30'), slot('2026-02-13', '09:00')])
    expect(offer.text).toContain('1. Friday, Feb 13 at 10:30 AM Asia/Kolkata\n2. Friday, Feb 13 at 9:00 AM Asia/Kolkata')

    expect(turns[5].text).toBe(
      'Just to confirm, I have you for:\n' +
        '- Friday, Feb 13 at 10:30 AM Asia/Kolkata\n\n' +
        'All times are in IST. Shall I place a tentative hold for this advisor slot?'
    )

    const done = turns[6]
    expect(done.context).toMatchObject({
      intent: 'book_new',
      topicLabel: 'KYC/Onboarding',
      preferredDatetimeText: 'Friday, 10am',
      chosenSlotIndex: 0,
      bookingCode: 'NL-A742',
      existingBookingCode: null,
    })
    expect(done.text).toContain('- Topic: KYC/Onboarding\n')
    expect(done.text).toContain('- Slot: Friday, Feb 13 at 10:30 AM Asia/Kolkata\n')
    expect(done.text).toContain('- Booking code: NL-A742\n')
    expect(done.text).toContain('/complete-booking/NL-A742')
  })

  it('repeats the summary once complete', async () => {
    const session = newSession({ generateBookingCode: FIXED_CODE })
    const turns = await runTurns(session, ['hi', 'yes', 'book', 'tax statement', '10 Feb', '1', 'yes', 'thanks'])
    expect(turns[7].state).toBe('BOOKING_COMPLETE')
    expect(turns[7].text).toBe(turns[6].text)
  })

  it('reschedules an existing booking and keeps its code', async () => {
    const session = newSession({ generateBookingCode: FIXED_CODE })
    const turns = await runTurns(session, ['hi', 'yes', 'I need to reschedule', 'NL-B123', 'Wednesday 3pm', 'second', 'yes'])

    expect(turns.slice(2).map((t) => t.state)).toEqual([
      'RESCHEDULE_ASK_CODE',
      'DATETIME_COLLECTION',
      'SLOT_OFFER',
      'CONFIRMATION',
      'BOOKING_COMPLETE',
    ])
    const done = turns[6]
    expect(done.context).toMatchObject({ intent: 'reschedule', existingBookingCode: 'NL-B123', bookingCode: null })
    expect(done.text).toBe(
      'Your booking **NL-B123** has been rescheduled to Wednesday, Feb 11 at 4:30 PM Asia/Kolkata.\n\n' +
        'All times are in IST. Anything else?'
    )
  })

  it('cancels a booking after confirmation', async () => {
    const session = newSession()
    const turns = await runTurns(session, ['hi', 'yes', 'cancel my booking', 'NL-A742', 'yes'])

    expect(turns[2].state).toBe('CANCEL_ASK_CODE')
    expect(turns[3].state).toBe('CANCEL_CONFIRM')
    expect(turns[3].text).toBe("I'll cancel the booking for code **NL-A742**. Confirm cancellation? Say yes or no.")
    expect(turns[4].state).toBe('BOOKING_COMPLETE')
    expect(turns[4].text).toBe('Cancellation recorded for **NL-A742**. You will receive a confirmation. Anything else?')
  })

  it('keeps the code and the intent when a cancellation is declined', async () => {
    const session = newSession()
    const turns = await runTurns(session, ['hi', 'yes', 'cancel', 'NL-A742', 'no', 'what documents needed to prepare'])

    expect(turns[4].state).toBe('INTENT_CONFIRMATION')
    expect(turns[4].context.existingBookingCode).toBe('NL-A742')

    const after = turns[5]
    expect(after.intentResult.intent).toBe('prepare')
    expect(after.context.intent).toBe('cancel')
    expect(after.state).toBe('INTENT_CONFIRMATION')
  })

  it('asks again for a blank booking code', async () => {
    const session = newSession()
    const turns = await runTurns(session, ['hi', 'yes', 'cancel', '   '])
    expect(turns[3].state).toBe('CANCEL_ASK_CODE')
    expect(turns[3].text).toBe('Please tell me your booking code (for example, NL-A742).')
  })

  it('re-prompts for an unknown topic', async () => {
    const session = newSession()
    const turns = await runTurns(session, ['hi', 'yes', 'book', 'something else'])
    expect(turns[3].state).toBe('TOPIC_COLLECTION')
    expect(turns[3].text.startsWith("I didn't quite catch the topic.")).toBe(true)
  })

  describe('slot offer', () => {
    async function atOffer(preference = 'Friday, 10am') {
      const session = newSession({ generateBookingCode: FIXED_CODE })
      await runTurns(session, ['hi', 'yes', 'book', 'kyc', preference])
      return session
    }

    it('reads numbered and spoken picks', async () => {
      for (const [input, index] of [
        ['option 2', 1],
        ['2', 1],
        ['1', 0],
        ['the second one', 1],
        ['first one please', 0],
        ['option 2 please', 1],
        ["I'll take slot 1", 0],
      ] as const) {
        const session = await atOffer()
        const offered = session.context.offeredSlots
        const turn = await session.step(input)
        expect(turn.state).toBe('CONFIRMATION')
        expect(turn.context.chosenSlotIndex).toBe(index)
        expect(turn.context.offeredSlots).toEqual(offered)
      }
    })

    it('offers new slots for a new preference', async () => {
      const session = await atOffer()
      const turn = await session.step('how about Thursday 2pm')
      expect(turn.state).toBe('SLOT_OFFER')
      expect(turn.context.offeredSlots).toEqual([slot('2026-02-12', '14:30'), slot('2026-02-12', '12:00')])
      expect(turn.context.preferredDatetimeText).toBe('how about Thursday 2pm')
      expect(turn.text.startsWith('No problem. Based on your new preference, here are two available slots:')).toBe(true)
    })

    it('asks for another day when a new preference has nothing open', async () => {
      const session = await atOffer()
      const turn = await session.step('Sunday 11am')
      expect(turn.state).toBe('DATETIME_COLLECTION')
      expect(turn.context.offeredSlots).toEqual([])
      expect(turn.text).toBe(
        "I couldn't find any slots for that day. Tell me another day and time that works for you, in IST."
      )
    })

    it('moves to the waitlist when neither slot suits', async () => {
      const session = await atOffer()
      const turn = await session.step('none')
      expect(turn.state).toBe('BOOKING_COMPLETE')
      expect(turn.context.bookingCode).toBeNull()
      expect(turn.text).toContain('waitlist')
    })

    it('re-prompts for an unclear choice', async () => {
      const session = await atOffer()
      const turn = await session.step('hmm')
      expect(turn.state).toBe('SLOT_OFFER')
      expect(turn.text.startsWith("Please choose one of the options by saying 'first' or 'second'.")).toBe(true)
    })

    it('offers the waitlist when the preferred day has nothing open', async () => {
      const session = await atOffer('Monday 10am')
      expect(session.state).toBe('SLOT_OFFER')
      expect(session.context.offeredSlots).toEqual([])

      const turn = await session.step('yes please')
      expect(turn.state).toBe('BOOKING_COMPLETE')
      expect(turn.text.startsWith("You're on the waitlist.")).toBe(true)
    })

    it('asks for another time when the waitlist is declined', async () => {
      const session = await atOffer('Monday 10am')
      const turn = await session.step('no thanks')
      expect(turn.state).toBe('DATETIME_COLLECTION')
      expect(turn.text).toBe('No problem. Tell me another day and time that works for you, in IST.')
    })

    it('fetches fresh slots when a pick has nothing behind it', async () => {
      const session = await atOffer('Monday 10am')
      const turn = await session.step('first')
      expect(turn.state).toBe('DATETIME_COLLECTION')
      expect(turn.text).toBe('Those options seem to have expired. Let me fetch fresh slots. Which day and time suits you?')
    })
  })

  describe('confirmation', () => {
    async function atConfirmation(generateBookingCode = FIXED_CODE) {
      const session = newSession({ generateBookingCode })
      await runTurns(session, ['hi', 'yes', 'book', 'kyc', 'Friday, 10am', 'first'])
      return session
    }

    it('goes back to collecting a time on no', async () => {
      const session = await atConfirmation()
      const turn = await session.step('no')
      expect(turn.state).toBe('DATETIME_COLLECTION')
      expect(turn.context.bookingCode).toBeNull()
      expect(turn.text).toBe(
        "No problem, we won't book that slot. Tell me another day and approximate time that works for you, in IST."
      )
    })

    it('asks again on an unclear answer', async () => {
      const session = await atConfirmation()
      const turn = await session.step('hmm')
      expect(turn.state).toBe('CONFIRMATION')
      expect(turn.text).toBe("Please say 'yes' to confirm this slot, or 'no' to choose another time.")
    })

    it('stays put when the code generator fails', async () => {
      const session = await atConfirmation(async () => {
        throw new Error('ledger down')
      })
      const turn = await session.step('yes')
      expect(turn.state).toBe('CONFIRMATION')
      expect(turn.context.bookingCode).toBeNull()
      expect(turn.text).toBe('Sorry, something went wrong on my side. Could you say that again?')
    })
  })

  it('takes the classifier intent only while choosing what to do', async () => {
    const session = newSession()
    const greeting = await session.step('I want to book')
    expect(greeting.context.intent).toBe('book_new')

    await runTurns(session, ['yes', 'book'])
    const topic = await session.step('cancel')
    expect(topic.context.intent).toBe('book_new')
  })

  it('never throws on odd input', async () => {
    const session = newSession()
    const inputs = ['', '   ', '!!!', '12345', 'yes', '🙂', 'option 9', '31 Feb', 'none', 'x'.repeat(500), 'no']
    for (const input of inputs) {
      const turn = await session.step(input)
      expect(typeof turn.text).toBe('string')
      expect(turn.text.length).toBeGreaterThan(0)
    }
  })

  it('hands out frozen context snapshots', async () => {
    const session = newSession()
    const turn = await session.step('hi')
    expect(Object.isFrozen(turn.context)).toBe(true)
    expect(session.context).not.toBe(turn.context)
  })
})
