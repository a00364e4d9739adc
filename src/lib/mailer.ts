// src/lib/mailer.ts
import nodemailer, { type Transporter } from "nodemailer";
import { getSettings } from "../config/settings";

export type AdvisorNotice =
  | { kind: "booking"; bookingCode: string; topic: string; slotLabel: string }
  | { kind: "reschedule"; bookingCode: string; slotLabel: string }
  | { kind: "cancel"; bookingCode: string };

let transporter: Transporter | null = null;

function getTransporter(): Transporter {
  if (!transporter) {
    const { smtp } = getSettings();
    transporter = nodemailer.createTransport({
      host: smtp.host,
      port: smtp.port,
      secure: smtp.port === 465,
      auth: smtp.user ? { user: smtp.user, pass: smtp.pass } : undefined,
    });
  }
  return transporter;
}

export function advisorTemplate(notice: AdvisorNotice): { subject: string; text: string } {
  switch (notice.kind) {
    case "booking":
      return {
        subject: `Advisor Pre-Booking — ${notice.bookingCode} — ${notice.topic}`,
        text:
          "Advisor pre-booking (tentative hold).\n\n" +
          `Booking code: ${notice.bookingCode}\n` +
          `Topic: ${notice.topic}\n` +
          `Slot: ${notice.slotLabel}\n\n` +
          "Please review and confirm. Do not share PII in reply.",
      };
    case "reschedule":
      return {
        subject: `Advisor Booking Rescheduled — ${notice.bookingCode}`,
        text:
          `Booking ${notice.bookingCode} was moved by the client.\n\n` +
          `New slot: ${notice.slotLabel}\n\n` +
          "The calendar hold has been updated.",
      };
    case "cancel":
      return {
        subject: `Advisor Booking Cancelled — ${notice.bookingCode}`,
        text: `Booking ${notice.bookingCode} was cancelled by the client.`,
      };
  }
}

/** Plain-text notice to the advisor; skipped when no recipient or SMTP host is set. */
export async function sendAdvisorNotification(notice: AdvisorNotice): Promise<{ ok: boolean; message: string }> {
  const { advisorEmail, smtp } = getSettings();
  if (!advisorEmail || !smtp.host) {
    return { ok: true, message: "Email skipped (no advisor email or SMTP host)" };
  }

  const { subject, text } = advisorTemplate(notice);
  await getTransporter().sendMail({
    from: `"Advisor Desk" <${smtp.from}>`,
    to: advisorEmail,
    subject,
    text,
  });
  return { ok: true, message: "Advisor notified by email" };
}
