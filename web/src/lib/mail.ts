import { MailError } from './errors'

const EMAIL_PATTERN = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/

export const BUG_TYPES = [
  'General Bug/Error',
  'Access Token/API Key Disclosure',
  'Memory Corruption',
  'Database Injection',
  'Code Execution',
  'Denial of Service',
  'Privacy/Authorization',
] as const

export type BugType = (typeof BUG_TYPES)[number]

export const REPORTABLE_PAGES = ['Home', 'About', 'Bug report'] as const

export type ReportablePage = (typeof REPORTABLE_PAGES)[number]

export type MailAttachment = {
  filename: string
  content: Blob
}

export type OutboundMail = {
  from: string
  to: string
  subject: string
  text: string
  attachments: MailAttachment[]
}

export type BugReport = {
  fullName: string
  email: string
  page: ReportablePage
  bugType: BugType
  description: string
  attachments: MailAttachment[]
}

export interface Mailer {
  send(mail: OutboundMail): Promise<void>
}

export function isValidEmail(value: string): boolean {
  return EMAIL_PATTERN.test(value)
}

export type BugReportFormState = {
  acceptedTerms: boolean
  submitting: boolean
}

/** The bug report form stays locked until the terms box is ticked. */
export function canSubmitBugReport({ acceptedTerms, submitting }: BugReportFormState): boolean {
  return acceptedTerms && !submitting
}

function requireEmail(value: string, label: string): string {
  const trimmed = value.trim()
  if (!isValidEmail(trimmed)) {
    throw new MailError(`${label} is not a valid e-mail address`)
  }
  return trimmed
}

export function composeRecommendationsMail(recipient: string, titles: readonly string[], sender: string): OutboundMail {
  const to = requireEmail(recipient, 'Recipient')
  if (titles.length === 0) {
    throw new MailError('There are no recommendations to send')
  }

  const list = titles.map((title, position) => `${position + 1}. ${title}`).join('\n')

  return {
    from: sender,
    to,
    subject: 'Howdy, your recommendations are here!',
    text: [
      'Greetings,',
      'We hope this email finds you well. Thank you for trying Reelpick.',
      `Please find below the movie recommendations as per your selection.\n\n${list}`,
      'We hope you will have a great time watching these flicks.',
      'If you have any questions or need further assistance, please do not hesitate to reach out to us.',
      'Best regards,\nReelpick Community Team',
    ].join('\n\n'),
    attachments: [],
  }
}

export function composeBugReportMail(report: BugReport, recipient: string, sender: string): OutboundMail {
  const fullName = report.fullName.trim()
  if (!fullName) {
    throw new MailError('Full name is required')
  }
  const email = requireEmail(report.email, 'Reporter e-mail')
  const description = report.description.trim()
  if (!description) {
    throw new MailError('Describe the issue before sending the report')
  }

  return {
    from: sender,
    to: recipient,
    subject: 'Reelpick Bug Report',
    text: [
      'Hello team,',
      'A new bug report has been raised in Reelpick. Please find the details as mentioned below.',
      `Submitted by: ${fullName}`,
      `E-Mail Id: ${email}`,
      `Bug Reported In: ${report.page}`,
      `Type of Bug: ${report.bugType}`,
      `Description: ${description}`,
      'Regards,\nReelpick Support Team',
    ].join('\n\n'),
    attachments: report.attachments,
  }
}

export function composeSubscriptionMail(subscriber: string, recipient: string, sender: string): OutboundMail {
  const email = requireEmail(subscriber, 'Subscriber e-mail')

  return {
    from: sender,
    to: recipient,
    subject: 'Reelpick Newsletter Subscription',
    text: `Hello team,\n\n${email} has subscribed to the Reelpick newsletter.\n\nRegards,\nReelpick Support Team`,
    attachments: [],
  }
}

/**
 * Sends mail through an HTTP relay as multipart form data. The relay owns the
 * SMTP session and credentials.
 */
export function createRelayMailer(relayUrl: string): Mailer {
  return {
    async send(mail: OutboundMail): Promise<void> {
      const body = new FormData()
      body.set('from', mail.from)
      body.set('to', mail.to)
      body.set('subject', mail.subject)
      body.set('text', mail.text)
      for (const attachment of mail.attachments) {
        body.append('attachments', attachment.content, attachment.filename)
      }

      let response: Response
      try {
        response = await fetch(relayUrl, { method: 'POST', body })
      } catch (error) {
        console.error('[Mail] relay unreachable', error)
        throw new MailError('Mail service is unreachable')
      }

      if (!response.ok) {
        console.error(`[Mail] ${response.status} on ${relayUrl}`)
        throw new MailError(`Mail could not be sent (${response.status})`, response.status)
      }
    },
  }
}
