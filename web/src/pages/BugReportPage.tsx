import { useState } from 'react'
import type { ChangeEvent, FormEvent } from 'react'

import { errorMessage } from '../lib/errors'
import {
  BUG_TYPES,
  REPORTABLE_PAGES,
  canSubmitBugReport,
  composeBugReportMail,
  type BugType,
  type MailAttachment,
  type ReportablePage,
} from '../lib/mail'
import { useTransientMessage } from '../lib/useTransientMessage'
import type { Services } from '../services'

const FAQ = [
  { question: 'Do you offer any kind of bug bounty?', answer: 'No, we do not offer any bug bounties.' },
  { question: 'How long does it take to hear back?', answer: "You'll hear back from us within 3 days." },
  { question: 'Can we share our reports with others?', answer: "We expect you don't share any report." },
]

function isBugType(value: string): value is BugType {
  return BUG_TYPES.some((bugType) => bugType === value)
}

function isReportablePage(value: string): value is ReportablePage {
  return REPORTABLE_PAGES.some((page) => page === value)
}

export function BugReportPage({ services }: { services: Services }) {
  const [fullName, setFullName] = useState('')
  const [email, setEmail] = useState('')
  const [page, setPage] = useState<ReportablePage>(REPORTABLE_PAGES[0])
  const [bugType, setBugType] = useState<BugType>(BUG_TYPES[0])
  const [description, setDescription] = useState('')
  const [attachments, setAttachments] = useState<MailAttachment[]>([])
  const [acceptedTerms, setAcceptedTerms] = useState(false)
  const [submitting, setSubmitting] = useState(false)
  const [error, setError] = useState<string | null>(null)
  const [notice, showNotice] = useTransientMessage()

  function handleFiles(event: ChangeEvent<HTMLInputElement>) {
    const files = Array.from(event.target.files ?? [])
    setAttachments(files.map((file) => ({ filename: file.name, content: file })))
  }

  async function handleSubmit(event: FormEvent<HTMLFormElement>) {
    event.preventDefault()
    if (!canSubmitBugReport({ acceptedTerms, submitting })) {
      return
    }
    const form = event.currentTarget

    setError(null)
    setSubmitting(true)

    try {
      const mail = composeBugReportMail(
        { fullName, email, page, bugType, description, attachments },
        services.config.teamRecipient,
        services.config.mailSender,
      )
      await services.mailer.send(mail)
      setDescription('')
      setAttachments([])
      form.reset()
      showNotice('Your bug report has been sent!')
    } catch (sendError) {
      setError(errorMessage(sendError, 'Bug report could not be sent'))
    } finally {
      setSubmitting(false)
    }
  }

  return (
    <main className="section-block report">
      <div className="section-heading">
        <h1>Send bug report</h1>
        <p>
          If you believe that you have discovered a vulnerability in Reelpick, fill in the form below with a thorough
          explanation. We will get back to you after reviewing your report.
        </p>
      </div>

      <form className="report-form" onSubmit={handleSubmit}>
        <div className="form-row">
          <label>
            Full name
            <input type="text" value={fullName} onChange={(event) => setFullName(event.target.value)} />
          </label>
          <label>
            E-mail id
            <input type="email" value={email} onChange={(event) => setEmail(event.target.value)} />
          </label>
        </div>

        <div className="form-row">
          <label>
            Which page is the bug in?
            <select
              value={page}
              onChange={(event) => {
                const { value } = event.target
                if (isReportablePage(value)) {
                  setPage(value)
                }
              }}
            >
              {REPORTABLE_PAGES.map((option) => (
                <option key={option} value={option}>
                  {option}
                </option>
              ))}
            </select>
          </label>
          <label>
            What type of bug is it?
            <select
              value={bugType}
              onChange={(event) => {
                const { value } = event.target
                if (isBugType(value)) {
                  setBugType(value)
                }
              }}
            >
              {BUG_TYPES.map((option) => (
                <option key={option} value={option}>
                  {option}
                </option>
              ))}
            </select>
          </label>
        </div>

        <label>
          Describe the issue in detail (include steps to reproduce the issue)
          <textarea rows={6} value={description} onChange={(event) => setDescription(event.target.value)} />
        </label>

        <label>
          Include any relevant attachments such as screenshots or reports
          <input type="file" multiple onChange={handleFiles} />
        </label>

        <label className="checkbox">
          <input type="checkbox" checked={acceptedTerms} onChange={(event) => setAcceptedTerms(event.target.checked)} />
          I accept the terms and conditions and consent to be contacted by the Reelpick support team
        </label>

        <button type="submit" className="button button-primary" disabled={!canSubmitBugReport({ acceptedTerms, submitting })}>
          {submitting ? 'Sending…' : 'Send bug report'}
        </button>

        {error && <p className="error-banner">{error}</p>}
        {notice && <p className="success-banner">{notice}</p>}
      </form>

      <details className="expander faq">
        <summary>Frequently asked questions</summary>
        {FAQ.map((entry) => (
          <p key={entry.question}>
            <strong>Q: {entry.question}</strong>
            <br />
            A: {entry.answer}
          </p>
        ))}
      </details>
    </main>
  )
}
