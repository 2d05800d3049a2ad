import MimeNode from 'nodemailer/lib/mime-node/index.js'

export interface MimeMessageInput {
  from: string
  to: readonly string[]
  subject: string
  htmlBody: string
  textBody?: string
}

function addAlternative(
  root: MimeNode,
  contentType: string,
  content: string
): void {
  root
    .createChild(contentType)
    .setHeader('Content-Transfer-Encoding', 'base64')
    .setContent(content)
}

/**
 * Serializes a multipart/alternative document. Parts run from least to most
 * preferred: the plain-text rendering (when there is one) precedes the HTML.
 *
 * MailComposer collapses a lone HTML body into a single-part message, so the
 * tree is assembled from its MimeNode directly to keep the alternative
 * wrapper in both cases.
 */
export function buildMimeMessage(input: MimeMessageInput): Promise<Buffer> {
  const root = new MimeNode('multipart/alternative')
  root.setHeader('Subject', input.subject)
  root.setHeader('From', input.from)
  root.setHeader('To', input.to.join(', '))

  if (input.textBody) {
    addAlternative(root, 'text/plain; charset=utf-8', input.textBody)
  }
  addAlternative(root, 'text/html; charset=utf-8', input.htmlBody)

  return new Promise((resolve, reject) => {
    root.build((error, message) => {
      if (error) {
        reject(error)
        return
      }
      resolve(message)
    })
  })
}
